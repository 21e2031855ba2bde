import { promises as fs, type Dirent, type Stats } from 'fs';
import { extname, join } from 'path';
import { isJunk } from 'junk';
import { FileSystemError } from './errors.js';

/**
 * File system helpers. Lookups answer false/null for missing paths; reads and
 * listings throw FileSystemError.
 */

async function statOrNull(path: string): Promise<Stats | null> {
  try {
    return await fs.stat(path);
  } catch {
    return null;
  }
}

export async function exists(path: string): Promise<boolean> {
  return (await statOrNull(path)) !== null;
}

export async function isDirectory(path: string): Promise<boolean> {
  return (await statOrNull(path))?.isDirectory() ?? false;
}

export async function readTextFile(path: string): Promise<string> {
  try {
    return await fs.readFile(path, 'utf8');
  } catch (error) {
    throw new FileSystemError(`Failed to read file: ${path}`, { path, error });
  }
}

/**
 * Names of the files directly inside `dirPath`, optionally limited to one
 * extension. Symlinks count when they point at a file or at nothing, so a
 * dangling link surfaces as a read failure later. OS junk (`.DS_Store`,
 * AppleDouble `._name` companions) is skipped.
 */
export async function listFiles(dirPath: string, extension?: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dirPath, { withFileTypes: true });
  } catch (error) {
    throw new FileSystemError(`Failed to list files in directory: ${dirPath}`, { dirPath, error });
  }

  const candidates = entries
    .filter(entry => !isJunk(entry.name))
    .filter(entry => extension === undefined || extname(entry.name) === extension);

  const names: string[] = [];
  for (const entry of candidates) {
    if (entry.isFile()) {
      names.push(entry.name);
    } else if (entry.isSymbolicLink()) {
      const target = await statOrNull(join(dirPath, entry.name));
      if (target === null || target.isFile()) {
        names.push(entry.name);
      }
    }
  }
  return names;
}
