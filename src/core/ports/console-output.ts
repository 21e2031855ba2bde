/**
 * Plain console OutputPort for CI, pipes and tests.
 *
 * Listings (`message`, `note`) go to `out`; everything else goes to `err`, so
 * `list --format json > deps.json` captures only the records.
 */

import type { OutputPort, UnifiedSpinner } from './output.js';

export interface OutputStreams {
  out: (line: string) => void;
  err: (line: string) => void;
}

const processStreams: OutputStreams = {
  out: line => console.log(line),
  err: line => console.error(line)
};

export function createConsoleOutput(streams: OutputStreams = processStreams): OutputPort {
  const { out, err } = streams;

  const spinner = (): UnifiedSpinner => {
    let current = '';
    return {
      start(message) {
        current = message;
        err(`… ${message}`);
      },
      stop(finalMessage) {
        err(`✓ ${finalMessage ?? current}`);
      },
      message(text) {
        current = text;
      }
    };
  };

  return {
    info: message => err(message),
    message: message => out(message),
    success: message => err(`✓ ${message}`),
    warn: message => err(`⚠ ${message}`),
    error: message => err(`✗ ${message}`),
    note: (content, title) => out(title ? `\n${title}\n${content}` : `\n${content}`),
    spinner
  };
}

export const consoleOutput: OutputPort = createConsoleOutput();
