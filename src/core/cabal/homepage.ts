/**
 * Homepage normalization for package records: force https and drop the URL fragment.
 *
 * This is a textual rewrite, not URL parsing. Every literal `http:` becomes
 * `https:`, and a trailing `#...` is removed unless a `?` follows the `#`.
 */
export function sanitizeHomepage(homepage: string | undefined): string | undefined {
  if (homepage === undefined) {
    return undefined;
  }

  return homepage
    .replace(/http:/g, 'https:')
    .replace(/#[^?]*$/, '');
}
