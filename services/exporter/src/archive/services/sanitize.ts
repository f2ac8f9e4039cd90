/**
 * Path-segment sanitization for every file and directory name the export
 * derives from source data (titles, ids, attachment names).
 */

/** Device names Windows refuses as file names, compared case-insensitively. */
const RESERVED_NAMES = new Set([
  'aux', 'con', 'nul', 'prn',
  'com0', 'com1', 'com2', 'com3', 'com4', 'com5', 'com6', 'com7', 'com8', 'com9',
  'lpt0', 'lpt1', 'lpt2', 'lpt3', 'lpt4', 'lpt5', 'lpt6', 'lpt7', 'lpt8', 'lpt9',
]);

const RESERVED_CHARS = /["*/:<>?\\|]/g;
const EDGE_TRIM = /^[ \t\n.]+|[ \t\n.]+$/g;

/**
 * Make a single path segment safe on every common filesystem.
 *
 * Reserved device names gain a trailing `_`, reserved characters are
 * removed, leading and trailing whitespace and periods are trimmed, and an
 * empty result becomes `_`. Applying it twice gives the same result as once.
 */
export function sanitizeFileName(name: string): string {
  let result = name.replace(RESERVED_CHARS, '').replace(EDGE_TRIM, '');
  if (RESERVED_NAMES.has(result.toLowerCase())) {
    result = `${result}_`;
  }
  return result || '_';
}
