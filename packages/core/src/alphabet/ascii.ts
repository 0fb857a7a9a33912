/**
 * ASCII checks shared by the parser, matcher and tokenizer.
 * @packageDocumentation
 */

/**
 * Find the first code unit above 0x7F.
 *
 * @param str - String to scan
 * @returns 0-based index of the first non-ASCII code unit, or -1 if the string is pure ASCII
 *
 * @public
 */
export function findNonAscii(str: string): number {
  for (let i = 0; i < str.length; i++) {
    if (str.charCodeAt(i) > 0x7f) {
      return i
    }
  }
  return -1
}

/**
 * Check if a string is pure ASCII.
 * @public
 */
export function isAscii(str: string): boolean {
  return findNonAscii(str) === -1
}
