/**
 * Pattern validation - checks a pattern without inserting it.
 * @packageDocumentation
 */

import type { Alphabet } from '../alphabet'
import type { TableError } from '../types'
import { parsePattern } from './parser'

/**
 * Validate a pattern against an alphabet.
 *
 * Parsing stops at the first problem, so the result holds at most one error.
 * Conflicts with patterns already in a table (duplicate values, occupied
 * transitions) are only found by inserting.
 *
 * @param source - Pattern source
 * @param alphabet - Characters the pattern may use
 * @returns Array of validation errors (empty if valid)
 *
 * @public
 */
export function validatePattern(source: string, alphabet: Alphabet): readonly TableError[] {
  const result = parsePattern(source, alphabet)
  return result.ok ? [] : [result.error]
}

/**
 * Check if a pattern is valid (has no errors).
 *
 * @public
 */
export function isValidPattern(source: string, alphabet: Alphabet): boolean {
  return validatePattern(source, alphabet).length === 0
}
