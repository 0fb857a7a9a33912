/**
 * Alphabet and character-set utilities.
 * @packageDocumentation
 */

export { Alphabet, DIGITS, LOWERCASE, UPPERCASE, LETTERS, ALPHANUMERIC } from './alphabet'
export { findNonAscii, isAscii } from './ascii'
