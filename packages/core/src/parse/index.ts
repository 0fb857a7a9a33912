/**
 * Pattern parsing utilities.
 * @packageDocumentation
 */

export { parsePattern, atomChars } from './parser'
export { validatePattern, isValidPattern } from './validator'
