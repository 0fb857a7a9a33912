/**
 * Single-string matching.
 * @packageDocumentation
 */

export { matchString } from './matcher'
