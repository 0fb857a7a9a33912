/**
 * Type definitions for the pattern table.
 * @packageDocumentation
 */

// AST types
export type { ParsedPattern, Atom, LiteralAtom, ClassAtom } from './ast'

// Trie types
export type { TrieNode, TerminalSlot, Token } from './trie'

// Result types
export type { Result, Ok, Err } from './result'
export { ok, err } from './result'

// Error types
export type { TableErrorCode, LexerErrorCode, TableErrorDetails } from './errors'
export { TableError, ValueAlreadyDefinedError, NodeLimitError, LexerError } from './errors'
