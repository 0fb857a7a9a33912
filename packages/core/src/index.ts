/**
 * Fixed-Vocabulary Pattern Table
 *
 * Matches strings against a pre-declared set of patterns over a restricted ASCII
 * alphabet, and tokenizes whole inputs with longest-match semantics. Meant for
 * lexers, keyword matchers and fixed-vocabulary routers.
 *
 * @packageDocumentation
 */

/**
 * Library version.
 * @public
 */
export const version = '0.1.0'

// =============================================================================
// Types
// =============================================================================

export type {
  // AST types
  ParsedPattern,
  Atom,
  LiteralAtom,
  ClassAtom,
  // Trie types
  TrieNode,
  TerminalSlot,
  Token,
  // Result types
  Result,
  Ok,
  Err,
  // Error types
  TableErrorCode,
  LexerErrorCode,
  TableErrorDetails,
} from './types'
export { ok, err } from './types'
export { TableError, ValueAlreadyDefinedError, NodeLimitError, LexerError } from './types'

// =============================================================================
// Alphabet
// =============================================================================

export { Alphabet, DIGITS, LOWERCASE, UPPERCASE, LETTERS, ALPHANUMERIC } from './alphabet'
export { findNonAscii, isAscii } from './alphabet'

// =============================================================================
// Parsing
// =============================================================================

export { parsePattern, atomChars } from './parse'
export { validatePattern, isValidPattern } from './parse'

// =============================================================================
// Trie Engine
// =============================================================================

export { Trie, DEFAULT_MAX_NODES, type TrieOptions } from './trie'

// =============================================================================
// Matching
// =============================================================================

export { matchString } from './match'

// =============================================================================
// Tokenizing
// =============================================================================

export { TableIterator, createLexer, tokenize, type LexItem } from './lex'

// =============================================================================
// Table
// =============================================================================

export { Table, type TableOptions } from './table'
