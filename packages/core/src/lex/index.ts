/**
 * Longest-match tokenizing.
 * @packageDocumentation
 */

export { TableIterator, createLexer, tokenize, type LexItem } from './lexer'
