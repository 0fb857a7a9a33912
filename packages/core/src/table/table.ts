/**
 * Pattern table - the public entry point tying alphabet, parser, trie, matcher and tokenizer together.
 * @packageDocumentation
 */

import { Alphabet } from '../alphabet'
import { createLexer, tokenize, type TableIterator } from '../lex'
import { matchString } from '../match'
import { parsePattern } from '../parse'
import { Trie, type TrieOptions } from '../trie'
import type { LexerError, Result, TableError, Token } from '../types'
import { ok } from '../types'

/**
 * Options for table construction.
 *
 * @public
 */
export type TableOptions = TrieOptions

/**
 * A fixed set of patterns over a restricted ASCII alphabet, each mapped to a value.
 *
 * Patterns are strings of literal characters and `[...]` classes, each optionally
 * followed by `+` for one-or-more. Add them once, then match single strings with
 * {@link Table.get} or scan whole inputs with {@link Table.lexer}.
 *
 * @example
 * ```ts
 * const table = new Table<string>(DIGITS + '+-')
 * table.add('[0123456789]+', 'number')
 * table.add('[-+]', 'sign')
 *
 * table.get('42') // { ok: true, value: 'number' }
 * table.tokenize('-42') // tokens: sign '-', number '42'
 * ```
 *
 * @public
 */
export class Table<T> {
  /** Characters patterns, queries and inputs may use */
  readonly alphabet: Alphabet

  private readonly trie: Trie<T>
  private patterns = 0

  constructor(alphabet: string | Iterable<string> | Alphabet, options: TableOptions = {}) {
    this.alphabet = alphabet instanceof Alphabet ? alphabet : new Alphabet(alphabet)
    this.trie = new Trie(options)
  }

  /** Number of patterns added */
  get size(): number {
    return this.patterns
  }

  /** Number of trie nodes, root included */
  get nodeCount(): number {
    return this.trie.size
  }

  /**
   * Add a pattern. A failed call leaves the table unchanged.
   *
   * @param pattern - Pattern source, e.g. `c[aou]t` or `[0123456789]+`
   * @param value - Value reported when the pattern matches
   */
  add(pattern: string, value: T): Result<void, TableError> {
    const parsed = parsePattern(pattern, this.alphabet)
    if (!parsed.ok) {
      return parsed
    }

    const inserted = this.trie.insert(parsed.value, value)
    if (inserted.ok) {
      this.patterns++
    }
    return inserted
  }

  /**
   * Add patterns in order, stopping at the first failure.
   * Entries before the failing one stay in the table.
   */
  addAll(entries: Iterable<readonly [pattern: string, value: T]>): Result<void, TableError> {
    for (const [pattern, value] of entries) {
      const result = this.add(pattern, value)
      if (!result.ok) {
        return result
      }
    }
    return ok(undefined)
  }

  /**
   * Match a whole string.
   *
   * @returns The matching pattern's value, or undefined when nothing matches
   */
  get(query: string): Result<T | undefined, TableError> {
    return matchString(this.trie, this.alphabet, query)
  }

  /**
   * Start a longest-match tokenizer session over `input`.
   */
  lexer(input: string): Result<TableIterator<T>, LexerError> {
    return createLexer(this.trie, this.alphabet, input)
  }

  /**
   * Tokenize all of `input`, stopping at the first error.
   */
  tokenize(input: string): Result<Token<T>[], LexerError> {
    return tokenize(this.trie, this.alphabet, input)
  }
}
