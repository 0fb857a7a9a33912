/**
 * Longest-match tokenizer over a trie.
 * @packageDocumentation
 */

import type { Alphabet } from '../alphabet'
import { findNonAscii } from '../alphabet'
import type { Trie } from '../trie'
import type { Result, Token } from '../types'
import { LexerError, err, ok } from '../types'

/**
 * One item of a tokenizer session: a token, or the error that ended the session.
 * @public
 */
export type LexItem<T> = Result<Token<T>, LexerError>

/**
 * Session state. `done` and `failed` are final.
 */
type LexerState = 'scanning' | 'done' | 'failed'

/**
 * Most recent terminal node reached during the current token attempt.
 */
interface AcceptingMark<T> {
  /** Offset just past the accepted text */
  readonly end: number
  readonly value: T
}

/**
 * A tokenizer session over one input string.
 *
 * Each step walks the trie from the cursor as far as it can, remembering the last
 * terminal node it passed. At a dead end (or the end of input) it emits the text up
 * to that mark and restarts from just after it, so characters read past the mark
 * are scanned again. If no mark was set, or a character outside the alphabet is
 * met, the session yields one error and ends.
 *
 * Sessions are lazy, finite and single-pass. They only read the trie.
 *
 * @example
 * ```ts
 * // patterns: '=' -> 'Eq', '==' -> 'EqEq'
 * for (const item of session) {
 *   // { ok: true, value: { value: 'EqEq', text: '==', start: 0, end: 2 } }
 *   // { ok: true, value: { value: 'Eq', text: '=', start: 2, end: 3 } }
 * }
 * ```
 *
 * @public
 */
export class TableIterator<T> implements IterableIterator<LexItem<T>> {
  private state: LexerState = 'scanning'
  private cursor = 0

  constructor(
    private readonly trie: Trie<T>,
    private readonly alphabet: Alphabet,
    private readonly input: string,
  ) {}

  /** Offset where the next token attempt starts */
  get position(): number {
    return this.cursor
  }

  /** True once the session has ended, normally or with an error */
  get finished(): boolean {
    return this.state !== 'scanning'
  }

  [Symbol.iterator](): TableIterator<T> {
    return this
  }

  next(): IteratorResult<LexItem<T>, undefined> {
    if (this.state !== 'scanning') {
      return { done: true, value: undefined }
    }

    if (this.cursor >= this.input.length) {
      this.state = 'done'
      return { done: true, value: undefined }
    }

    return { done: false, value: this.scan() }
  }

  /**
   * Attempt one token starting at the cursor.
   */
  private scan(): LexItem<T> {
    const { trie, alphabet, input } = this
    const start = this.cursor
    let node = trie.root
    let mark: AcceptingMark<T> | undefined

    for (let i = start; i < input.length; i++) {
      const char = input[i]
      if (!alphabet.has(char)) {
        this.state = 'failed'
        return err(new LexerError('UNKNOWN_CHAR', `Unknown character '${char}' at position ${i}`, i, char))
      }

      const next = trie.step(node, char)
      if (next === undefined) break

      node = next
      const terminal = trie.terminal(node)
      if (terminal !== undefined) {
        mark = { end: i + 1, value: terminal.value }
      }
    }

    if (mark === undefined) {
      this.state = 'failed'
      return err(new LexerError('UNEXPECTED_END', `No pattern matches input at position ${start}`, start))
    }

    this.cursor = mark.end
    return ok({ value: mark.value, text: input.slice(start, mark.end), start, end: mark.end })
  }
}

/**
 * Start a tokenizer session.
 *
 * @param trie - Trie holding the patterns
 * @param alphabet - Characters the input may use
 * @param input - String to tokenize
 * @returns The session, or `INVALID_STRING` if the input is not ASCII
 *
 * @public
 */
export function createLexer<T>(trie: Trie<T>, alphabet: Alphabet, input: string): Result<TableIterator<T>, LexerError> {
  const nonAscii = findNonAscii(input)
  if (nonAscii !== -1) {
    return err(new LexerError('INVALID_STRING', `Invalid string (non-ASCII) at position ${nonAscii}`, nonAscii))
  }
  return ok(new TableIterator(trie, alphabet, input))
}

/**
 * Tokenize a whole string, stopping at the first error.
 *
 * @returns Every token in order, or the first error
 *
 * @public
 */
export function tokenize<T>(trie: Trie<T>, alphabet: Alphabet, input: string): Result<Token<T>[], LexerError> {
  const session = createLexer(trie, alphabet, input)
  if (!session.ok) {
    return session
  }

  const tokens: Token<T>[] = []
  for (const item of session.value) {
    if (!item.ok) {
      return item
    }
    tokens.push(item.value)
  }
  return ok(tokens)
}
