/**
 * Exact matching - walks the trie for a single query string.
 * @packageDocumentation
 */

import type { Alphabet } from '../alphabet'
import { findNonAscii } from '../alphabet'
import type { Trie } from '../trie'
import type { Result } from '../types'
import { TableError, err, ok } from '../types'

/**
 * Match a whole string against the patterns in a trie.
 *
 * The walk is deterministic: a self-loop on the current character wins, otherwise
 * the forward edge is taken. A missing transition, or a walk that ends on a
 * non-terminal node, is "no match", reported as `undefined` rather than an error.
 *
 * Characters are checked against the alphabet as the walk reaches them, so a
 * query that stops matching early returns `undefined` even if later characters
 * are outside the alphabet.
 *
 * @param trie - Trie to walk
 * @param alphabet - Characters queries may use
 * @param query - String to match
 * @returns The value of the pattern that accepts the whole query, or undefined
 *
 * @public
 */
export function matchString<T>(trie: Trie<T>, alphabet: Alphabet, query: string): Result<T | undefined, TableError> {
  const nonAscii = findNonAscii(query)
  if (nonAscii !== -1) {
    return err(
      new TableError('INVALID_STRING', `Invalid string (non-ASCII) at position ${nonAscii}: '${query}'`, {
        position: nonAscii,
      }),
    )
  }

  let current = trie.root
  for (let i = 0; i < query.length; i++) {
    const char = query[i]
    if (!alphabet.has(char)) {
      return err(
        new TableError('INVALID_INPUT', `Invalid input character '${char}' at position ${i}`, { position: i, char }),
      )
    }

    const next = trie.step(current, char)
    if (next === undefined) {
      return ok(undefined)
    }
    current = next
  }

  return ok(trie.terminal(current)?.value)
}
