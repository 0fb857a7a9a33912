// =============================================================================
// TRIE
// =============================================================================

/**
 * Presence slot for a terminal value.
 *
 * Wrapping the value keeps `undefined` and `null` storable: a node is terminal
 * when the slot exists, whatever it holds.
 *
 * @public
 */
export interface TerminalSlot<T> {
  readonly value: T
}

/**
 * A state in the trie.
 *
 * Nodes live in an arena and refer to each other by id. Several edges may
 * point at one node (classes fan in, repetition loops back), so the structure
 * is a graph rather than a tree.
 *
 * Invariant: a character never appears both in `edges` and in `selfLoop`.
 *
 * @public
 */
export interface TrieNode<T> {
  /** Index of this node in the arena; the root is 0 */
  readonly id: number

  /** Forward transitions, character to child id */
  readonly edges: ReadonlyMap<string, number>

  /** Characters on which this node moves to itself */
  readonly selfLoop?: ReadonlySet<string>

  /** Present on nodes where some inserted pattern ends */
  readonly terminal?: TerminalSlot<T>
}

// =============================================================================
// TOKENS
// =============================================================================

/**
 * A token produced by the longest-match tokenizer.
 * @public
 */
export interface Token<T> {
  /** Value of the pattern that matched */
  readonly value: T

  /** The matched substring */
  readonly text: string

  /** 0-based offset of the first character (inclusive) */
  readonly start: number

  /** 0-based offset after the last character (exclusive) */
  readonly end: number
}
