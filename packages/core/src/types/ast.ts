// =============================================================================
// PATTERN AST
// =============================================================================

/**
 * A pattern after parsing, ready to be inserted into a trie.
 * @public
 */
export interface ParsedPattern {
  /** Original pattern string, kept for error messages */
  readonly source: string

  /** Atoms in source order */
  readonly atoms: readonly Atom[]
}

/**
 * One unit of pattern syntax.
 *
 * @example
 * "c[aou]+t" becomes:
 *   [Literal('c'), Class(['a', 'o', 'u'], repeated), Literal('t')]
 *
 * @public
 */
export type Atom = LiteralAtom | ClassAtom

/**
 * A single character, e.g. `a` or `a+`.
 * @public
 */
export interface LiteralAtom {
  readonly type: 'literal'
  readonly char: string

  /** One-or-more (`+` suffix) */
  readonly repeated: boolean

  /** 0-based position of the atom in the pattern source */
  readonly position: number
}

/**
 * A character class, e.g. `[abc]` or `[abc]+`.
 * @public
 */
export interface ClassAtom {
  readonly type: 'class'

  /** Distinct members, in first-seen order */
  readonly chars: readonly string[]

  /** One-or-more (`+` suffix); applies to the whole class */
  readonly repeated: boolean

  /** 0-based position of the opening `[` */
  readonly position: number
}
