/**
 * The fixed character set a table accepts.
 * @packageDocumentation
 */

/** @public */
export const DIGITS = '0123456789'

/** @public */
export const LOWERCASE = 'abcdefghijklmnopqrstuvwxyz'

/** @public */
export const UPPERCASE = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ'

/** @public */
export const LETTERS = LOWERCASE + UPPERCASE

/** @public */
export const ALPHANUMERIC = LETTERS + DIGITS

/**
 * An immutable set of permitted characters.
 *
 * Built from a string, or from any iterable of strings in which case every
 * character of every element is a member. Duplicates are ignored; only
 * membership matters. The empty alphabet is legal and accepts nothing.
 *
 * @example
 * ```ts
 * const alphabet = new Alphabet(DIGITS + '+-')
 * alphabet.has('7') // true
 * alphabet.has('x') // false
 * ```
 *
 * @public
 */
export class Alphabet {
  private readonly members: ReadonlySet<string>

  constructor(source: string | Iterable<string>) {
    const members = new Set<string>()
    const parts = typeof source === 'string' ? [source] : source
    for (const part of parts) {
      for (let i = 0; i < part.length; i++) {
        members.add(part[i])
      }
    }
    this.members = members
  }

  /** Number of distinct characters */
  get size(): number {
    return this.members.size
  }

  /** Check if a single character is a member. */
  has(char: string): boolean {
    return this.members.has(char)
  }

  /** Distinct members in first-seen order. */
  chars(): string[] {
    return [...this.members]
  }

  toString(): string {
    return this.chars().join('')
  }
}
