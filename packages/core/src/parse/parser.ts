/**
 * Pattern parser - converts pattern strings to atom sequences.
 * @packageDocumentation
 */

import type { Alphabet } from '../alphabet'
import { findNonAscii } from '../alphabet'
import type { Atom, ClassAtom, LiteralAtom, ParsedPattern, Result } from '../types'
import { TableError, err, ok } from '../types'

/**
 * Parser state for tracking position.
 */
interface ParserState {
  source: string
  position: number
  alphabet: Alphabet
}

/**
 * An atom before its `+` suffix has been looked at.
 */
type BareAtom = Omit<LiteralAtom, 'repeated'> | Omit<ClassAtom, 'repeated'>

/**
 * Parse a pattern string into atoms.
 *
 * Grammar: a sequence of literal characters and `[...]` classes, each optionally
 * followed by `+` (one or more). Every character must belong to the alphabet.
 *
 * @param source - The pattern string to parse
 * @param alphabet - Characters the pattern may use
 * @returns The parsed pattern, or the first error found
 *
 * @public
 */
export function parsePattern(source: string, alphabet: Alphabet): Result<ParsedPattern, TableError> {
  const nonAscii = findNonAscii(source)
  if (nonAscii !== -1) {
    return err(
      new TableError('INVALID_STRING', `Invalid string (non-ASCII) at position ${nonAscii}: '${source}'`, {
        position: nonAscii,
      }),
    )
  }

  if (source === '') {
    return err(new TableError('EMPTY_PATTERN', 'Pattern must not be empty'))
  }

  const state: ParserState = { source, position: 0, alphabet }
  const atoms: Atom[] = []

  while (state.position < source.length) {
    const char = source[state.position]

    if (char === '+') {
      return err(danglingRepeat(state.position))
    }

    const result = char === '[' ? parseClass(state) : parseLiteral(state)
    if (!result.ok) {
      return result
    }

    // Trailing + marks the whole atom as one-or-more
    const repeated = source[state.position] === '+'
    if (repeated) {
      state.position++
    }

    atoms.push({ ...result.value, repeated })
  }

  return ok({ source, atoms })
}

/**
 * Parse a single literal character.
 */
function parseLiteral(state: ParserState): Result<BareAtom, TableError> {
  const position = state.position
  const char = state.source[position]

  if (!state.alphabet.has(char)) {
    return err(invalidInput(char, position))
  }

  state.position++
  const atom: BareAtom = { type: 'literal', char, position }
  return ok(atom)
}

/**
 * Parse a character class `[abc]`. Members are de-duplicated in first-seen order.
 */
function parseClass(state: ParserState): Result<BareAtom, TableError> {
  const { source } = state
  const start = state.position
  let i = start + 1

  if (source[i] === '+') {
    return err(danglingRepeat(i))
  }

  const chars: string[] = []

  while (i < source.length && source[i] !== ']') {
    const char = source[i]
    if (!state.alphabet.has(char)) {
      return err(invalidInput(char, i))
    }
    if (!chars.includes(char)) {
      chars.push(char)
    }
    i++
  }

  if (i >= source.length) {
    return err(
      new TableError('INVALID_RANGE', `Invalid range: unclosed character class at position ${start}`, {
        position: start,
      }),
    )
  }

  if (chars.length === 0) {
    return err(
      new TableError('INVALID_RANGE', `Invalid range: empty character class at position ${start}`, {
        position: start,
      }),
    )
  }

  // Skip closing ]
  state.position = i + 1
  const atom: BareAtom = { type: 'class', chars, position: start }
  return ok(atom)
}

function invalidInput(char: string, position: number): TableError {
  return new TableError('INVALID_INPUT', `Invalid input character '${char}' at position ${position}`, {
    position,
    char,
  })
}

function danglingRepeat(position: number): TableError {
  return new TableError('INVALID_RANGE', `Invalid range: '+' at position ${position} has no atom to repeat`, {
    position,
    char: '+',
  })
}

/**
 * Characters an atom consumes.
 *
 * @public
 */
export function atomChars(atom: Atom): readonly string[] {
  return atom.type === 'literal' ? [atom.char] : atom.chars
}
