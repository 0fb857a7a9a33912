import { describe, it, expect } from 'vitest'

import { Alphabet, LOWERCASE } from '../alphabet'
import { parsePattern } from '../parse'
import { buildPatternAutomaton, follow, transitionChars, type PatternAutomaton } from './pattern-automaton'

const alphabet = new Alphabet(LOWERCASE)

function build(source: string): PatternAutomaton {
  const parsed = parsePattern(source, alphabet)
  if (!parsed.ok) throw parsed.error
  const result = buildPatternAutomaton(parsed.value)
  if (!result.ok) throw result.error
  return result.value
}

describe('buildPatternAutomaton', () => {
  it('builds a chain for a literal pattern', () => {
    const automaton = build('ab')

    expect(automaton.source).toBe('ab')
    expect(automaton.states.map((state) => state.accepting)).toEqual([false, false, true])
    expect(follow(automaton.states[0], 'a')).toBe(1)
    expect(follow(automaton.states[1], 'b')).toBe(2)
  })

  it('shares one successor between class members', () => {
    const automaton = build('[xyz]')

    expect(automaton.states).toHaveLength(2)
    expect(transitionChars(automaton.states[0])).toEqual(['x', 'y', 'z'])
  })

  it('loops a repeated atom and lists loop characters after edges', () => {
    const automaton = build('a+b')
    const first = automaton.states[1]

    expect(first.selfLoop).toEqual(new Set(['a']))
    expect(follow(first, 'a')).toBe(1)
    expect(transitionChars(first)).toEqual(['b', 'a'])
  })

  it('accepts every state the last atom reached', () => {
    const automaton = build('a+[ab]')

    expect(automaton.states.filter((state) => state.accepting).map((state) => state.id)).toEqual([1, 2])
  })

  it('rejects a loop on a character the state already leaves by', () => {
    const parsed = parsePattern('a+[ab]+', alphabet)
    if (!parsed.ok) throw parsed.error
    const result = buildPatternAutomaton(parsed.value)

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error).toMatchObject({ code: 'LOCATION_OCCUPIED', char: 'b', position: 2 })
  })
})
