/**
 * Pattern automaton - the states one pattern needs on its own, before it is
 * merged into a shared trie.
 * @packageDocumentation
 */

import { atomChars } from '../parse/parser'
import type { ParsedPattern, Result } from '../types'
import { TableError, err, ok } from '../types'

/**
 * Outgoing transitions of a state. Trie nodes and pattern states both have this shape.
 */
export interface Transitions {
  readonly id: number
  readonly edges: ReadonlyMap<string, number>
  readonly selfLoop?: ReadonlySet<string>
}

/**
 * A state of a pattern automaton.
 */
export interface PatternState {
  readonly id: number
  readonly edges: Map<string, number>
  selfLoop?: Set<string>
  accepting: boolean
}

/**
 * Deterministic automaton for a single pattern. State 0 is the start.
 */
export interface PatternAutomaton {
  /** Pattern text, for error reporting */
  readonly source: string
  readonly states: readonly PatternState[]
}

/**
 * Mutable state builder for constructing pattern automata.
 */
interface PatternBuilder {
  states: PatternState[]
}

/**
 * Follow the transition for one character: the self-loop first, then the forward edge.
 */
export function follow(state: Transitions, char: string): number | undefined {
  if (state.selfLoop?.has(char)) {
    return state.id
  }
  return state.edges.get(char)
}

/**
 * Every character a state has a transition on, forward edges first.
 */
export function transitionChars(state: Transitions): string[] {
  return [...state.edges.keys(), ...(state.selfLoop ?? [])]
}

/**
 * Build the automaton of one pattern.
 *
 * The walk keeps a set of current states, one atom at a time. Characters of an
 * atom with no transition yet share one fresh successor, so a class adds one
 * state per source state. A repeated atom then installs self-loops on every
 * state it reached.
 *
 * Fails with `LOCATION_OCCUPIED` when a repeated atom would loop on a character
 * that the same state already leaves by an edge, as in `a+[ab]+`.
 */
export function buildPatternAutomaton(pattern: ParsedPattern): Result<PatternAutomaton, TableError> {
  const builder: PatternBuilder = { states: [] }
  let currents = new Set<number>([createState(builder)])

  for (const atom of pattern.atoms) {
    const chars = atomChars(atom)
    const next = new Set<number>()

    for (const current of currents) {
      const missing: string[] = []
      for (const char of chars) {
        const target = follow(builder.states[current], char)
        if (target === undefined) {
          missing.push(char)
        } else {
          next.add(target)
        }
      }

      if (missing.length > 0) {
        const child = createState(builder)
        for (const char of missing) {
          builder.states[current].edges.set(char, child)
        }
        next.add(child)
      }
    }

    if (atom.repeated) {
      for (const id of next) {
        const state = builder.states[id]
        for (const char of chars) {
          if (state.selfLoop?.has(char)) continue

          if (state.edges.has(char)) {
            return err(
              new TableError(
                'LOCATION_OCCUPIED',
                `Location occupied: cannot repeat '${char}' at position ${atom.position}, ` +
                  `the state already has a different transition on it`,
                { position: atom.position, char },
              ),
            )
          }

          if (state.selfLoop === undefined) {
            state.selfLoop = new Set()
          }
          state.selfLoop.add(char)
        }
      }
    }

    currents = next
  }

  for (const id of currents) {
    builder.states[id].accepting = true
  }

  return ok({ source: pattern.source, states: builder.states })
}

function createState(builder: PatternBuilder): number {
  const id = builder.states.length
  builder.states.push({ id, edges: new Map(), accepting: false })
  return id
}
