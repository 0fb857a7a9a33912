/**
 * Trie engine - an arena of shared nodes built by merging in one pattern at a time.
 * @packageDocumentation
 */

import type { ParsedPattern, Result, TableError, TerminalSlot, TrieNode } from '../types'
import { NodeLimitError, ValueAlreadyDefinedError, err, ok } from '../types'
import type { PatternAutomaton } from './pattern-automaton'
import { buildPatternAutomaton, follow, transitionChars } from './pattern-automaton'

/**
 * Default maximum number of trie nodes before insertion fails.
 *
 * @public
 */
export const DEFAULT_MAX_NODES = 100_000

/**
 * Options for trie construction.
 *
 * @public
 */
export interface TrieOptions {
  /**
   * Maximum number of nodes, root included. An insertion that would exceed it
   * fails with `NODE_LIMIT` and leaves the trie unchanged.
   * @defaultValue 100000
   */
  maxNodes?: number
}

/**
 * Mutable node as held in the arena.
 */
interface ArenaNode<T> {
  readonly id: number
  readonly edges: Map<string, number>
  selfLoop?: Set<string>
  terminal?: TerminalSlot<T>
}

/**
 * Stands for "no state" on one side of a merged pair.
 */
const ABSENT = -1

/**
 * A trie over single characters, with self-loops for repetition.
 *
 * Insertion first builds the pattern's own automaton, then merges it with the
 * trie by walking both in step: every merged node stands for a pair of a trie
 * node and a pattern state, either of which may be absent. Nodes shared with
 * earlier patterns are therefore split where the new pattern would otherwise
 * change their language, and each stored pattern keeps matching exactly what it
 * matched before.
 *
 * Reads never mutate, so a finished trie may be shared between any number of
 * matchers and tokenizer sessions.
 *
 * @public
 */
export class Trie<T> {
  /** Id of the root node */
  readonly root: number = 0

  private nodes: ArenaNode<T>[]
  private readonly maxNodes: number

  constructor(options: TrieOptions = {}) {
    this.maxNodes = options.maxNodes ?? DEFAULT_MAX_NODES
    this.nodes = [{ id: 0, edges: new Map() }]
  }

  /** Number of nodes, root included */
  get size(): number {
    return this.nodes.length
  }

  /**
   * Read-only view of a node.
   *
   * @throws RangeError if no node has this id
   */
  node(id: number): TrieNode<T> {
    const node = this.nodes[id]
    if (node === undefined) {
      throw new RangeError(`No trie node with id ${id}`)
    }
    return node
  }

  /**
   * Follow the transition for one character: the self-loop if the node has
   * one for `char`, otherwise the forward edge.
   *
   * @returns Target node id, or undefined if the node has no transition on `char`
   * @throws RangeError if no node has this id
   */
  step(id: number, char: string): number | undefined {
    return follow(this.node(id), char)
  }

  /**
   * Terminal slot of a node, if some pattern ends there.
   *
   * @throws RangeError if no node has this id
   */
  terminal(id: number): TerminalSlot<T> | undefined {
    return this.node(id).terminal
  }

  /**
   * Insert a parsed pattern, associating `value` with every state where it ends.
   *
   * Fails without changing the trie when:
   * - a repeated atom would loop on a character its own state already leaves by (`LOCATION_OCCUPIED`)
   * - the pattern matches a string that another pattern already matches (`VALUE_ALREADY_DEFINED`)
   * - the node limit would be exceeded (`NODE_LIMIT`)
   */
  insert(pattern: ParsedPattern, value: T): Result<void, TableError> {
    const automaton = buildPatternAutomaton(pattern)
    if (!automaton.ok) {
      return automaton
    }

    const merged = this.merge(automaton.value, value)
    if (!merged.ok) {
      return merged
    }

    this.nodes = merged.value
    return ok(undefined)
  }

  /**
   * Product of the trie and a pattern automaton, built breadth-first into a new arena.
   * The current arena is left untouched, so a failure needs no undo.
   */
  private merge(automaton: PatternAutomaton, value: T): Result<ArenaNode<T>[], TableError> {
    const merged: ArenaNode<T>[] = []
    const pairs: (readonly [number, number])[] = []
    const ids = new Map<string, number>()

    const intern = (node: number, state: number): Result<number, TableError> => {
      const key = `${node},${state}`
      const known = ids.get(key)
      if (known !== undefined) {
        return ok(known)
      }

      const existing = node === ABSENT ? undefined : this.nodes[node].terminal
      const accepting = state !== ABSENT && automaton.states[state].accepting
      if (existing !== undefined && accepting) {
        return err(new ValueAlreadyDefinedError(automaton.source, existing.value, value))
      }

      const id = merged.length
      if (id >= this.maxNodes) {
        return err(new NodeLimitError(this.maxNodes, id + 1))
      }

      const created: ArenaNode<T> = { id, edges: new Map() }
      const terminal = existing ?? (accepting ? { value } : undefined)
      if (terminal !== undefined) {
        created.terminal = terminal
      }
      merged.push(created)
      pairs.push([node, state])
      ids.set(key, id)
      return ok(id)
    }

    const root = intern(this.root, 0)
    if (!root.ok) {
      return root
    }

    // Nodes are appended while the loop runs; each is expanded once
    for (let id = 0; id < merged.length; id++) {
      const [node, state] = pairs[id]
      const from = node === ABSENT ? undefined : this.nodes[node]
      const pending = state === ABSENT ? undefined : automaton.states[state]
      const chars = new Set([
        ...(from === undefined ? [] : transitionChars(from)),
        ...(pending === undefined ? [] : transitionChars(pending)),
      ])

      for (const char of chars) {
        const target = intern(
          (from === undefined ? undefined : follow(from, char)) ?? ABSENT,
          (pending === undefined ? undefined : follow(pending, char)) ?? ABSENT,
        )
        if (!target.ok) {
          return target
        }

        const current = merged[id]
        if (target.value === id) {
          if (current.selfLoop === undefined) {
            current.selfLoop = new Set()
          }
          current.selfLoop.add(char)
        } else {
          current.edges.set(char, target.value)
        }
      }
    }

    return ok(merged)
  }
}
