import { describe, it, expect } from 'vitest'

import { Alphabet, LOWERCASE } from '../alphabet'
import { parsePattern } from '../parse'
import { NodeLimitError, ValueAlreadyDefinedError, type Result, type TableError } from '../types'
import { Trie } from './trie'

const alphabet = new Alphabet(LOWERCASE)

function insert<T>(trie: Trie<T>, source: string, value: T): Result<void, TableError> {
  const parsed = parsePattern(source, alphabet)
  if (!parsed.ok) throw parsed.error
  return trie.insert(parsed.value, value)
}

function walk<T>(trie: Trie<T>, str: string): number | undefined {
  let current: number | undefined = trie.root
  for (const char of str) {
    if (current === undefined) return undefined
    current = trie.step(current, char)
  }
  return current
}

describe('Trie', () => {
  describe('structure', () => {
    it('starts with a single non-terminal root', () => {
      const trie = new Trie<number>()

      expect(trie.size).toBe(1)
      expect(trie.root).toBe(0)
      expect(trie.terminal(trie.root)).toBeUndefined()
    })

    it('reuses nodes for a shared prefix', () => {
      const trie = new Trie<string>()
      insert(trie, 'abc', 'v1')
      expect(trie.size).toBe(4)

      insert(trie, 'abd', 'v2')
      expect(trie.size).toBe(5)
    })

    it('points every member of a class at one shared successor', () => {
      const trie = new Trie<string>()
      insert(trie, '[abc]', 'v')

      expect(trie.size).toBe(2)
      expect([...trie.node(trie.root).edges]).toEqual([
        ['a', 1],
        ['b', 1],
        ['c', 1],
      ])
    })

    it('gives missing class members a fresh successor next to existing edges', () => {
      const trie = new Trie<number>()
      insert(trie, 'ax', 1)
      insert(trie, '[ab]y', 2)

      expect(trie.size).toBe(5)
      expect(trie.node(trie.root).edges.get('a')).toBe(1)
      expect(trie.node(trie.root).edges.get('b')).toBe(2)
      expect(trie.terminal(walk(trie, 'ay') ?? -1)).toEqual({ value: 2 })
      expect(trie.terminal(walk(trie, 'by') ?? -1)).toEqual({ value: 2 })
      expect(walk(trie, 'bx')).toBeUndefined()
    })

    it('makes a repeated atom loop back to its own node', () => {
      const trie = new Trie<string>()
      insert(trie, 'a+', 'loop')

      const first = trie.node(trie.root).edges.get('a')
      expect(first).toBe(1)
      expect(trie.node(1).selfLoop).toEqual(new Set(['a']))
      expect(trie.node(1).edges.size).toBe(0)
      expect(trie.step(1, 'a')).toBe(1)
    })

    it('absorbs an atom that the previous loop already covers', () => {
      const trie = new Trie<string>()
      insert(trie, 'a+a', 'v')

      expect(trie.size).toBe(2)
      expect(trie.terminal(1)).toEqual({ value: 'v' })
    })

    it('throws for an unknown node id', () => {
      const trie = new Trie<number>()

      expect(() => trie.node(5)).toThrow(RangeError)
      expect(() => trie.step(5, 'a')).toThrow('No trie node with id 5')
      expect(() => trie.terminal(-1)).toThrow(RangeError)
    })
  })

  describe('conflicts', () => {
    it('keeps the first value of a duplicate pattern', () => {
      const trie = new Trie<string>()
      insert(trie, 'hello', 'first')
      const result = insert(trie, 'hello', 'second')

      expect(result.ok).toBe(false)
      if (result.ok) return
      expect(result.error).toBeInstanceOf(ValueAlreadyDefinedError)
      expect(result.error).toMatchObject({
        code: 'VALUE_ALREADY_DEFINED',
        pattern: 'hello',
        current: 'first',
        requested: 'second',
      })
      expect(trie.terminal(walk(trie, 'hello') ?? -1)).toEqual({ value: 'first' })
    })

    it('treats an undefined value as present', () => {
      const trie = new Trie<string | undefined>()
      expect(insert(trie, 'a', undefined).ok).toBe(true)

      const result = insert(trie, 'a', 'other')
      expect(result.ok).toBe(false)
    })

    it('rejects a loop on a character its own state already leaves by', () => {
      const trie = new Trie<number>()
      const result = insert(trie, 'a+[ab]+', 1)

      expect(result.ok).toBe(false)
      if (result.ok) return
      expect(result.error.code).toBe('LOCATION_OCCUPIED')
      expect(result.error.char).toBe('b')
      expect(result.error.position).toBe(2)
      expect(trie.size).toBe(1)
    })

    it('reports a repetition that reaches a stored string as a duplicate', () => {
      const trie = new Trie<number>()
      insert(trie, 'aa', 1)
      const result = insert(trie, 'a+', 2)

      expect(result.ok).toBe(false)
      if (result.ok) return
      expect(result.error.code).toBe('VALUE_ALREADY_DEFINED')
      expect(trie.node(1).selfLoop).toBeUndefined()
      expect(walk(trie, 'aaa')).toBeUndefined()
    })
  })

  describe('exactness across patterns', () => {
    it('splits a class successor before extending one of its members', () => {
      const trie = new Trie<number>()
      insert(trie, '[ab]x', 1)
      expect(insert(trie, 'ay', 2).ok).toBe(true)

      expect(trie.terminal(walk(trie, 'ax') ?? -1)).toEqual({ value: 1 })
      expect(trie.terminal(walk(trie, 'bx') ?? -1)).toEqual({ value: 1 })
      expect(trie.terminal(walk(trie, 'ay') ?? -1)).toEqual({ value: 2 })
      expect(walk(trie, 'by')).toBeUndefined()
      expect(trie.size).toBe(5)
    })

    it('keeps a loop off a node an earlier pattern passes through', () => {
      const trie = new Trie<number>()
      insert(trie, 'ab', 1)
      expect(insert(trie, 'a+', 2).ok).toBe(true)

      expect(trie.terminal(walk(trie, 'a') ?? -1)).toEqual({ value: 2 })
      expect(trie.terminal(walk(trie, 'aaa') ?? -1)).toEqual({ value: 2 })
      expect(trie.terminal(walk(trie, 'ab') ?? -1)).toEqual({ value: 1 })
      expect(walk(trie, 'aab')).toBeUndefined()
      expect(trie.node(1).selfLoop).toBeUndefined()
    })

    it('keeps a loop off a node where an earlier pattern ends', () => {
      const trie = new Trie<number>()
      insert(trie, 'a', 1)
      expect(insert(trie, 'a+b', 2).ok).toBe(true)

      expect(trie.terminal(walk(trie, 'a') ?? -1)).toEqual({ value: 1 })
      expect(trie.terminal(walk(trie, 'aa') ?? -1)).toBeUndefined()
      expect(trie.terminal(walk(trie, 'ab') ?? -1)).toEqual({ value: 2 })
      expect(trie.terminal(walk(trie, 'aaab') ?? -1)).toEqual({ value: 2 })
      expect(trie.size).toBe(4)
    })
  })

  describe('failed insertion', () => {
    it('keeps existing edges after a failed class insertion', () => {
      const trie = new Trie<string>()
      insert(trie, 'a', 'literal')
      const result = insert(trie, '[abc]', 'class')

      expect(result.ok).toBe(false)
      expect(trie.size).toBe(2)
      expect([...trie.node(trie.root).edges.keys()]).toEqual(['a'])
    })

    it('adds no loop to existing nodes after a failed insertion', () => {
      const trie = new Trie<number>()
      insert(trie, 'ab', 1)
      const result = insert(trie, 'a+b', 2)

      expect(result.ok).toBe(false)
      expect(trie.size).toBe(3)
      expect(trie.node(1).selfLoop).toBeUndefined()
      expect(walk(trie, 'aab')).toBeUndefined()
    })
  })

  describe('node limit', () => {
    it('fails once the arena is full', () => {
      const trie = new Trie<number>({ maxNodes: 3 })
      expect(insert(trie, 'ab', 1).ok).toBe(true)

      const result = insert(trie, 'ac', 2)
      expect(result.ok).toBe(false)
      if (result.ok) return
      expect(result.error).toBeInstanceOf(NodeLimitError)
      expect(result.error).toMatchObject({ code: 'NODE_LIMIT', limit: 3, actual: 4 })
      expect(trie.size).toBe(3)
      expect([...trie.node(1).edges.keys()]).toEqual(['b'])
    })

    it('leaves the trie empty when a pattern runs out of nodes part way', () => {
      const trie = new Trie<number>({ maxNodes: 3 })
      const result = insert(trie, 'abc', 1)

      expect(result.ok).toBe(false)
      expect(trie.size).toBe(1)
      expect(trie.node(trie.root).edges.size).toBe(0)
    })
  })
})
