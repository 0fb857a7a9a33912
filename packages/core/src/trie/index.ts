/**
 * Trie engine.
 * @packageDocumentation
 */

export { Trie, DEFAULT_MAX_NODES, type TrieOptions } from './trie'
