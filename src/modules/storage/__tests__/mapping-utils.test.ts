/**
 * Unit tests for mapping-utils.ts
 */

import { describe, it, expect } from 'vitest'
import {
  isPlainMapping,
  isStoredValue,
  lookupKey,
  renderPairs,
  structurallyEqual,
  toOrderedMap,
  toPlain,
} from '../mapping-utils.js'
import { StorageNode } from '../storage-node.js'
import type { StoredValue } from '../types.js'

describe('isPlainMapping', () => {
  it('accepts Maps and plain objects', () => {
    expect(isPlainMapping(new Map())).toBe(true)
    expect(isPlainMapping({ a: 1 })).toBe(true)
    expect(isPlainMapping(Object.create(null))).toBe(true)
  })

  it('rejects nodes, arrays, scalars and class instances', () => {
    expect(isPlainMapping(new StorageNode())).toBe(false)
    expect(isPlainMapping([1])).toBe(false)
    expect(isPlainMapping('a')).toBe(false)
    expect(isPlainMapping(null)).toBe(false)
    expect(isPlainMapping(new Date())).toBe(false)
  })
})

describe('isStoredValue', () => {
  it('accepts nested JSON-like data', () => {
    expect(isStoredValue({ a: [1, 'two', { b: null }], c: new Map([['d', true]]) })).toBe(true)
  })

  it('rejects undefined, functions and non-finite numbers', () => {
    expect(isStoredValue(undefined)).toBe(false)
    expect(isStoredValue(() => 1)).toBe(false)
    expect(isStoredValue(Number.NaN)).toBe(false)
    expect(isStoredValue({ nested: { bad: undefined } })).toBe(false)
  })
})

describe('toOrderedMap / toPlain', () => {
  it('converts nested objects to Maps and back, keeping arrays as leaves', () => {
    const map = toOrderedMap({ a: { b: 1 }, list: [{ c: 2 }] })

    expect(map.get('a')).toBeInstanceOf(Map)
    expect(map.get('list')).toEqual([{ c: 2 }])
    expect(toPlain(map)).toEqual({ a: { b: 1 }, list: [{ c: 2 }] })
  })

  it('exports nodes as plain objects', () => {
    const node = new StorageNode({ backing: new Map<string, StoredValue>([['x', 1]]) })

    expect(toPlain(new Map<string, StoredValue>([['node', node]]))).toEqual({ node: { x: 1 } })
  })
})

describe('lookupKey', () => {
  it('reads Maps, objects and nodes without creating keys', () => {
    const node = new StorageNode()

    expect(lookupKey(new Map<string, StoredValue>([['a', 1]]), 'a')).toBe(1)
    expect(lookupKey({ a: 2 }, 'a')).toBe(2)
    expect(lookupKey({ a: 2 }, 'toString')).toBeUndefined()
    expect(lookupKey(node, 'missing')).toBeUndefined()
    expect(node.length).toBe(0)
  })
})

describe('structurallyEqual', () => {
  it('compares mappings regardless of representation and key order', () => {
    expect(structurallyEqual(new Map<string, StoredValue>([['a', 1], ['b', 2]]), { b: 2, a: 1 })).toBe(true)
  })

  it('distinguishes different values', () => {
    expect(structurallyEqual({ a: 1 }, { a: '1' })).toBe(false)
    expect(structurallyEqual({ a: 1 }, { a: 1, b: 2 })).toBe(false)
    expect(structurallyEqual([1, 2], [2, 1])).toBe(false)
    expect(structurallyEqual({ a: 1 }, [1])).toBe(false)
  })
})

describe('renderPairs', () => {
  it('guards against cyclic mappings', () => {
    const cyclic = new Map<string, StoredValue>([['name', 'loop']])
    cyclic.set('self', cyclic)

    expect(renderPairs(cyclic)).toBe('[("name", "loop"), ("self", [...])]')
  })
})
