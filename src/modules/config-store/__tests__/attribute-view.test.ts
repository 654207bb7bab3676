/**
 * Unit tests for attribute-view.ts
 */

import { describe, it, expect, afterEach } from 'vitest'
import { ConfigError, ReadOnlyViolationError } from '../../../core/errors.js'
import { MemoryDocument } from '../../document/memory-document.js'
import { StorageNode } from '../../storage/storage-node.js'
import type { ConfigStore } from '../config-store.js'
import { createConfigStore } from '../config-store-impl.js'
import { createAttributeView, type AttributeValue, type AttributeView } from '../attribute-view.js'

let stores: ConfigStore[] = []

afterEach(() => {
  for (const store of stores) store.close()
  stores = []
})

function memoryStore(): ConfigStore {
  const store = createConfigStore({ fileRequired: false })
  stores.push(store)
  return store
}

function asView(value: AttributeValue | undefined): AttributeView {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error(`expected a nested view, got ${JSON.stringify(value)}`)
  }
  return value
}

describe('createAttributeView', () => {
  it('reads and writes top-level keys as properties', () => {
    const store = memoryStore()
    const view = store.attributes()

    view.name = 'demo'

    expect(view.name).toBe('demo')
    expect(store.get('name')).toBe('demo')
  })

  it('reaches nested levels through chained properties', () => {
    const store = memoryStore()
    const view = store.attributes()

    view.db = { host: 'localhost' }
    asView(view.db).port = 5432

    expect(asView(view.db).host).toBe('localhost')
    expect(store.toJSON()).toEqual({ db: { host: 'localhost', port: 5432 } })
  })

  it('writes through a nested mapping loaded from the document', () => {
    const document = new MemoryDocument({ db: { host: 'localhost' } })
    const view = createAttributeView(new StorageNode({ backing: document, document }))

    asView(view.db).port = 5432

    expect(document.toJSON()).toEqual({ db: { host: 'localhost', port: 5432 } })
  })

  it('treats a dotted property name as a single key', () => {
    const store = memoryStore()
    const view = store.attributes()

    view['db.host'] = 'literal'

    expect(store.keys()).toEqual(['db.host'])
  })

  it('supports in, delete and Object.keys', () => {
    const store = memoryStore()
    store.set('a', 1)
    store.set('b', 2)
    const view = store.attributes()

    delete view.a

    expect('a' in view).toBe(false)
    expect('b' in view).toBe(true)
    expect(Object.keys(view)).toEqual(['b'])
  })

  it('serializes to the plain data and is not thenable', () => {
    const store = memoryStore()
    store.set('db.port', 5432)
    const view = store.attributes()

    expect(JSON.stringify(view)).toBe('{"db":{"port":5432}}')
    expect(view.then).toBeUndefined()
  })

  it('rejects values that cannot be stored', () => {
    const view = memoryStore().attributes()

    expect(() => Reflect.set(view, 'callback', () => 1)).toThrow(ConfigError)
  })

  it('honors the read-only flag of the node it wraps', () => {
    const document = new MemoryDocument({ name: 'demo' })
    const view = createAttributeView(new StorageNode({ backing: document, readonly: true, document }))

    expect(() => {
      view.name = 'other'
    }).toThrow(ReadOnlyViolationError)
    expect(view.name).toBe('demo')
  })
})
