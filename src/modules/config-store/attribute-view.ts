/**
 * Attribute-style sugar over the storage tree.
 *
 *   view.db.host          ≡ node.get('db').get('host')
 *   view.db.host = 'x'    ≡ node.get('db').set('host', 'x')
 *   delete view.db        ≡ node.delete('db')
 *   'db' in view          ≡ node.contains('db')
 *
 * Property names are used verbatim as single keys; a dotted property name is
 * one key, not a path. Reads auto-vivify like StorageNode.get(). Symbol
 * properties, `then` (so a view is never mistaken for a thenable) and `toJSON`
 * (which returns the plain data) are not treated as keys.
 */

import { ConfigError } from '../../core/errors.js'
import { isStoredValue, toPlain } from '../storage/mapping-utils.js'
import { StorageNode } from '../storage/storage-node.js'
import type { ConfigScalar, ConfigValue, NodeValue } from '../storage/types.js'

export type AttributeValue = ConfigScalar | ConfigValue[] | AttributeView

export interface AttributeView {
  [key: string]: AttributeValue
}

/** Runs an access under the owning store's watcher suppression */
export type AccessGuard = <T>(access: () => T) => T

const RESERVED_PROPERTIES = new Set(['then', 'toJSON'])

const unguarded: AccessGuard = (access) => access()

export function createAttributeView(node: StorageNode, guard: AccessGuard = unguarded): AttributeView {
  const wrap = (value: NodeValue): AttributeValue =>
    value instanceof StorageNode ? createAttributeView(value, guard) : value

  return new Proxy<AttributeView>(
    {},
    {
      get(_target, property) {
        if (typeof property === 'symbol') return undefined
        if (property === 'toJSON') return () => node.toJSON()
        if (RESERVED_PROPERTIES.has(property)) return undefined
        return guard(() => wrap(node.get(property)))
      },

      set(_target, property, value: unknown) {
        if (typeof property === 'symbol') return false
        if (!isStoredValue(value)) {
          throw new ConfigError(`Unsupported value assigned to "${property}"`, { key: property })
        }
        guard(() => node.set(property, value))
        return true
      },

      deleteProperty(_target, property) {
        if (typeof property === 'symbol') return false
        guard(() => node.delete(property))
        return true
      },

      has(_target, property) {
        return typeof property === 'string' && node.contains(property)
      },

      ownKeys() {
        return node.keys()
      },

      getOwnPropertyDescriptor(_target, property) {
        if (typeof property === 'symbol') return undefined
        const value = node.peek(property)
        if (value === undefined) return undefined
        return { enumerable: true, configurable: true, writable: true, value: toPlain(value) }
      },
    },
  )
}
