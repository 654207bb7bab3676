/**
 * Value model shared by the storage tree and the backing documents.
 */

import type { StorageNode } from './storage-node.js'

export type ConfigScalar = string | number | boolean | null

/** Plain-object form of a nested mapping, as users write it */
export interface ConfigObject {
  [key: string]: ConfigValue
}

/** Ordered nested mapping, as the storage tree keeps it */
export type ConfigMap = Map<string, StoredValue>

/** Anything a caller may assign into the store */
export type ConfigValue = ConfigScalar | ConfigValue[] | ConfigObject | ConfigMap

/** Anything a backing mapping may hold, including auto-vivified nodes */
export type StoredValue = ConfigValue | StorageNode

/** What StorageNode.get() returns: nested mappings always come back wrapped */
export type NodeValue = ConfigScalar | ConfigValue[] | StorageNode

/**
 * The ordered key/value contract a StorageNode manipulates directly.
 * `Map<string, StoredValue>` satisfies it, and so does every OrderedDocument.
 */
export interface OrderedMapping {
  get(key: string): StoredValue | undefined
  set(key: string, value: StoredValue): unknown
  has(key: string): boolean
  delete(key: string): boolean
  keys(): Iterable<string>
  entries(): Iterable<[string, StoredValue]>
  readonly size: number
}
