/**
 * Helpers for telling nested mappings apart from leaf values, exporting them
 * as plain data and comparing them structurally.
 */

import { isPlainObject } from '../../utils/helpers.js'
import { StorageNode } from './storage-node.js'
import type { ConfigMap, ConfigObject, ConfigValue, StoredValue } from './types.js'

/** Anything with ordered `[key, value]` entries that the tree treats as a nested level */
export type MappingSource = ConfigMap | ConfigObject | StorageNode

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

/**
 * A plain nested mapping: an ordered Map or a plain object.
 * StorageNodes are not plain mappings; they are already wrapped.
 */
export function isPlainMapping(value: unknown): value is ConfigMap | ConfigObject {
  return value instanceof Map || isConfigObject(value)
}

export function isConfigObject(value: unknown): value is ConfigObject {
  return isPlainObject(value)
}

export function isMappingSource(value: unknown): value is MappingSource {
  return value instanceof StorageNode || isPlainMapping(value)
}

/**
 * Whether `value` may be stored in the tree: scalars, arrays of storable
 * values, Maps, plain objects and nodes. Rejects undefined, functions,
 * class instances and non-finite numbers.
 */
export function isStoredValue(value: unknown): value is StoredValue {
  if (value === null) return true
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true
    case 'number':
      return Number.isFinite(value)
    case 'object':
      break
    default:
      return false
  }
  if (value instanceof StorageNode) return true
  if (Array.isArray(value)) return value.every((entry) => isStoredValue(entry))
  if (value instanceof Map) {
    return [...value.entries()].every(([key, entry]) => typeof key === 'string' && isStoredValue(entry))
  }
  return isPlainObject(value) && Object.values(value).every((entry) => isStoredValue(entry))
}

/**
 * Value under `key` in any mapping source, without auto-vivifying it.
 */
export function lookupKey(source: MappingSource, key: string): StoredValue | undefined {
  if (source instanceof StorageNode) return source.peek(key)
  if (source instanceof Map) return source.get(key)
  return Object.hasOwn(source, key) ? source[key] : undefined
}

/**
 * Ordered entries of any mapping source.
 */
export function mappingEntries(source: MappingSource): Array<[string, StoredValue]> {
  if (source instanceof StorageNode) return source.items()
  if (source instanceof Map) return [...source.entries()]
  return Object.entries(source)
}

/**
 * Ordered Map copy of plain parsed data (e.g. JSON or YAML output).
 * Nested objects become nested Maps; arrays are kept as leaf values.
 */
export function toOrderedMap(source: ConfigObject): ConfigMap {
  const result: ConfigMap = new Map()
  for (const [key, value] of Object.entries(source)) {
    result.set(key, isConfigObject(value) ? toOrderedMap(value) : value)
  }
  return result
}

// ---------------------------------------------------------------------------
// Export
// ---------------------------------------------------------------------------

/**
 * Convert a stored value into plain JSON-compatible data.
 * Maps and StorageNodes become plain objects; arrays are converted element-wise.
 */
export function toPlain(value: StoredValue): ConfigValue {
  if (isMappingSource(value)) {
    const result: ConfigObject = {}
    for (const [key, entry] of mappingEntries(value)) {
      result[key] = toPlain(entry)
    }
    return result
  }
  if (Array.isArray(value)) return value.map((entry) => toPlain(entry))
  return value
}

// ---------------------------------------------------------------------------
// Structural equality
// ---------------------------------------------------------------------------

/**
 * Structural equality between stored values. Mappings compare by key set and
 * per-key equality (key order is ignored); arrays compare element-wise.
 */
export function structurallyEqual(left: unknown, right: unknown): boolean {
  if (Object.is(left, right)) return true

  if (isMappingSource(left) && isMappingSource(right)) {
    const leftEntries = mappingEntries(left)
    const rightEntries = new Map(mappingEntries(right))
    if (leftEntries.length !== rightEntries.size) return false
    return leftEntries.every(
      ([key, value]) => rightEntries.has(key) && structurallyEqual(value, rightEntries.get(key)),
    )
  }

  if (Array.isArray(left) && Array.isArray(right)) {
    return left.length === right.length && left.every((value, i) => structurallyEqual(value, right[i]))
  }

  return false
}

// ---------------------------------------------------------------------------
// Textual representation
// ---------------------------------------------------------------------------

/**
 * Render a mapping as an ordered list of `(key, value)` pairs.
 * A mapping already being rendered higher up the stack prints as `[...]`.
 */
export function renderPairs(source: MappingSource, seen: Set<unknown> = new Set()): string {
  if (seen.has(source)) return '[...]'
  seen.add(source)
  const pairs = mappingEntries(source).map(
    ([key, value]) => `(${JSON.stringify(key)}, ${renderValue(value, seen)})`,
  )
  seen.delete(source)
  return `[${pairs.join(', ')}]`
}

function renderValue(value: StoredValue, seen: Set<unknown>): string {
  if (isMappingSource(value)) return renderPairs(value, seen)
  if (Array.isArray(value)) return `[${value.map((entry) => renderValue(entry, seen)).join(', ')}]`
  return JSON.stringify(value)
}
