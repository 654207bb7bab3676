/**
 * Barrel exports for the storage module.
 */

export { StorageNode } from './storage-node.js'
export type { StorageNodeOptions } from './storage-node.js'
export {
  isPlainMapping,
  isConfigObject,
  isMappingSource,
  isStoredValue,
  lookupKey,
  mappingEntries,
  toOrderedMap,
  toPlain,
  structurallyEqual,
  renderPairs,
} from './mapping-utils.js'
export type { MappingSource } from './mapping-utils.js'
export type {
  ConfigScalar,
  ConfigObject,
  ConfigMap,
  ConfigValue,
  StoredValue,
  NodeValue,
  OrderedMapping,
} from './types.js'
