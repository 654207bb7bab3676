/**
 * Barrel exports for the config-store module.
 */

export { createConfigStore, ConfigStoreImpl, splitPath } from './config-store-impl.js'
export type { ConfigStore, ConfigStoreOptions } from './config-store.js'
export {
  ConfigStoreOptionsSchema,
  DEFAULT_REARM_DELAY_MS,
  DEFAULT_DEBOUNCE_MS,
} from './config-store-options.js'
export { createAttributeView } from './attribute-view.js'
export type { AttributeView, AttributeValue, AccessGuard } from './attribute-view.js'
