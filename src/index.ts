/**
 * treeconf - Main module exports
 * Public API surface for the configuration store
 */

// Core errors
export * from './core/errors.js'

// Change channel
export type { TypedEventBus } from './core/event-bus.js'
export type { StoreEvents, WatchState } from './core/event-bus.types.js'
export { createEventBus } from './core/event-bus.js'

// Utilities
export { createLogger, childLogger, logger } from './utils/logger.js'

// Store
export * from './modules/config-store/index.js'
export * from './modules/storage/index.js'
export * from './modules/document/index.js'
export * from './modules/watcher/index.js'
