/**
 * Barrel exports for the watcher module.
 */

export { WATCHER_BACKENDS } from './change-watcher.js'
export type {
  ChangeWatcher,
  ChangeWatcherOptions,
  FileChangeKind,
  WatcherBackend,
} from './change-watcher.js'
export { createFsWatchBackend } from './fs-watch-backend.js'
export { createFsWatchFileBackend, classifyStatChange } from './fs-watchfile-backend.js'
export { openChangeWatcher } from './open-change-watcher.js'
export type { OpenedWatcher } from './open-change-watcher.js'
