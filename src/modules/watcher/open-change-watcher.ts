/**
 * Backend selection for ChangeWatcher.
 *
 * The requested backend is tried first. When the primary backend ('fs-watch')
 * is unavailable the secondary ('fs-watchfile') is tried instead. When no
 * candidate can run, null is returned and the caller proceeds without live
 * reload.
 */

import { WatcherBackendUnavailableError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import type { ChangeWatcher, ChangeWatcherOptions, WatcherBackend } from './change-watcher.js'
import { createFsWatchBackend } from './fs-watch-backend.js'
import { createFsWatchFileBackend } from './fs-watchfile-backend.js'

const logger = createLogger('watcher')

export interface OpenedWatcher {
  watcher: ChangeWatcher
  /** Whether attach() succeeded on open */
  attached: boolean
}

const BACKEND_FACTORIES: Record<WatcherBackend, (options: ChangeWatcherOptions) => ChangeWatcher> = {
  'fs-watch': createFsWatchBackend,
  'fs-watchfile': createFsWatchFileBackend,
}

function candidatesFor(preferred: WatcherBackend): WatcherBackend[] {
  return preferred === 'fs-watch' ? ['fs-watch', 'fs-watchfile'] : [preferred]
}

/**
 * Create the watcher for `options.filePath` and attach it.
 */
export function openChangeWatcher(
  preferred: WatcherBackend,
  options: ChangeWatcherOptions,
): OpenedWatcher | null {
  for (const backend of candidatesFor(preferred)) {
    const watcher = BACKEND_FACTORIES[backend](options)
    try {
      const attached = watcher.attach()
      if (backend !== preferred) {
        logger.warn({ backend, preferred, filePath: options.filePath }, 'Using fallback watcher backend')
      }
      return { watcher, attached }
    } catch (err) {
      if (!(err instanceof WatcherBackendUnavailableError)) throw err
      logger.warn({ err, backend, filePath: options.filePath }, 'Watcher backend unavailable')
    }
  }

  logger.warn({ filePath: options.filePath }, 'No watcher backend available, live reload disabled')
  return null
}
