/**
 * Secondary watcher backend built on fs.watchFile (stat polling).
 *
 * Polling only works for a file that exists, so attach() reports false until
 * it does. Notifications are derived from consecutive stat results: a zero
 * mtime means the file is gone.
 */

import { existsSync, unwatchFile, watchFile } from 'node:fs'
import type { Stats } from 'node:fs'
import { WatcherBackendUnavailableError, toError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import type { ChangeWatcher, ChangeWatcherOptions, FileChangeKind } from './change-watcher.js'

const logger = createLogger('watcher')

type StatSample = Pick<Stats, 'mtimeMs' | 'size'>

/** Map two consecutive stat results onto a change kind, or null for no change */
export function classifyStatChange(current: StatSample, previous: StatSample): FileChangeKind | null {
  if (current.mtimeMs === 0) {
    return previous.mtimeMs === 0 ? null : 'moved-or-deleted'
  }
  if (previous.mtimeMs === 0) return 'created'
  if (current.mtimeMs !== previous.mtimeMs || current.size !== previous.size) return 'modified'
  return null
}

export function createFsWatchFileBackend(options: ChangeWatcherOptions): ChangeWatcher {
  const { filePath, onChange, intervalMs = 500 } = options
  let attached = false

  const listener = (current: Stats, previous: Stats) => {
    const kind = classifyStatChange(current, previous)
    if (kind !== null) onChange(kind)
  }

  return {
    backend: 'fs-watchfile',
    filePath,

    get attached(): boolean {
      return attached
    },

    attach(): boolean {
      if (attached) return true

      if (!existsSync(filePath)) {
        logger.info({ filePath }, 'Watched file not found, watch not attached')
        return false
      }

      try {
        watchFile(filePath, { persistent: false, interval: intervalMs }, listener)
      } catch (err) {
        throw new WatcherBackendUnavailableError('fs-watchfile', toError(err).message, { filePath })
      }

      attached = true
      logger.debug({ filePath, intervalMs }, 'fs.watchFile attached')
      return true
    },

    detach(): void {
      if (!attached) return
      unwatchFile(filePath, listener)
      attached = false
      logger.debug({ filePath }, 'fs.watchFile detached')
    },
  }
}
