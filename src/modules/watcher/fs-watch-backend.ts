/**
 * Primary watcher backend built on fs.watch.
 *
 * Watches the parent directory rather than the file itself so that editors
 * that replace the file (write-to-temp + rename, or delete + recreate) keep
 * being observed. Events for other entries in the directory are ignored and
 * bursts are debounced into one notification, classified when it fires:
 *
 *   file missing           → 'moved-or-deleted'
 *   a rename event was seen → 'created'
 *   otherwise              → 'modified'
 */

import { existsSync, watch } from 'node:fs'
import type { FSWatcher } from 'node:fs'
import { basename, dirname } from 'node:path'
import { WatcherBackendUnavailableError, toError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import type { ChangeWatcher, ChangeWatcherOptions, FileChangeKind } from './change-watcher.js'

const logger = createLogger('watcher')

export function createFsWatchBackend(options: ChangeWatcherOptions): ChangeWatcher {
  const { filePath, onChange, onError, debounceMs = 50 } = options
  const directory = dirname(filePath)
  const fileName = basename(filePath)

  let watcher: FSWatcher | null = null
  let debounceTimer: ReturnType<typeof setTimeout> | null = null
  let sawRename = false

  const classify = (): FileChangeKind => {
    if (!existsSync(filePath)) return 'moved-or-deleted'
    return sawRename ? 'created' : 'modified'
  }

  const handleEvent = (eventType: string, changed: string | null) => {
    if (changed !== null && changed !== fileName) return
    if (eventType === 'rename') sawRename = true

    if (debounceTimer !== null) {
      clearTimeout(debounceTimer)
    }
    debounceTimer = setTimeout(() => {
      debounceTimer = null
      const kind = classify()
      sawRename = false
      onChange(kind)
    }, debounceMs)
  }

  return {
    backend: 'fs-watch',
    filePath,

    get attached(): boolean {
      return watcher !== null
    },

    attach(): boolean {
      if (watcher !== null) return true

      if (!existsSync(directory)) {
        logger.info({ filePath }, 'Watch directory not found, watch not attached')
        return false
      }

      try {
        watcher = watch(directory, { persistent: false }, handleEvent)
      } catch (err) {
        throw new WatcherBackendUnavailableError('fs-watch', toError(err).message, { filePath })
      }

      watcher.on('error', (err) => {
        logger.error({ err, filePath }, 'File watcher error')
        onError(err)
      })

      logger.debug({ filePath }, 'fs.watch attached')
      return true
    },

    detach(): void {
      if (debounceTimer !== null) {
        clearTimeout(debounceTimer)
        debounceTimer = null
      }
      sawRename = false

      if (watcher !== null) {
        watcher.close()
        watcher = null
        logger.debug({ filePath }, 'fs.watch detached')
      }
    },
  }
}
