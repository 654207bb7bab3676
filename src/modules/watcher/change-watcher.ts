/**
 * ChangeWatcher interface: the file-watching collaborator consumed by ConfigStore.
 *
 * A watcher follows a single file and reports what happened to it. Two
 * interchangeable backends exist; see fs-watch-backend.ts and
 * fs-watchfile-backend.ts.
 */

/** What happened to the watched file, from the store's point of view */
export type FileChangeKind = 'modified' | 'created' | 'moved-or-deleted'

/** Available backends, primary first */
export const WATCHER_BACKENDS = ['fs-watch', 'fs-watchfile'] as const

export type WatcherBackend = (typeof WATCHER_BACKENDS)[number]

export interface ChangeWatcherOptions {
  /** Absolute path of the file to watch */
  filePath: string
  /** Called for every (debounced) change notification */
  onChange: (kind: FileChangeKind) => void
  /** Called when the underlying watcher reports an error */
  onError: (err: Error) => void
  /** Debounce delay for event-based backends in milliseconds (default: 50) */
  debounceMs?: number
  /** Poll interval for polling backends in milliseconds (default: 500) */
  intervalMs?: number
}

export interface ChangeWatcher {
  readonly backend: WatcherBackend
  readonly filePath: string

  /** Whether a watch is currently registered */
  readonly attached: boolean

  /**
   * Register the watch.
   * @returns false when the target cannot be watched yet (e.g. it does not exist)
   * @throws {WatcherBackendUnavailableError} when the backend cannot run here
   */
  attach(): boolean

  /** Unregister the watch and cancel pending notifications. Idempotent. */
  detach(): void
}
