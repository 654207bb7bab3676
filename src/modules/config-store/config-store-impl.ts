/**
 * ConfigStore implementation: dotted-path façade over a StorageNode tree,
 * plus the lifecycle of the external-change watch.
 *
 * Watch states:
 *   unarmed    no watch attached (file/directory missing, lost, or closed)
 *   armed      notifications trigger a reload
 *   suppressed a get/set/delete is running; notifications are dropped
 *   reloading  the document is being re-read; re-arms after a cool-down
 *
 * Dropped notifications are not queued: the next real change reloads.
 */

import { resolve } from 'node:path'
import type { Logger } from 'pino'
import {
  ConfigError,
  DocumentError,
  ReadOnlyViolationError,
  StoreError,
  WatchedFileMissingError,
  WatcherError,
  toError,
} from '../../core/errors.js'
import { createEventBus, type TypedEventBus } from '../../core/event-bus.js'
import type { WatchState } from '../../core/event-bus.types.js'
import { childLogger, createLogger } from '../../utils/logger.js'
import { defaultDocumentFactory } from '../document/index.js'
import type { OrderedDocument } from '../document/ordered-document.js'
import { isMappingSource, lookupKey, structurallyEqual } from '../storage/mapping-utils.js'
import { StorageNode } from '../storage/storage-node.js'
import type { ConfigObject, StoredValue } from '../storage/types.js'
import type { ChangeWatcher, FileChangeKind, WatcherBackend } from '../watcher/change-watcher.js'
import { openChangeWatcher } from '../watcher/open-change-watcher.js'
import { createAttributeView, type AttributeView } from './attribute-view.js'
import { ConfigStoreOptionsSchema } from './config-store-options.js'
import type { ConfigStore, ConfigStoreOptions } from './config-store.js'

const logger = createLogger('config-store')

// ---------------------------------------------------------------------------
// Dot-notation helpers
// ---------------------------------------------------------------------------

/**
 * Split a dot-notation path into its segments. Always yields at least one
 * segment; empty segments are kept as empty-string keys.
 */
export function splitPath(path: string): [string, ...string[]] {
  const [head = '', ...rest] = path.split('.')
  return [head, ...rest]
}

// ---------------------------------------------------------------------------
// ConfigStoreImpl
// ---------------------------------------------------------------------------

export class ConfigStoreImpl implements ConfigStore {
  readonly documentPath: string | undefined
  readonly autowrite: boolean
  readonly readonly: boolean
  readonly events: TypedEventBus

  private readonly _document: OrderedDocument
  private readonly _root: StorageNode
  private readonly _rearmDelayMs: number
  private readonly _onChange: (() => void) | null
  private readonly _onError: ((err: StoreError) => void) | null
  private readonly _log: Logger
  private _watcher: ChangeWatcher | null = null
  private _state: WatchState = 'unarmed'
  private _rearmTimer: ReturnType<typeof setTimeout> | null = null
  private _closed = false

  constructor(options: ConfigStoreOptions = {}) {
    const parsed = ConfigStoreOptionsSchema.safeParse(options)
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `  • ${issue.path.join('.') || '(options)'}: ${issue.message}`)
        .join('\n')
      throw new ConfigError(`Invalid store options:\n${issues}`, { issues: parsed.error.issues })
    }
    const settings = parsed.data

    this.documentPath = settings.documentPath !== undefined ? resolve(settings.documentPath) : undefined
    this.autowrite = settings.autowrite
    this.readonly = settings.readonly
    this.events = createEventBus()
    this._log = childLogger(logger, { documentPath: this.documentPath })
    this._rearmDelayMs = settings.rearmDelayMs
    this._onChange = options.onChange ?? null
    this._onError = options.onError ?? null

    const documentFactory = options.documentFactory ?? defaultDocumentFactory
    this._document = documentFactory({ documentPath: this.documentPath, autowrite: this.autowrite })
    this._root = new StorageNode({
      backing: this._document,
      readonly: this.readonly,
      document: this._document,
    })

    if (this.documentPath !== undefined && settings.watch) {
      this._openWatcher(this.documentPath, settings.watcherBackend, settings.debounceMs)
    }

    this._log.debug({ readonly: this.readonly, watchState: this._state }, 'Config store opened')
  }

  get watchState(): WatchState {
    return this._state
  }

  get watcherBackend(): WatcherBackend | null {
    return this._watcher?.backend ?? null
  }

  get length(): number {
    return this._root.length
  }

  // -------------------------------------------------------------------------
  // Dotted-path access
  // -------------------------------------------------------------------------

  get(path: string): StoredValue | undefined {
    return this._withSuppressed(() => {
      let current: StoredValue = this._root
      for (const segment of splitPath(path)) {
        if (!(current instanceof StorageNode)) return undefined
        current = current.get(segment)
      }
      return current
    })
  }

  set(path: string, value: StoredValue): void {
    this._withSuppressed(() => {
      const segments = splitPath(path)
      const [head] = segments
      // A dotted write replaces the whole top-level entry
      if (this.readonly && segments.length > 1 && this._root.contains(head)) {
        throw new ReadOnlyViolationError(head, { parentKey: '', path })
      }

      const leaf = segments[segments.length - 1] ?? ''
      let node = this._root

      for (const segment of segments.slice(0, -1)) {
        let next = node.get(segment)
        if (!(next instanceof StorageNode)) {
          // A scalar is in the way: replace it with a fresh nested level
          node.set(segment, new Map())
          next = node.get(segment)
        }
        if (!(next instanceof StorageNode)) {
          throw new StoreError(`Cannot descend into "${segment}" of "${path}"`, 'PATH_TRAVERSAL', { path })
        }
        node = next
      }

      node.set(leaf, value)
    })

    this._retryAttach()
  }

  delete(path: string): void {
    this._withSuppressed(() => {
      this._root.delete(path)
    })
  }

  contains(path: string): boolean {
    let current: StoredValue | undefined = this._root
    for (const segment of splitPath(path)) {
      if (!isMappingSource(current)) return false
      current = lookupKey(current, segment)
      if (current === undefined) return false
    }
    return true
  }

  keys(): string[] {
    return this._root.keys()
  }

  items(): Array<[string, StoredValue]> {
    return this._root.items()
  }

  [Symbol.iterator](): Iterator<string> {
    return this._root[Symbol.iterator]()
  }

  write(): void {
    this._withSuppressed(() => {
      this._document.write()
    })
  }

  reload(): void {
    this._withSuppressed(() => {
      this._document.read()
    })
    this._log.info('Config store reloaded on request')
  }

  equals(other: unknown): boolean {
    return structurallyEqual(this._root, other instanceof ConfigStoreImpl ? other._root : other)
  }

  toJSON(): ConfigObject {
    return this._root.toJSON()
  }

  toString(): string {
    return `ConfigStore(${this._root.toString()})`
  }

  attributes(): AttributeView {
    return createAttributeView(this._root, (access) => this._withSuppressed(access))
  }

  // -------------------------------------------------------------------------
  // External-change handling
  // -------------------------------------------------------------------------

  handleFileChange(kind: FileChangeKind): void {
    if (this._state !== 'armed') {
      this._log.debug({ kind, watchState: this._state }, 'Change notification dropped')
      return
    }

    if (kind === 'moved-or-deleted') {
      this._detachWatcher()
      this._report(new WatchedFileMissingError(this.documentPath ?? ''))
      return
    }

    if (this._document.hasExternalChanges?.() === false) {
      this._log.debug({ kind }, 'Change notification matches last write, ignored')
      return
    }

    this._setState('reloading')
    try {
      this._reloadFromDisk(kind)
    } finally {
      this._scheduleRearm()
    }
  }

  close(): void {
    if (this._closed) return
    this._closed = true
    this._cancelRearm()
    this._detachWatcher()
    this._watcher = null
    this._log.debug('Config store closed')
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  /**
   * Run an internal access with notifications suppressed. The state found on
   * entry is restored on every exit path, so nested accesses (e.g. a get()
   * inside onChange during a reload) leave the outer state alone.
   */
  private _withSuppressed<T>(access: () => T): T {
    const entered = this._state === 'armed'
    if (entered) this._setState('suppressed')
    try {
      return access()
    } finally {
      if (entered && this._state === 'suppressed') this._setState('armed')
    }
  }

  private _setState(next: WatchState): void {
    const previous = this._state
    if (previous === next) return
    this._state = next
    this._log.trace({ from: previous, to: next }, 'Watch state changed')
    this.events.emit('store:watch-state', { from: previous, to: next })
  }

  private _openWatcher(filePath: string, backend: WatcherBackend, debounceMs: number): void {
    const opened = openChangeWatcher(backend, {
      filePath,
      debounceMs,
      onChange: (kind) => {
        this.handleFileChange(kind)
      },
      onError: (err) => {
        this._detachWatcher()
        this._report(new WatcherError(`File watcher failed: ${err.message}`, { documentPath: filePath }))
      },
    })
    if (opened === null) return

    this._watcher = opened.watcher
    if (opened.attached) this._setState('armed')
  }

  /** A watcher that could not attach earlier (file or directory missing) is tried again */
  private _retryAttach(): void {
    const watcher = this._watcher
    if (this._closed || watcher === null || watcher.attached) return

    try {
      if (watcher.attach()) {
        this._log.info('Watch attached after write')
        this._setState('armed')
      }
    } catch (err) {
      this._log.warn({ err }, 'Watcher backend became unavailable, live reload disabled')
      this._watcher = null
    }
  }

  private _detachWatcher(): void {
    this._watcher?.detach()
    this._setState('unarmed')
  }

  private _reloadFromDisk(kind: FileChangeKind): void {
    try {
      this._document.read()
    } catch (err) {
      this._report(
        err instanceof StoreError
          ? err
          : new DocumentError(`Reload failed: ${toError(err).message}`, { documentPath: this.documentPath }),
      )
      return
    }
    this._log.info({ kind }, 'Config reloaded after external change')

    if (this._onChange !== null) {
      try {
        this._onChange()
      } catch (err) {
        this._report(
          new StoreError(`onChange callback failed: ${toError(err).message}`, 'ON_CHANGE_FAILED', {
            documentPath: this.documentPath,
          }),
        )
      }
    }
    this.events.emit('store:reloaded', { documentPath: this.documentPath })
  }

  private _scheduleRearm(): void {
    this._cancelRearm()
    if (this._closed) return
    this._rearmTimer = setTimeout(() => {
      this._rearmTimer = null
      if (this._state === 'reloading') this._setState('armed')
    }, this._rearmDelayMs)
    this._rearmTimer.unref()
  }

  private _cancelRearm(): void {
    if (this._rearmTimer !== null) {
      clearTimeout(this._rearmTimer)
      this._rearmTimer = null
    }
  }

  private _report(error: StoreError): void {
    this._log.error({ err: error }, error.message)
    if (this._onError !== null) {
      try {
        this._onError(error)
      } catch (err) {
        this._log.error({ err, reported: error.code }, 'onError callback failed')
      }
    }
    this.events.emit('store:error', { error })
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new ConfigStore instance.
 *
 * @example
 * const store = createConfigStore({ documentPath: './settings.json' })
 * store.set('db.host', 'localhost')
 * store.get('db.host') // 'localhost'
 */
export function createConfigStore(options: ConfigStoreOptions = {}): ConfigStore {
  return new ConfigStoreImpl(options)
}
