/**
 * ConfigStore interface: public contract of the hierarchical configuration store.
 *
 * All callers should depend on this interface, not the concrete implementation.
 * Create an instance via `createConfigStore()` from config-store-impl.ts.
 */

import type { StoreError } from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { WatchState } from '../../core/event-bus.types.js'
import type { DocumentFactory } from '../document/ordered-document.js'
import type { ConfigObject, StoredValue } from '../storage/types.js'
import type { FileChangeKind, WatcherBackend } from '../watcher/change-watcher.js'
import type { AttributeView } from './attribute-view.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ConfigStoreOptions {
  /** Backing file. Required unless `fileRequired` is false. */
  documentPath?: string
  /** Persist on every mutation (default: true) */
  autowrite?: boolean
  /** Reject changes to keys that already exist (default: false) */
  readonly?: boolean
  /**
   * Whether a backing file is mandatory (default: true). When false and no
   * path is given, the document factory alone decides about persistence.
   */
  fileRequired?: boolean
  /** Reload on external changes to the backing file (default: true) */
  watch?: boolean
  /** Preferred watcher backend (default: 'fs-watch', falling back to 'fs-watchfile') */
  watcherBackend?: WatcherBackend
  /** Cool-down before the watch re-arms after a reload (default: 1000) */
  rearmDelayMs?: number
  /** Debounce for event-based watcher backends (default: 50) */
  debounceMs?: number
  /** Called after the document was reloaded because of an external change */
  onChange?: () => void
  /** Called for change-channel failures (missing file, failed reload, watcher errors) */
  onError?: (err: StoreError) => void
  /** Pluggable backing document; defaults to JSON/YAML by file extension, or in-memory */
  documentFactory?: DocumentFactory
}

// ---------------------------------------------------------------------------
// ConfigStore interface
// ---------------------------------------------------------------------------

export interface ConfigStore extends Iterable<string> {
  readonly documentPath: string | undefined
  readonly autowrite: boolean
  readonly readonly: boolean

  /** Current lifecycle state of the external-change watch */
  readonly watchState: WatchState

  /** Backend in use, or null when running without live reload */
  readonly watcherBackend: WatcherBackend | null

  /** Change channel: `store:reloaded`, `store:error`, `store:watch-state` */
  readonly events: TypedEventBus

  /** Number of top-level keys */
  readonly length: number

  /**
   * Read a value by dot-notation path (e.g. "db.host").
   * Unset segments materialize as empty nodes; a path that runs into a
   * scalar before its last segment yields undefined.
   */
  get(path: string): StoredValue | undefined

  /**
   * Write a value by dot-notation path, creating intermediate levels and
   * keeping their existing siblings.
   * @throws {ReadOnlyViolationError} if read-only and the target key exists,
   * or, for a dotted path, its first segment exists
   */
  set(path: string, value: StoredValue): void

  /**
   * Remove a top-level key. `path` is used verbatim; dots are not resolved.
   * Allowed on read-only stores.
   */
  delete(path: string): void

  /** Whether every segment of a dot-notation path exists. Never creates anything. */
  contains(path: string): boolean

  keys(): string[]
  items(): Array<[string, StoredValue]>

  /** Persist the backing document regardless of `autowrite` */
  write(): void

  /** Re-read the backing document now */
  reload(): void

  /** Structural comparison of the whole tree with another value or store */
  equals(other: unknown): boolean

  toJSON(): ConfigObject

  /** Attribute-style access: `view.db.host`, `view.db = {...}` */
  attributes(): AttributeView

  /**
   * Entry point for watcher notifications. Dropped unless the watch is armed.
   */
  handleFileChange(kind: FileChangeKind): void

  /** Stop watching and cancel any pending re-arm. Idempotent. */
  close(): void
}
