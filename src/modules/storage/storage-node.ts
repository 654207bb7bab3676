/**
 * StorageNode: recursive view over one level of the backing document.
 *
 * A node never owns its data. The root node wraps the OrderedDocument; every
 * other node wraps an ordered Map that lives inside its parent's backing and
 * holds a cursor (parent node + key) used only to push writes upward.
 *
 *  - get() auto-vivifies absent keys and wraps plain nested mappings in a
 *    fresh node around an ordered copy (node identity is not stable across
 *    reads, backing values are).
 *  - set() writes locally, then re-writes each ancestor's value up to the root
 *    document, whose autowrite policy persists the change.
 *  - Keys are single segments; dotted paths are resolved by ConfigStore.
 */

import { ReadOnlyViolationError } from '../../core/errors.js'
import type { OrderedDocument } from '../document/ordered-document.js'
import {
  isPlainMapping,
  mappingEntries,
  renderPairs,
  structurallyEqual,
  toPlain,
  type MappingSource,
} from './mapping-utils.js'
import type { ConfigMap, ConfigObject, NodeValue, OrderedMapping, StoredValue } from './types.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface StorageNodeOptions {
  /** Mapping this node reads and writes. Defaults to a new empty Map. */
  backing?: OrderedMapping
  /** Owning node; writes are propagated into it under `parentKey` */
  parent?: StorageNode
  parentKey?: string
  /** Reject changes to keys that already exist */
  readonly?: boolean
  /** Root document, whose autowrite is suspended while nested levels are copied */
  document?: OrderedDocument
}

// ---------------------------------------------------------------------------
// StorageNode
// ---------------------------------------------------------------------------

export class StorageNode implements Iterable<string> {
  readonly readonly: boolean
  private readonly _backing: OrderedMapping
  private readonly _parent: StorageNode | null
  private readonly _parentKey: string
  private readonly _document: OrderedDocument | null

  constructor(options: StorageNodeOptions = {}) {
    this._backing = options.backing ?? new Map<string, StoredValue>()
    this._parent = options.parent ?? null
    this._parentKey = options.parentKey ?? ''
    this.readonly = options.readonly ?? false
    this._document = options.document ?? null
  }

  /** Key under which this node is stored in its parent ('' for the root) */
  get parentKey(): string {
    return this._parentKey
  }

  /**
   * Read a single key.
   *
   * Absent keys materialize as a new empty child node stored under `key`.
   * Plain nested mappings are copied into a fresh child node and the copy is
   * written back in their place.
   */
  get(key: string): NodeValue {
    const current = this._backing.get(key)

    if (current === undefined) {
      const child = this._createChild(key, new Map())
      this._backing.set(key, child)
      return child
    }

    if (isPlainMapping(current)) {
      return this._materialize(key, current)
    }

    return current
  }

  /**
   * Write a single key and propagate the new shape to every ancestor.
   * @throws {ReadOnlyViolationError} when read-only and `key` already exists
   */
  set(key: string, value: StoredValue): void {
    if (this.readonly && this._backing.has(key)) {
      throw new ReadOnlyViolationError(key, { parentKey: this._parentKey })
    }
    this._assign(key, value)
  }

  /**
   * Remove a key in place. Absent keys are ignored; the parent is not
   * re-written, so a nested delete is persisted by the next write.
   * Read-only nodes only guard overwrites, so deletes always go through.
   */
  delete(key: string): void {
    if (!this._backing.has(key)) return
    this._backing.delete(key)
  }

  /**
   * Look at a key without auto-vivifying or copying it.
   */
  peek(key: string): StoredValue | undefined {
    return this._backing.get(key)
  }

  contains(key: string): boolean {
    return this._backing.has(key)
  }

  keys(): string[] {
    return [...this._backing.keys()]
  }

  items(): Array<[string, StoredValue]> {
    return [...this._backing.entries()]
  }

  get length(): number {
    return this._backing.size
  }

  [Symbol.iterator](): Iterator<string> {
    return this.keys()[Symbol.iterator]()
  }

  /**
   * Structural comparison of this node's backing with another value
   * (Map, plain object or node). Key order is ignored.
   */
  equals(other: unknown): boolean {
    return structurallyEqual(this, other)
  }

  /** Ordered `(key, value)` pair list; guarded against cyclic values */
  toString(): string {
    return renderPairs(this)
  }

  toJSON(): ConfigObject {
    const result: ConfigObject = {}
    for (const [key, value] of this._backing.entries()) {
      result[key] = toPlain(value)
    }
    return result
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  private _createChild(key: string, backing: ConfigMap): StorageNode {
    return new StorageNode({
      backing,
      parent: this,
      parentKey: key,
      readonly: this.readonly,
      document: this._document ?? undefined,
    })
  }

  /**
   * Wrap a plain nested mapping in a fresh node around an ordered copy and
   * assign the copy back under `key`. Autowrite stays off for the duration:
   * the copy is structurally equal, so nothing new reaches disk.
   */
  private _materialize(key: string, mapping: MappingSource): StorageNode {
    const copy: ConfigMap = new Map(mappingEntries(mapping))
    const child = this._createChild(key, copy)
    const resume = this._suspendAutowrite()
    try {
      this._assign(key, copy)
    } finally {
      resume()
    }
    return child
  }

  /** Local write plus upward propagation; never subject to the read-only check */
  private _assign(key: string, value: StoredValue): void {
    this._backing.set(key, value)
    if (this._parent !== null) {
      this._parent._assign(this._parentKey, this._backingAsValue())
    }
  }

  private _backingAsValue(): StoredValue {
    // Only the root wraps a document; every child node is created around a Map
    return this._backing instanceof Map ? this._backing : new Map(this._backing.entries())
  }

  private _suspendAutowrite(): () => void {
    const document = this._document
    if (document === null || !document.autowrite) {
      return () => undefined
    }
    document.autowrite = false
    return () => {
      document.autowrite = true
    }
  }
}
