/**
 * BaseDocument: in-memory ordered mapping with the autowrite policy shared by
 * every OrderedDocument implementation. Subclasses decide what read() and
 * write() do.
 */

import { toPlain } from '../storage/mapping-utils.js'
import type { ConfigMap, ConfigObject, StoredValue } from '../storage/types.js'
import type { OrderedDocument } from './ordered-document.js'

export abstract class BaseDocument implements OrderedDocument {
  abstract readonly documentPath: string | undefined
  autowrite: boolean
  protected _entries: ConfigMap = new Map()

  constructor(autowrite: boolean) {
    this.autowrite = autowrite
  }

  abstract read(): void
  abstract write(): void

  get(key: string): StoredValue | undefined {
    return this._entries.get(key)
  }

  set(key: string, value: StoredValue): this {
    this._entries.set(key, value)
    if (this.autowrite) this.write()
    return this
  }

  has(key: string): boolean {
    return this._entries.has(key)
  }

  delete(key: string): boolean {
    const removed = this._entries.delete(key)
    if (removed && this.autowrite) this.write()
    return removed
  }

  keys(): IterableIterator<string> {
    return this._entries.keys()
  }

  entries(): IterableIterator<[string, StoredValue]> {
    return this._entries.entries()
  }

  get size(): number {
    return this._entries.size
  }

  /** Plain-object snapshot, as serializers write it */
  toJSON(): ConfigObject {
    const result: ConfigObject = {}
    for (const [key, value] of this._entries) {
      result[key] = toPlain(value)
    }
    return result
  }
}
