import { toOrderedMap } from '../storage/mapping-utils.js'
import type { ConfigObject } from '../storage/types.js'
import { BaseDocument } from './base-document.js'

/**
 * Document with no persisted form. Used when a store is created without a
 * file; read() and write() leave the contents untouched.
 */
export class MemoryDocument extends BaseDocument {
  readonly documentPath = undefined

  constructor(initial: ConfigObject = {}, autowrite = false) {
    super(autowrite)
    this._entries = toOrderedMap(initial)
  }

  read(): void {}

  write(): void {}
}
