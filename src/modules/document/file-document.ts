/**
 * FileDocument: an OrderedDocument persisted to a single file.
 *
 * File access is synchronous: the storage tree reads and writes inside plain
 * get/set calls. A missing file reads as an empty document; parent
 * directories are created on first write.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs'
import { dirname, resolve } from 'node:path'
import { DocumentError, toError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { toOrderedMap } from '../storage/mapping-utils.js'
import type { ConfigMap, ConfigObject } from '../storage/types.js'
import { BaseDocument } from './base-document.js'
import { DocumentRootSchema } from './document-schema.js'

const logger = createLogger('document')

export abstract class FileDocument extends BaseDocument {
  readonly documentPath: string
  /** Raw text last read from or written to disk; null when the file did not exist */
  private _lastSynced: string | null = null

  /** Human-readable format name used in error messages */
  protected abstract readonly format: string

  constructor(documentPath: string, autowrite = true) {
    super(autowrite)
    this.documentPath = resolve(documentPath)
  }

  /** Parse raw file text into plain data */
  protected abstract parse(raw: string): unknown

  /** Render the ordered entries as file text */
  protected abstract serialize(entries: ConfigMap): string

  /** Ordered form of validated file data */
  protected toEntries(data: ConfigObject, _raw: string): ConfigMap {
    return toOrderedMap(data)
  }

  read(): void {
    if (!existsSync(this.documentPath)) {
      this._entries = new Map()
      this._lastSynced = null
      return
    }

    const raw = this._readRaw()
    this._entries = this._decode(raw)
    this._lastSynced = raw
    logger.debug({ documentPath: this.documentPath, keys: this._entries.size }, 'Document read')
  }

  write(): void {
    const raw = this.serialize(this._entries)
    try {
      mkdirSync(dirname(this.documentPath), { recursive: true })
      writeFileSync(this.documentPath, raw, 'utf-8')
    } catch (err) {
      throw new DocumentError(
        `Failed to write ${this.format} document at ${this.documentPath}: ${toError(err).message}`,
        { documentPath: this.documentPath },
      )
    }
    this._lastSynced = raw
    logger.debug({ documentPath: this.documentPath }, 'Document written')
  }

  hasExternalChanges(): boolean {
    if (!existsSync(this.documentPath)) return this._lastSynced !== null
    try {
      return readFileSync(this.documentPath, 'utf-8') !== this._lastSynced
    } catch (err) {
      logger.debug({ err, documentPath: this.documentPath }, 'Could not compare document with disk')
      return true
    }
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private _readRaw(): string {
    try {
      return readFileSync(this.documentPath, 'utf-8')
    } catch (err) {
      throw new DocumentError(
        `Failed to read ${this.format} document at ${this.documentPath}: ${toError(err).message}`,
        { documentPath: this.documentPath },
      )
    }
  }

  private _decode(raw: string): ConfigMap {
    if (raw.trim() === '') return new Map()

    let parsed: unknown
    try {
      parsed = this.parse(raw)
    } catch (err) {
      throw new DocumentError(
        `Failed to parse ${this.format} document at ${this.documentPath}: ${toError(err).message}`,
        { documentPath: this.documentPath },
      )
    }
    if (parsed === null || parsed === undefined) return new Map()

    const result = DocumentRootSchema.safeParse(parsed)
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `  • ${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('\n')
      throw new DocumentError(
        `Invalid ${this.format} document at ${this.documentPath}:\n${issues}`,
        { documentPath: this.documentPath, issues: result.error.issues },
      )
    }
    return this.toEntries(result.data, raw)
  }
}
