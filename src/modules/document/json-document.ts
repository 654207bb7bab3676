import { toOrderedMap } from '../storage/mapping-utils.js'
import type { ConfigMap, ConfigObject } from '../storage/types.js'
import { FileDocument } from './file-document.js'
import { readOrderedJson, stringifyOrderedJson } from './ordered-json.js'

/**
 * JSON-backed document: 2-space indentation and a trailing newline.
 * Keys keep the order of the file, integer-like ones included.
 * The contents are loaded on construction.
 */
export class JsonDocument extends FileDocument {
  protected readonly format = 'JSON'

  constructor(documentPath: string, autowrite = true) {
    super(documentPath, autowrite)
    this.read()
  }

  protected parse(raw: string): unknown {
    return JSON.parse(raw)
  }

  protected toEntries(data: ConfigObject, raw: string): ConfigMap {
    return readOrderedJson(raw) ?? toOrderedMap(data)
  }

  protected serialize(entries: ConfigMap): string {
    return `${stringifyOrderedJson(entries)}\n`
  }
}
