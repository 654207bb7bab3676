/**
 * Barrel exports for the document module, plus the default document factory.
 */

import { extname } from 'node:path'
import { JsonDocument } from './json-document.js'
import { MemoryDocument } from './memory-document.js'
import type { DocumentInit, OrderedDocument } from './ordered-document.js'
import { YamlDocument } from './yaml-document.js'

export type { OrderedDocument, DocumentInit, DocumentFactory } from './ordered-document.js'
export { BaseDocument } from './base-document.js'
export { FileDocument } from './file-document.js'
export { JsonDocument } from './json-document.js'
export { YamlDocument } from './yaml-document.js'
export { MemoryDocument } from './memory-document.js'
export { ConfigValueSchema, DocumentRootSchema } from './document-schema.js'

/**
 * Open a file document, choosing the format from the file extension
 * (`.yaml`/`.yml` → YAML, anything else → JSON).
 */
export function openFileDocument(documentPath: string, autowrite = true): OrderedDocument {
  const ext = extname(documentPath).toLowerCase()
  if (ext === '.yaml' || ext === '.yml') {
    return new YamlDocument(documentPath, autowrite)
  }
  return new JsonDocument(documentPath, autowrite)
}

/**
 * Default factory: a file document when a path is configured, otherwise an
 * in-memory document.
 */
export function defaultDocumentFactory(init: DocumentInit): OrderedDocument {
  if (init.documentPath === undefined) {
    return new MemoryDocument({}, init.autowrite)
  }
  return openFileDocument(init.documentPath, init.autowrite)
}
