/**
 * OrderedDocument interface: the backing-document collaborator consumed by
 * StorageNode and ConfigStore.
 *
 * Implementations keep an ordered key/value mapping in memory and define how
 * (and whether) it is persisted.
 */

import type { OrderedMapping } from '../storage/types.js'

export interface OrderedDocument extends OrderedMapping {
  /** Absolute path of the persisted form, if any */
  readonly documentPath: string | undefined

  /**
   * Persist after every set()/delete(). Toggled off by the storage tree while
   * it copies nested levels.
   */
  autowrite: boolean

  /** Replace the in-memory contents with the persisted form */
  read(): void

  /** Persist the in-memory contents */
  write(): void

  /**
   * Whether the persisted form differs from what this document last read or
   * wrote. Documents that cannot tell omit the method.
   */
  hasExternalChanges?(): boolean
}

/** Construction arguments handed to a pluggable document factory */
export interface DocumentInit {
  documentPath: string | undefined
  autowrite: boolean
}

export type DocumentFactory = (init: DocumentInit) => OrderedDocument
