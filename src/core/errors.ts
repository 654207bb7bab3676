/**
 * Error definitions for treeconf
 * Provides the structured error hierarchy surfaced by the store and its collaborators
 */

/** Base error class for all store errors */
export class StoreError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'StoreError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StoreError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Error thrown when a read-only store is asked to change an existing key */
export class ReadOnlyViolationError extends StoreError {
  constructor(key: string, context: Record<string, unknown> = {}) {
    super(`The storage is read only: cannot modify existing key "${key}"`, 'READ_ONLY_VIOLATION', {
      key,
      ...context,
    })
    this.name = 'ReadOnlyViolationError'
  }
}

/** Reported when the watched file is moved away or deleted while the watch is armed */
export class WatchedFileMissingError extends StoreError {
  constructor(filePath: string) {
    super(`Watched file no longer exists: ${filePath}`, 'WATCHED_FILE_MISSING', {
      filePath,
    })
    this.name = 'WatchedFileMissingError'
  }
}

/** Raised by a watcher backend that cannot run in this environment */
export class WatcherBackendUnavailableError extends StoreError {
  constructor(backend: string, reason: string, context: Record<string, unknown> = {}) {
    super(`Watcher backend "${backend}" is unavailable: ${reason}`, 'WATCHER_BACKEND_UNAVAILABLE', {
      backend,
      ...context,
    })
    this.name = 'WatcherBackendUnavailableError'
  }
}

/** Reported when an attached watcher fails after it was registered */
export class WatcherError extends StoreError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'WATCHER_ERROR', context)
    this.name = 'WatcherError'
  }
}

/** Error thrown when a backing document cannot be read, parsed or written */
export class DocumentError extends StoreError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'DOCUMENT_ERROR', context)
    this.name = 'DocumentError'
  }
}

/** Error thrown when store configuration is invalid or missing */
export class ConfigError extends StoreError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err))
}
