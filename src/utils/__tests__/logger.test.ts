/**
 * Unit tests for src/utils/logger.ts: pino configuration and redaction.
 */

import { describe, it, expect } from 'vitest'
import { Writable } from 'node:stream'
import pino from 'pino'
import { PINO_REDACT_PATHS, createLogger, childLogger } from '../logger.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Create a synchronous in-memory pino logger that writes JSON to a buffer,
 * configured with the same redaction paths as createLogger().
 */
function createCapturingLogger(name: string): { logger: pino.Logger; getLines: () => string[] } {
  const lines: string[] = []
  const stream = new Writable({
    write(chunk: Buffer, _encoding: string, callback: () => void) {
      lines.push(chunk.toString().trim())
      callback()
    },
  })

  const logger = pino(
    {
      name,
      level: 'trace',
      redact: PINO_REDACT_PATHS,
      formatters: {
        level(label) {
          return { level: label }
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
      base: { pid: process.pid },
    },
    stream,
  )

  return { logger, getLines: () => lines }
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('createLogger', () => {
  it('returns a pino logger instance', () => {
    const logger = createLogger('test-module', { pretty: false })
    expect(typeof logger.info).toBe('function')
    expect(typeof logger.debug).toBe('function')
    expect(typeof logger.warn).toBe('function')
    expect(typeof logger.error).toBe('function')
  })

  it('honors an explicit level', () => {
    const logger = createLogger('test-explicit', { level: 'error', pretty: false })
    expect(logger.level).toBe('error')
  })

  it('uses LOG_LEVEL environment variable to override default log level', () => {
    const original = process.env.LOG_LEVEL
    try {
      process.env.LOG_LEVEL = 'warn'
      const logger = createLogger('test-level', { pretty: false })
      expect(logger.level).toBe('warn')
    } finally {
      if (original === undefined) {
        delete process.env.LOG_LEVEL
      } else {
        process.env.LOG_LEVEL = original
      }
    }
  })

  it('uses info level when NODE_ENV = production', () => {
    const originalEnv = process.env.NODE_ENV
    const originalLevel = process.env.LOG_LEVEL
    try {
      process.env.NODE_ENV = 'production'
      delete process.env.LOG_LEVEL
      const logger = createLogger('test-prod', { pretty: false })
      expect(logger.level).toBe('info')
    } finally {
      process.env.NODE_ENV = originalEnv
      if (originalLevel === undefined) {
        delete process.env.LOG_LEVEL
      } else {
        process.env.LOG_LEVEL = originalLevel
      }
    }
  })

  it('defaults to warn when embedded without NODE_ENV', () => {
    const originalEnv = process.env.NODE_ENV
    const originalLevel = process.env.LOG_LEVEL
    try {
      delete process.env.NODE_ENV
      delete process.env.LOG_LEVEL
      const logger = createLogger('test-embedded', { pretty: false })
      expect(logger.level).toBe('warn')
    } finally {
      if (originalEnv !== undefined) process.env.NODE_ENV = originalEnv
      if (originalLevel !== undefined) process.env.LOG_LEVEL = originalLevel
    }
  })
})

describe('childLogger', () => {
  it('returns a child logger with extra bindings', () => {
    const parent = createLogger('parent-module', { pretty: false })
    const child = childLogger(parent, { documentPath: '/tmp/settings.json' })
    expect(typeof child.info).toBe('function')
    expect(child).not.toBe(parent)
    expect(child.bindings()).toMatchObject({ documentPath: '/tmp/settings.json' })
  })
})

describe('Pino redaction: PINO_REDACT_PATHS', () => {
  it('covers top-level and nested credential fields', () => {
    expect(PINO_REDACT_PATHS).toContain('password')
    expect(PINO_REDACT_PATHS).toContain('*.password')
    expect(PINO_REDACT_PATHS).toContain('token')
    expect(PINO_REDACT_PATHS).toContain('*.apiKey')
  })

  it('redacts a top-level password field', () => {
    const { logger, getLines } = createCapturingLogger('redact-test')

    logger.info({ password: 'test-secret' }, 'test redaction')

    const lines = getLines()
    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({ password: '[Redacted]', msg: 'test redaction' })
  })

  it('redacts one level of nesting', () => {
    const { logger, getLines } = createCapturingLogger('redact-test-2')

    logger.info({ db: { host: 'localhost', token: 'test-token' } }, 'nested')

    expect(JSON.parse(getLines()[0] ?? '{}')).toMatchObject({
      db: { host: 'localhost', token: '[Redacted]' },
    })
  })
})
