/**
 * JSON text <-> ordered Maps.
 *
 * Plain objects list integer-like keys first whatever order they were written
 * in, so JSON documents are read and written through Maps instead. Objects
 * nested in arrays stay plain objects, matching toOrderedMap().
 */

import { isMappingSource, mappingEntries, toPlain } from '../storage/mapping-utils.js'
import type { ConfigMap, ConfigScalar, ConfigValue, StoredValue } from '../storage/types.js'

// ---------------------------------------------------------------------------
// Writing
// ---------------------------------------------------------------------------

/**
 * Render a stored value the way `JSON.stringify(value, null, 2)` would, with
 * Map and node entries in insertion order.
 */
export function stringifyOrderedJson(value: StoredValue, depth = 0): string {
  const pad = '  '.repeat(depth + 1)
  const closingPad = '  '.repeat(depth)

  if (Array.isArray(value)) {
    if (value.length === 0) return '[]'
    const lines = value.map((entry) => `${pad}${stringifyOrderedJson(entry, depth + 1)}`)
    return `[\n${lines.join(',\n')}\n${closingPad}]`
  }

  if (isMappingSource(value)) {
    const entries = mappingEntries(value)
    if (entries.length === 0) return '{}'
    const lines = entries.map(
      ([key, entry]) => `${pad}${JSON.stringify(key)}: ${stringifyOrderedJson(entry, depth + 1)}`,
    )
    return `{\n${lines.join(',\n')}\n${closingPad}}`
  }

  return JSON.stringify(value)
}

// ---------------------------------------------------------------------------
// Reading
// ---------------------------------------------------------------------------

const WHITESPACE = new Set([' ', '\t', '\n', '\r'])
const LITERAL = /-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?|true|false|null/y

/**
 * Walks JSON text that JSON.parse has already accepted, building Maps for
 * objects so their key order is the order of the text.
 */
class OrderedJsonReader {
  private _pos = 0

  constructor(private readonly _text: string) {}

  readValue(): ConfigValue {
    this._skipWhitespace()
    switch (this._text[this._pos]) {
      case '{':
        return this._readObject()
      case '[':
        return this._readArray()
      case '"':
        return this._readString()
      default:
        return this._readLiteral()
    }
  }

  private _readObject(): ConfigMap {
    const result: ConfigMap = new Map()
    this._pos++
    this._skipWhitespace()
    if (this._text[this._pos] === '}') {
      this._pos++
      return result
    }
    for (;;) {
      this._skipWhitespace()
      const key = this._readString()
      this._skipWhitespace()
      this._expect(':')
      result.set(key, this.readValue())
      this._skipWhitespace()
      if (this._text[this._pos] === '}') {
        this._pos++
        return result
      }
      this._expect(',')
    }
  }

  private _readArray(): ConfigValue[] {
    const result: ConfigValue[] = []
    this._pos++
    this._skipWhitespace()
    if (this._text[this._pos] === ']') {
      this._pos++
      return result
    }
    for (;;) {
      const entry = this.readValue()
      result.push(entry instanceof Map ? toPlain(entry) : entry)
      this._skipWhitespace()
      if (this._text[this._pos] === ']') {
        this._pos++
        return result
      }
      this._expect(',')
    }
  }

  private _readString(): string {
    const start = this._pos
    this._expect('"')
    while (this._pos < this._text.length && this._text[this._pos] !== '"') {
      this._pos += this._text[this._pos] === '\\' ? 2 : 1
    }
    this._expect('"')
    const value: unknown = JSON.parse(this._text.slice(start, this._pos))
    if (typeof value !== 'string') throw this._unexpected()
    return value
  }

  private _readLiteral(): ConfigScalar {
    LITERAL.lastIndex = this._pos
    const token = LITERAL.exec(this._text)?.[0]
    if (token === undefined) throw this._unexpected()
    this._pos += token.length
    const value: unknown = JSON.parse(token)
    if (value === null || typeof value === 'number' || typeof value === 'boolean') return value
    throw this._unexpected()
  }

  private _expect(char: string): void {
    if (this._text[this._pos] !== char) throw this._unexpected()
    this._pos++
  }

  private _skipWhitespace(): void {
    while (WHITESPACE.has(this._text[this._pos] ?? '')) this._pos++
  }

  private _unexpected(): SyntaxError {
    return new SyntaxError(`Unexpected token in JSON at position ${String(this._pos)}`)
  }
}

/**
 * Parse JSON text into an ordered Map. Returns null when the top level is
 * not an object.
 */
export function readOrderedJson(raw: string): ConfigMap | null {
  const value = new OrderedJsonReader(raw).readValue()
  return value instanceof Map ? value : null
}
