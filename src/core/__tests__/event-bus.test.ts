/**
 * Unit tests for TypedEventBus and StoreEvents type safety.
 *
 * Covers:
 *  - Emit/subscribe with correct payload type
 *  - Unsubscribe removes handler
 *  - Multiple handlers for same event all invoked
 *  - Event dispatch is synchronous
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'
import { TypedEventBusImpl, createEventBus } from '../event-bus.js'
import type { TypedEventBus } from '../event-bus.js'
import type { StoreEvents } from '../event-bus.types.js'
import { WatchedFileMissingError } from '../errors.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeHandler<K extends keyof StoreEvents>(
  _event: K
): (payload: StoreEvents[K]) => void {
  return vi.fn()
}

// ---------------------------------------------------------------------------
// TypedEventBusImpl unit tests
// ---------------------------------------------------------------------------

describe('TypedEventBusImpl', () => {
  let bus: TypedEventBus

  beforeEach(() => {
    bus = new TypedEventBusImpl()
  })

  it('invokes handler when matching event is emitted', () => {
    const handler = makeHandler('store:reloaded')
    bus.on('store:reloaded', handler)

    const payload: StoreEvents['store:reloaded'] = { documentPath: '/tmp/settings.json' }
    bus.emit('store:reloaded', payload)

    expect(handler).toHaveBeenCalledOnce()
    expect(handler).toHaveBeenCalledWith(payload)
  })

  it('does NOT invoke handler for a different event', () => {
    const handler = makeHandler('store:reloaded')
    bus.on('store:reloaded', handler)

    bus.emit('store:watch-state', { from: 'armed', to: 'suppressed' })

    expect(handler).not.toHaveBeenCalled()
  })

  it('passes error payloads through unchanged', () => {
    const handler = makeHandler('store:error')
    bus.on('store:error', handler)

    const error = new WatchedFileMissingError('/tmp/settings.json')
    bus.emit('store:error', { error })

    expect(handler).toHaveBeenCalledWith({ error })
  })

  it('invokes every handler registered for the same event', () => {
    const first = makeHandler('store:watch-state')
    const second = makeHandler('store:watch-state')
    bus.on('store:watch-state', first)
    bus.on('store:watch-state', second)

    bus.emit('store:watch-state', { from: 'unarmed', to: 'armed' })

    expect(first).toHaveBeenCalledOnce()
    expect(second).toHaveBeenCalledOnce()
    expect(bus.listenerCount('store:watch-state')).toBe(2)
  })

  it('stops invoking a handler after off()', () => {
    const handler = makeHandler('store:reloaded')
    bus.on('store:reloaded', handler)
    bus.off('store:reloaded', handler)

    bus.emit('store:reloaded', { documentPath: undefined })

    expect(handler).not.toHaveBeenCalled()
    expect(bus.listenerCount('store:reloaded')).toBe(0)
  })

  it('treats off() of an unknown handler as a no-op', () => {
    expect(() => {
      bus.off('store:error', makeHandler('store:error'))
    }).not.toThrow()
  })

  it('dispatches synchronously', () => {
    const order: string[] = []
    bus.on('store:reloaded', () => {
      order.push('handler')
    })

    order.push('before')
    bus.emit('store:reloaded', { documentPath: undefined })
    order.push('after')

    expect(order).toEqual(['before', 'handler', 'after'])
  })
})

describe('createEventBus', () => {
  it('returns an independent bus per call', () => {
    const a = createEventBus()
    const b = createEventBus()
    const handler = makeHandler('store:reloaded')
    a.on('store:reloaded', handler)

    b.emit('store:reloaded', { documentPath: undefined })

    expect(handler).not.toHaveBeenCalled()
  })
})
