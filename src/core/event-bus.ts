/**
 * TypedEventBus: typed pub/sub used as a store's change channel.
 *
 * Built on top of Node.js EventEmitter.
 *
 * Key design constraints:
 *  - Event dispatch is SYNCHRONOUS: handlers run immediately when emit() is called.
 *  - No async/Promise-based dispatch; async work should be scheduled separately.
 *  - TypeScript `keyof` constraint enforces handler type safety at compile time.
 */

import { EventEmitter } from 'node:events'
import type { StoreEvents } from './event-bus.types.js'

// ---------------------------------------------------------------------------
// TypedEventBus interface
// ---------------------------------------------------------------------------

/**
 * A typed publish-subscribe bus.
 *
 * All event names and payload types are enforced by the `StoreEvents` map.
 */
export interface TypedEventBus {
  /**
   * Emit an event with a strongly-typed payload.
   * Dispatch is synchronous: all registered handlers run before emit() returns.
   */
  emit<K extends keyof StoreEvents>(event: K, payload: StoreEvents[K]): void

  /**
   * Subscribe to an event. The handler is called synchronously on each emit.
   */
  on<K extends keyof StoreEvents>(
    event: K,
    handler: (payload: StoreEvents[K]) => void
  ): void

  /**
   * Unsubscribe a previously registered handler.
   * If the handler was not registered, this is a no-op.
   */
  off<K extends keyof StoreEvents>(
    event: K,
    handler: (payload: StoreEvents[K]) => void
  ): void

  /** Number of handlers currently registered for an event */
  listenerCount(event: keyof StoreEvents): number
}

// ---------------------------------------------------------------------------
// TypedEventBusImpl
// ---------------------------------------------------------------------------

/**
 * Concrete implementation of TypedEventBus backed by Node.js EventEmitter.
 *
 * @example
 * const bus = new TypedEventBusImpl()
 * bus.on('store:reloaded', ({ documentPath }) => {
 *   console.log(`Reloaded ${documentPath}`)
 * })
 */
export class TypedEventBusImpl implements TypedEventBus {
  private readonly _emitter: EventEmitter

  constructor() {
    this._emitter = new EventEmitter()
  }

  emit<K extends keyof StoreEvents>(event: K, payload: StoreEvents[K]): void {
    this._emitter.emit(event, payload)
  }

  on<K extends keyof StoreEvents>(
    event: K,
    handler: (payload: StoreEvents[K]) => void
  ): void {
    this._emitter.on(event, handler)
  }

  off<K extends keyof StoreEvents>(
    event: K,
    handler: (payload: StoreEvents[K]) => void
  ): void {
    this._emitter.off(event, handler)
  }

  listenerCount(event: keyof StoreEvents): number {
    return this._emitter.listenerCount(event)
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new TypedEventBus instance.
 *
 * @example
 * const bus = createEventBus()
 */
export function createEventBus(): TypedEventBus {
  return new TypedEventBusImpl()
}
