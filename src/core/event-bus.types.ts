/**
 * StoreEvents interface: defines all typed events published on a store's change channel.
 *
 * Event naming convention: {module}:{action} (e.g., "store:reloaded", "store:error")
 */

import type { StoreError } from './errors.js'

/** Lifecycle state of the store's external-change watch */
export type WatchState = 'unarmed' | 'armed' | 'suppressed' | 'reloading'

export interface StoreEvents {
  /** The backing document was re-read after an external change */
  'store:reloaded': {
    documentPath: string | undefined
  }

  /** A change-channel failure: the watched file went missing or a reload failed */
  'store:error': {
    error: StoreError
  }

  /** The watch moved between lifecycle states */
  'store:watch-state': {
    from: WatchState
    to: WatchState
  }
}
