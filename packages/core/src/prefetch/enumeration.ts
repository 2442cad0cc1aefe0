/**
 * Simulation Object Enumeration
 *
 * One interface over the two ways a host can expose live objects. The
 * strategy is picked once when the enumerator is created; callers never
 * re-check host capabilities.
 */

import type { SimulationObject, SimulationStore } from '../host'

export type EnumerationStrategy = 'iterate' | 'probe'

export interface ObjectEnumerator {
  readonly strategy: EnumerationStrategy
  /** True as soon as any live object matches. Stops at the first match. */
  some(predicate: (obj: SimulationObject) => boolean): boolean
}

/**
 * Bulk iteration via the host's early-stop primitive
 */
export function createIteratingEnumerator(
  forEachObject: NonNullable<SimulationStore['forEachObject']>,
): ObjectEnumerator {
  return {
    strategy: 'iterate',
    some(predicate) {
      let found = false
      forEachObject((obj) => {
        if (predicate(obj)) {
          found = true
          return true
        }
        return false
      })
      return found
    },
  }
}

/**
 * Fallback: probe ids [0, limit) and skip empty slots
 */
export function createProbingEnumerator(
  objectById: NonNullable<SimulationStore['objectById']>,
  limit: number,
): ObjectEnumerator {
  return {
    strategy: 'probe',
    some(predicate) {
      for (let id = 0; id < limit; id++) {
        const obj = objectById(id)
        if (obj && predicate(obj)) return true
      }
      return false
    },
  }
}

/**
 * Pick the enumeration strategy for a store. Iteration wins when offered.
 *
 * @throws If the store exposes neither capability
 */
export function createObjectEnumerator(store: SimulationStore, probeLimit: number): ObjectEnumerator {
  if (store.forEachObject) {
    return createIteratingEnumerator(store.forEachObject)
  }
  if (store.objectById) {
    return createProbingEnumerator(store.objectById, probeLimit)
  }
  throw new Error('Simulation store exposes neither forEachObject nor objectById')
}
