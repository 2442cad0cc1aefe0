/**
 * Prefetch Modes
 *
 * A section opts into prefetching by naming a mode in its config:
 * - **always**: prefetch unconditionally
 * - **exists**: prefetch if any live object of the section exists
 * - **nearby**: prefetch if such an object is on the player's level
 */

import type { SimulationStore } from '../host'
import type { ObjectEnumerator } from './enumeration'

export const PrefetchMode = {
  ALWAYS: 'always',
  EXISTS: 'exists',
  NEARBY: 'nearby',
} as const

export type PrefetchModeValue = (typeof PrefetchMode)[keyof typeof PrefetchMode]

/** State a mode predicate may query */
export interface ModeContext {
  enumerator: ObjectEnumerator
  store: SimulationStore
}

export type ModePredicate = (section: string, ctx: ModeContext) => boolean

export const MODE_PREDICATES: Readonly<Record<PrefetchModeValue, ModePredicate>> = {
  always: () => true,
  exists: (section, { enumerator }) => enumerator.some(obj => obj.section === section),
  nearby: (section, { enumerator, store }) => {
    const player = store.player()
    if (!player) return false
    return enumerator.some(obj => obj.section === section && obj.levelId === player.levelId)
  },
}

function isPrefetchMode(value: string): value is PrefetchModeValue {
  return Object.prototype.hasOwnProperty.call(MODE_PREDICATES, value)
}

/** Map a config value to a mode, or null if unrecognized */
export function parsePrefetchMode(value: string): PrefetchModeValue | null {
  return isPrefetchMode(value) ? value : null
}

export function evaluateMode(mode: PrefetchModeValue, section: string, ctx: ModeContext): boolean {
  return MODE_PREDICATES[mode](section, ctx)
}
