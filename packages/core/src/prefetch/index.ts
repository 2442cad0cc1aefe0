/**
 * Prefetch module
 *
 * Mode predicates, object enumeration, model path resolution, and the
 * coordinator that ties them into a single startup pass.
 */

export * from './modes'
export * from './enumeration'
export * from './paths'
export * from './PrefetchCoordinator'
