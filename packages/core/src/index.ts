/**
 * @modelwarm/core
 *
 * Host-agnostic model prefetching for game mods: reads section config,
 * evaluates prefetch policies against live simulation state, and dispatches
 * model loads through host-provided capabilities.
 */

// Host capability interfaces
export * from './host'

// Configuration and logging
export * from './config'
export * from './logger'

// Lifecycle callbacks
export * from './callbacks'

// Prefetch pass
export * from './prefetch'
