/**
 * @modelwarm/sandbox
 *
 * In-process host for the prefetch coordinator: a bitecs world standing in
 * for the engine's object store, an in-memory section registry, and an asset
 * system that records requests.
 */

export * from './components'
export * from './world'
export * from './queries'
export * from './prefabs'
export * from './store'
export * from './registry'
export * from './assets'
export * from './env'
export * from './session'
export * from './zone'
