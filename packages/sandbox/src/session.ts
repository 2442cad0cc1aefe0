/**
 * Sandbox Session
 *
 * Plays the engine's part for one game session: owns the world, registry,
 * asset system and callback registry, and fires lifecycle callbacks the way
 * the engine does.
 */

import {
  PrefetchCoordinator,
  ScriptCallbackRegistry,
  resolvePrefetchConfig,
  type Logger,
  type PrefetchConfig,
} from '@modelwarm/core'
import { Actor } from './components'
import { RecordingAssetSystem } from './assets'
import { actorQuery } from './queries'
import { SectionRegistry, type SectionData } from './registry'
import { createSimulationStore, type StoreCapability } from './store'
import { createSandboxWorld, type SandboxWorld } from './world'

export interface SandboxSessionOptions {
  sections?: SectionData | SectionRegistry
  capability?: StoreCapability
  config?: Partial<PrefetchConfig>
  logger?: Logger
}

export class SandboxSession {
  readonly world: SandboxWorld
  readonly registry: SectionRegistry
  readonly assets = new RecordingAssetSystem()
  readonly callbacks = new ScriptCallbackRegistry()
  readonly coordinator: PrefetchCoordinator

  private started = false

  constructor(options: SandboxSessionOptions = {}) {
    const sections = options.sections ?? {}
    const config = resolvePrefetchConfig(options.config)
    // Object ids stay inside the probe range
    this.world = createSandboxWorld(config.probeLimit)
    this.registry = sections instanceof SectionRegistry ? sections : new SectionRegistry(sections)
    this.coordinator = new PrefetchCoordinator({
      registry: this.registry,
      store: createSimulationStore(this.world, options.capability),
      assets: this.assets,
      callbacks: this.callbacks,
      logger: options.logger,
    }, config)
    this.coordinator.install()
  }

  /** Fire the one-time startup callback */
  start(): void {
    if (this.started) {
      throw new Error('Session already started')
    }
    this.started = true
    this.callbacks.fire('onGameStart')
  }

  /**
   * Advance one engine update. The first update an actor receives fires
   * actorFirstUpdate.
   *
   * @throws If the session has not started or no actor has spawned
   */
  update(): void {
    if (!this.started) {
      throw new Error('Session not started')
    }
    const actor = actorQuery(this.world)[0]
    if (actor === undefined) {
      throw new Error('Actor has not spawned')
    }
    if (Actor.updated[actor] === 1) return
    Actor.updated[actor] = 1
    this.callbacks.fire('actorFirstUpdate')
  }

  /** Fire onGameEnd and drop every callback */
  end(): void {
    this.callbacks.fire('onGameEnd')
    this.callbacks.clear()
  }
}
