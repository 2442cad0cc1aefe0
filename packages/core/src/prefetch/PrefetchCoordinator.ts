/**
 * Prefetch Coordinator
 *
 * Runs one pass over the section registry after the actor spawns, asking the
 * asset system to load world and HUD models for sections that opt in.
 *
 * Flow: host fires onGameStart -> coordinator registers on actorFirstUpdate
 * -> first update runs the pass once and unregisters.
 *
 * Every failure is local to a section: it is logged and that model is
 * skipped. Nothing propagates to the host.
 */

import type { AssetSystem, ConfigRegistry, SimulationStore } from '../host'
import type { ScriptCallbacks } from '../callbacks'
import { resolvePrefetchConfig, type PrefetchConfig } from '../config'
import { createLogger, type Logger } from '../logger'
import { createObjectEnumerator, type ObjectEnumerator } from './enumeration'
import { evaluateMode, parsePrefetchMode, type ModeContext } from './modes'
import { resolveModelPath, type ModelKind } from './paths'

/** Callback id of the onGameStart registration */
export const PREFETCH_START_CALLBACK_ID = 'modelwarm.prefetch.start'

/** Callback id of the actorFirstUpdate registration */
export const PREFETCH_FIRST_UPDATE_CALLBACK_ID = 'modelwarm.prefetch.firstUpdate'

export interface PrefetchDeps {
  registry: ConfigRegistry
  store: SimulationStore
  assets: AssetSystem
  callbacks: ScriptCallbacks
  /** Defaults to a tagged console logger */
  logger?: Logger
}

export interface PrefetchDispatch {
  section: string
  kind: ModelKind
  path: string
}

/**
 * Counters for one pass
 */
export interface PrefetchPassReport {
  sectionsScanned: number
  worldDispatched: number
  hudDispatched: number
  errors: number
  /** Dispatches in the order they were made */
  dispatched: PrefetchDispatch[]
}

export function createPassReport(): PrefetchPassReport {
  return {
    sectionsScanned: 0,
    worldDispatched: 0,
    hudDispatched: 0,
    errors: 0,
    dispatched: [],
  }
}

export class PrefetchCoordinator {
  readonly config: PrefetchConfig
  private readonly registry: ConfigRegistry
  private readonly store: SimulationStore
  private readonly assets: AssetSystem
  private readonly callbacks: ScriptCallbacks
  private readonly logger: Logger
  private readonly enumerator: ObjectEnumerator

  private registered = false
  private completed = false

  /**
   * @throws If the config is invalid or the store cannot be enumerated
   */
  constructor(deps: PrefetchDeps, config: Partial<PrefetchConfig> = {}) {
    this.config = resolvePrefetchConfig(config)
    this.registry = deps.registry
    this.store = deps.store
    this.assets = deps.assets
    this.callbacks = deps.callbacks
    this.logger = deps.logger ?? createLogger(this.config.logTag, this.config.debug)
    this.enumerator = createObjectEnumerator(deps.store, this.config.probeLimit)
    this.logger.debug(`Using '${this.enumerator.strategy}' object enumeration`)
  }

  /**
   * Whether the actorFirstUpdate callback has fired its pass. Direct
   * runPrefetchPass() calls do not count.
   */
  get hasRun(): boolean {
    return this.completed
  }

  /** Hook the coordinator into the host's one-time startup event */
  install(): void {
    this.callbacks.register('onGameStart', PREFETCH_START_CALLBACK_ID, () => this.onGameStart())
  }

  onGameStart(): void {
    this.registerStartup()
  }

  /**
   * Subscribe the pass to the actor's first update. Only the first call
   * registers anything.
   */
  registerStartup(): void {
    if (this.registered) {
      this.logger.debug('Startup already registered, skipping')
      return
    }
    this.registered = true
    this.callbacks.register(
      'actorFirstUpdate',
      PREFETCH_FIRST_UPDATE_CALLBACK_ID,
      () => this.onActorFirstUpdate(),
    )
  }

  private onActorFirstUpdate(): void {
    this.callbacks.unregister(PREFETCH_FIRST_UPDATE_CALLBACK_ID)
    if (this.completed) return
    this.completed = true
    this.runPrefetchPass()
  }

  /**
   * Scan every section and dispatch prefetches for those whose mode holds.
   * A registry that fails mid-scan ends the scan early; the report still
   * covers the sections handled before it.
   */
  runPrefetchPass(): PrefetchPassReport {
    const report = createPassReport()
    const ctx: ModeContext = { enumerator: this.enumerator, store: this.store }

    try {
      for (const section of this.registry.sections()) {
        report.sectionsScanned++
        this.processSection(section, 'world', this.config.worldField, ctx, report)
        this.processSection(section, 'hud', this.config.hudField, ctx, report)
      }
    } catch (err) {
      this.fail(report, 'Section scan aborted:', err)
    }

    this.logger.debug(
      `Pass complete: ${report.sectionsScanned} sections, ` +
      `${report.worldDispatched} world, ${report.hudDispatched} hud, ${report.errors} errors`,
    )
    return report
  }

  private processSection(
    section: string,
    kind: ModelKind,
    field: string,
    ctx: ModeContext,
    report: PrefetchPassReport,
  ): void {
    try {
      const raw = this.registry.readString(section, field)?.trim()
      if (!raw) return

      const mode = parsePrefetchMode(raw)
      if (mode === null) {
        this.fail(report, `Unknown prefetch mode '${raw}' in ${section}.${field}`)
        return
      }
      if (!evaluateMode(mode, section, ctx)) return

      const resolved = resolveModelPath(this.registry, section, kind)
      if (!resolved.ok) {
        this.fail(report, `Cannot prefetch ${kind} model: ${resolved.reason}`)
        return
      }

      this.assets.prefetchModel(resolved.path)
      report.dispatched.push({ section, kind, path: resolved.path })
      if (kind === 'world') report.worldDispatched++
      else report.hudDispatched++
      this.logger.debug(`Prefetched ${kind} model for ${section} (${mode}): ${resolved.path}`)
    } catch (err) {
      this.fail(report, `Failed to prefetch ${kind} model for ${section}:`, err)
    }
  }

  private fail(report: PrefetchPassReport, message: string, ...args: unknown[]): void {
    report.errors++
    this.logger.error(message, ...args)
  }
}
