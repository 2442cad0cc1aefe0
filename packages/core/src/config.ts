/**
 * Prefetch Configuration
 *
 * Passed into the coordinator at construction. Replaces the global debug
 * toggle scripts normally flip at load time.
 */

export interface PrefetchConfig {
  /** Enables debug log lines */
  debug: boolean
  /** Section field selecting the world-model policy */
  worldField: string
  /** Section field selecting the HUD-model policy */
  hudField: string
  /** Probe enumeration covers ids [0, probeLimit) */
  probeLimit: number
  /** Tag prefixed to every log line */
  logTag: string
}

/** Highest object id the engine hands out is 0xFFFE */
export const DEFAULT_PROBE_LIMIT = 0xFFFF

export const DEFAULT_PREFETCH_CONFIG: Readonly<PrefetchConfig> = {
  debug: false,
  worldField: 'lewd_prefetch_world',
  hudField: 'lewd_prefetch_hud',
  probeLimit: DEFAULT_PROBE_LIMIT,
  logTag: 'Prefetch',
}

/**
 * Merge overrides over the defaults.
 *
 * @throws If the merged config is unusable
 */
export function resolvePrefetchConfig(overrides: Partial<PrefetchConfig> = {}): PrefetchConfig {
  const config: PrefetchConfig = { ...DEFAULT_PREFETCH_CONFIG, ...overrides }

  if (!Number.isInteger(config.probeLimit) || config.probeLimit <= 0) {
    throw new Error(`probeLimit must be a positive integer, got ${config.probeLimit}`)
  }
  if (config.worldField === '' || config.hudField === '') {
    throw new Error('worldField and hudField must be non-empty')
  }
  if (config.worldField === config.hudField) {
    throw new Error(`worldField and hudField must differ, both are '${config.worldField}'`)
  }

  return config
}
