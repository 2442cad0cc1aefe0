/**
 * Environment config for the sandbox
 *
 * MODELWARM_DEBUG        1/true enables debug lines
 * MODELWARM_PROBE_LIMIT  probe range upper bound (exclusive)
 */

import type { PrefetchConfig } from '@modelwarm/core'

export function loadPrefetchConfig(env: NodeJS.ProcessEnv = process.env): Partial<PrefetchConfig> {
  const config: Partial<PrefetchConfig> = {}

  const debug = env.MODELWARM_DEBUG
  if (debug !== undefined) {
    config.debug = debug === '1' || debug.toLowerCase() === 'true'
  }

  const probeLimit = env.MODELWARM_PROBE_LIMIT
  if (probeLimit !== undefined) {
    const parsed = Number(probeLimit)
    if (!Number.isInteger(parsed) || parsed <= 0) {
      throw new Error(`MODELWARM_PROBE_LIMIT must be a positive integer, got '${probeLimit}'`)
    }
    config.probeLimit = parsed
  }

  return config
}
