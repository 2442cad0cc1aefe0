import type { AssetSystem } from '@modelwarm/core'

/**
 * Asset system that records prefetch requests instead of loading anything
 */
export class RecordingAssetSystem implements AssetSystem {
  readonly requests: string[] = []

  prefetchModel(path: string): void {
    this.requests.push(path)
  }

  /** How many times a path was requested */
  count(path: string): number {
    return this.requests.filter(p => p === path).length
  }
}
