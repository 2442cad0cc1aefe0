/**
 * Host Capabilities
 *
 * The fixed query interface the prefetch pass uses to reach the game engine.
 * Everything here is owned by the host; the pass only reads and dispatches.
 */

// ============================================================================
// Configuration Registry
// ============================================================================

/**
 * Static section definitions (item/object archetypes).
 */
export interface ConfigRegistry {
  /** All section names, in registry iteration order */
  sections(): Iterable<string>
  /** Read a string field; undefined when the section or field is unset */
  readString(section: string, field: string): string | undefined
}

// ============================================================================
// Simulation Store
// ============================================================================

/**
 * A live, spawned instance of a section
 */
export interface SimulationObject {
  id: number
  section: string
  /** Level the object currently sits on */
  levelId: number
}

/** Visitor for bulk iteration. Return true to stop. */
export type ObjectVisitor = (obj: SimulationObject) => boolean | void

/**
 * Live object store. A host exposes bulk iteration, id probing, or both.
 */
export interface SimulationStore {
  /** Iterate live objects until the visitor returns true */
  forEachObject?: (visit: ObjectVisitor) => void
  /** Look up an object by id; undefined for an empty slot */
  objectById?: (id: number) => SimulationObject | undefined
  /** The player (actor) object, once spawned */
  player(): SimulationObject | undefined
}

// ============================================================================
// Asset System
// ============================================================================

export interface AssetSystem {
  /** Fire-and-forget model load */
  prefetchModel(path: string): void
}
