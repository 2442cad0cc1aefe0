/**
 * Sandbox ECS Components
 *
 * Structure-of-arrays stores indexed by entity id. bitecs hands out entity
 * ids from one counter shared by every world in the process, so the stores
 * span the whole default bitecs entity range. Objects also carry a per-world
 * object id, which is what the host store reports.
 */

/** Maximum entities supported (bitecs default world size) */
export const MAX_ENTITIES = 100000

/** A spawned instance of a config section */
export const SimObject = {
  /** Per-world object id, below the world's maxObjects */
  objectId: new Uint16Array(MAX_ENTITIES),
  /** Index into the world's section name table */
  sectionId: new Uint32Array(MAX_ENTITIES),
  /** Level the object sits on */
  levelId: new Uint16Array(MAX_ENTITIES),
}

/** Marks the player entity */
export const Actor = {
  /** Whether the actor has received its first update */
  updated: new Uint8Array(MAX_ENTITIES),
}
