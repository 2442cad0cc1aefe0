/**
 * Sandbox World
 *
 * A bitecs world standing in for the engine's live object store.
 */

import { createWorld as bitCreateWorld, type IWorld } from 'bitecs'
import { DEFAULT_PROBE_LIMIT } from '@modelwarm/core'

export interface SandboxWorld extends IWorld {
  /** Section names by id */
  sectionNames: string[]
  /** Section name -> id in sectionNames */
  sectionIds: Map<string, number>
  /** Object ids are allocated in [0, maxObjects) */
  maxObjects: number
  /** Object id -> entity id, undefined for a free slot */
  objectEids: Array<number | undefined>
  /** Released object ids, reused lowest first */
  freeObjectIds: number[]
}

/**
 * Create a sandbox world. maxObjects defaults to the probe range, so every
 * object id a world hands out is reachable by probing.
 */
export function createSandboxWorld(maxObjects = DEFAULT_PROBE_LIMIT): SandboxWorld {
  if (!Number.isInteger(maxObjects) || maxObjects <= 0 || maxObjects > DEFAULT_PROBE_LIMIT) {
    throw new Error(`maxObjects must be an integer in [1, ${DEFAULT_PROBE_LIMIT}], got ${maxObjects}`)
  }
  const baseWorld = bitCreateWorld()
  return {
    ...baseWorld,
    sectionNames: [],
    sectionIds: new Map(),
    maxObjects,
    objectEids: [],
    freeObjectIds: [],
  }
}

/** Intern a section name, returning its id */
export function internSection(world: SandboxWorld, section: string): number {
  const existing = world.sectionIds.get(section)
  if (existing !== undefined) return existing
  const id = world.sectionNames.length
  world.sectionNames.push(section)
  world.sectionIds.set(section, id)
  return id
}

export function sectionName(world: SandboxWorld, sectionId: number): string {
  const name = world.sectionNames[sectionId]
  if (name === undefined) {
    throw new Error(`Unknown section id: ${sectionId}`)
  }
  return name
}

/**
 * Reserve the lowest free object id for an entity
 *
 * @throws If all maxObjects ids are in use
 */
export function allocateObjectId(world: SandboxWorld, eid: number): number {
  let id: number
  if (world.freeObjectIds.length > 0) {
    world.freeObjectIds.sort((a, b) => a - b)
    id = world.freeObjectIds.shift() ?? 0
  } else if (world.objectEids.length < world.maxObjects) {
    id = world.objectEids.length
  } else {
    throw new Error(`Sandbox world is full (max ${world.maxObjects} objects)`)
  }
  world.objectEids[id] = eid
  return id
}

export function releaseObjectId(world: SandboxWorld, id: number): void {
  if (world.objectEids[id] === undefined) return
  world.objectEids[id] = undefined
  world.freeObjectIds.push(id)
}

/** Entity id behind an object id, if that slot is in use */
export function entityForObject(world: SandboxWorld, id: number): number | undefined {
  return world.objectEids[id]
}
