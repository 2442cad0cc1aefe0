/**
 * Sandbox Prefabs
 *
 * Spawn helpers for live objects and the actor.
 */

import { addComponent, addEntity, hasComponent, removeEntity } from 'bitecs'
import { Actor, SimObject } from './components'
import { allocateObjectId, internSection, releaseObjectId, type SandboxWorld } from './world'
import { actorQuery } from './queries'

/** Section name the engine gives the player */
export const ACTOR_SECTION = 'actor'

/**
 * Spawn a live object of a section
 *
 * @returns The entity ID (see objectIdOf for the id the host store reports)
 * @throws If the world has run out of object ids
 */
export function spawnObject(world: SandboxWorld, section: string, levelId: number): number {
  const eid = addEntity(world)
  let objectId: number
  try {
    objectId = allocateObjectId(world, eid)
  } catch (err) {
    removeEntity(world, eid)
    throw err
  }

  addComponent(world, SimObject, eid)
  SimObject.objectId[eid] = objectId
  SimObject.sectionId[eid] = internSection(world, section)
  SimObject.levelId[eid] = levelId
  return eid
}

/**
 * Spawn the actor (player)
 *
 * @throws If an actor already exists
 */
export function spawnActor(world: SandboxWorld, levelId: number): number {
  if (actorQuery(world).length > 0) {
    throw new Error('Actor already spawned')
  }
  const eid = spawnObject(world, ACTOR_SECTION, levelId)
  addComponent(world, Actor, eid)
  Actor.updated[eid] = 0
  return eid
}

/** Remove a live object. Unknown ids are ignored. */
export function despawnObject(world: SandboxWorld, eid: number): void {
  if (!hasComponent(world, SimObject, eid)) return
  releaseObjectId(world, SimObject.objectId[eid] ?? 0)
  removeEntity(world, eid)
}

/** Move an object to another level */
export function moveObject(world: SandboxWorld, eid: number, levelId: number): void {
  if (!hasComponent(world, SimObject, eid)) {
    throw new Error(`No live object with id ${eid}`)
  }
  SimObject.levelId[eid] = levelId
}

/**
 * Per-world object id of a live entity
 *
 * @throws If the entity is not a live object
 */
export function objectIdOf(world: SandboxWorld, eid: number): number {
  if (!hasComponent(world, SimObject, eid)) {
    throw new Error(`No live object with id ${eid}`)
  }
  return SimObject.objectId[eid] ?? 0
}
