/**
 * Sandbox Simulation Store
 *
 * Exposes a sandbox world through the host store capabilities. Real engines
 * differ in what they offer, so the capability set is selectable.
 */

import { hasComponent } from 'bitecs'
import type { SimulationObject, SimulationStore } from '@modelwarm/core'
import { SimObject } from './components'
import { actorQuery, objectQuery } from './queries'
import { entityForObject, sectionName, type SandboxWorld } from './world'

export type StoreCapability = 'iterate' | 'probe' | 'both'

function toSimulationObject(world: SandboxWorld, eid: number): SimulationObject {
  return {
    id: SimObject.objectId[eid] ?? 0,
    section: sectionName(world, SimObject.sectionId[eid] ?? 0),
    levelId: SimObject.levelId[eid] ?? 0,
  }
}

export function createSimulationStore(
  world: SandboxWorld,
  capability: StoreCapability = 'iterate',
): SimulationStore {
  const store: SimulationStore = {
    player() {
      const eid = actorQuery(world)[0]
      return eid === undefined ? undefined : toSimulationObject(world, eid)
    },
  }

  if (capability !== 'probe') {
    store.forEachObject = (visit) => {
      for (const eid of objectQuery(world)) {
        if (visit(toSimulationObject(world, eid)) === true) return
      }
    }
  }

  if (capability !== 'iterate') {
    store.objectById = (id) => {
      const eid = entityForObject(world, id)
      if (eid === undefined || !hasComponent(world, SimObject, eid)) return undefined
      return toSimulationObject(world, eid)
    }
  }

  return store
}
