/**
 * Zone Files
 *
 * A zone bundles section definitions with the live objects to spawn into a
 * sandbox session, so a whole scenario can live in one JSON file.
 */

import { readFileSync } from 'fs'
import { parseSectionData, type SectionData } from './registry'
import { spawnActor, spawnObject } from './prefabs'
import type { SandboxSession } from './session'

export interface ZoneObject {
  section: string
  level: number
}

export interface Zone {
  sections: SectionData
  objects: ZoneObject[]
  /** Level the actor spawns on */
  actorLevel: number
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function parseLevel(value: unknown, where: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value > 0xFFFF) {
    throw new Error(`${where}: level must be an integer in [0, 65535]`)
  }
  return value
}

/**
 * @throws If the value is not a well-formed zone
 */
export function parseZone(value: unknown): Zone {
  if (!isRecord(value)) {
    throw new Error('Zone must be an object')
  }
  const objects = value.objects ?? []
  if (!Array.isArray(objects)) {
    throw new Error('Zone objects must be an array')
  }

  return {
    sections: parseSectionData(value.sections ?? {}),
    objects: objects.map((entry: unknown, i): ZoneObject => {
      if (!isRecord(entry)) {
        throw new Error(`objects[${i}]: must be an object`)
      }
      const section = entry.section
      if (typeof section !== 'string' || section === '') {
        throw new Error(`objects[${i}]: section must be a non-empty string`)
      }
      return { section, level: parseLevel(entry.level, `objects[${i}]`) }
    }),
    actorLevel: parseLevel(value.actorLevel, 'actorLevel'),
  }
}

export function loadZone(path: string): Zone {
  return parseZone(JSON.parse(readFileSync(path, 'utf-8')))
}

/** Spawn a zone's objects and actor into a session's world */
export function populateZone(session: SandboxSession, zone: Zone): void {
  for (const obj of zone.objects) {
    spawnObject(session.world, obj.section, obj.level)
  }
  spawnActor(session.world, zone.actorLevel)
}
