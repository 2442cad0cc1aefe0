import { fileURLToPath } from 'url'
import { describe, expect, test } from 'vitest'
import { loadZone, parseZone } from './zone'

const FIXTURE = fileURLToPath(new URL('../fixtures/zone.json', import.meta.url))

describe('loadZone', () => {
  test('loads the bundled fixture', () => {
    const zone = loadZone(FIXTURE)

    expect(zone.actorLevel).toBe(1)
    expect(Object.keys(zone.sections)).toEqual([
      'wpn_pm', 'wpn_pm_hud', 'wpn_ak74', 'wpn_ak74_hud', 'wpn_svd', 'medkit',
    ])
    expect(zone.objects).toEqual([
      { section: 'wpn_ak74', level: 2 },
      { section: 'wpn_svd', level: 1 },
      { section: 'medkit', level: 1 },
    ])
  })
})

describe('parseZone', () => {
  test('defaults missing sections and objects', () => {
    expect(parseZone({ actorLevel: 0 })).toEqual({ sections: {}, objects: [], actorLevel: 0 })
  })

  test('rejects a missing actor level', () => {
    expect(() => parseZone({})).toThrow('actorLevel: level must be an integer in [0, 65535]')
  })

  test('rejects objects without a section', () => {
    expect(() => parseZone({ actorLevel: 1, objects: [{ level: 1 }] })).toThrow(
      'objects[0]: section must be a non-empty string',
    )
  })
})
