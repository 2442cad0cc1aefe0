import { describe, expect, test } from 'vitest'
import type { ConfigRegistry } from '../host'
import { resolveHudModelPath, resolveModelPath, resolveWorldModelPath } from './paths'

function createRegistry(data: Record<string, Record<string, string>>): ConfigRegistry {
  return {
    sections: () => Object.keys(data),
    readString: (section, field) => data[section]?.[field],
  }
}

const registry = createRegistry({
  wpn_pm: { visual: 'dynamics\\weapons\\wpn_pm\\wpn_pm', hud: 'wpn_pm_hud' },
  wpn_pm_hud: { item_visual: 'dynamics\\weapons\\wpn_pm\\wpn_pm_hud' },
  wpn_broken_hud: { hud: 'missing_hud' },
  wpn_blank: { visual: '   ' },
})

describe('resolveWorldModelPath', () => {
  test('returns the visual field', () => {
    expect(resolveWorldModelPath(registry, 'wpn_pm')).toEqual({
      ok: true,
      path: 'dynamics\\weapons\\wpn_pm\\wpn_pm',
    })
  })

  test('reports a missing visual', () => {
    expect(resolveWorldModelPath(registry, 'wpn_broken_hud')).toEqual({
      ok: false,
      reason: "section 'wpn_broken_hud' has no 'visual' field",
    })
  })

  test('treats a blank visual as missing', () => {
    expect(resolveWorldModelPath(registry, 'wpn_blank').ok).toBe(false)
  })
})

describe('resolveHudModelPath', () => {
  test('follows hud to the sub-section item_visual', () => {
    expect(resolveHudModelPath(registry, 'wpn_pm')).toEqual({
      ok: true,
      path: 'dynamics\\weapons\\wpn_pm\\wpn_pm_hud',
    })
  })

  test('reports a missing hud field', () => {
    expect(resolveHudModelPath(registry, 'wpn_blank')).toEqual({
      ok: false,
      reason: "section 'wpn_blank' has no 'hud' field",
    })
  })

  test('reports a missing item_visual on the sub-section', () => {
    expect(resolveHudModelPath(registry, 'wpn_broken_hud')).toEqual({
      ok: false,
      reason: "hud section 'missing_hud' (from 'wpn_broken_hud') has no 'item_visual' field",
    })
  })
})

describe('resolveModelPath', () => {
  test('dispatches on model kind', () => {
    expect(resolveModelPath(registry, 'wpn_pm', 'world')).toEqual(resolveWorldModelPath(registry, 'wpn_pm'))
    expect(resolveModelPath(registry, 'wpn_pm', 'hud')).toEqual(resolveHudModelPath(registry, 'wpn_pm'))
  })
})
