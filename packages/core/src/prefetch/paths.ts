/**
 * Model Path Resolution
 *
 * World models live directly on the section (`visual`). HUD models live on a
 * linked sub-section: `hud` names it, and its `item_visual` is the path.
 */

import type { ConfigRegistry } from '../host'

export const WORLD_VISUAL_FIELD = 'visual'
export const HUD_SECTION_FIELD = 'hud'
export const HUD_VISUAL_FIELD = 'item_visual'

export type ModelKind = 'world' | 'hud'

export type PathResolution =
  | { ok: true; path: string }
  | { ok: false; reason: string }

/** Unset and blank fields both count as missing */
function readField(registry: ConfigRegistry, section: string, field: string): string | null {
  const value = registry.readString(section, field)?.trim()
  return value ? value : null
}

export function resolveWorldModelPath(registry: ConfigRegistry, section: string): PathResolution {
  const visual = readField(registry, section, WORLD_VISUAL_FIELD)
  if (visual === null) {
    return { ok: false, reason: `section '${section}' has no '${WORLD_VISUAL_FIELD}' field` }
  }
  return { ok: true, path: visual }
}

export function resolveHudModelPath(registry: ConfigRegistry, section: string): PathResolution {
  const hudSection = readField(registry, section, HUD_SECTION_FIELD)
  if (hudSection === null) {
    return { ok: false, reason: `section '${section}' has no '${HUD_SECTION_FIELD}' field` }
  }
  const visual = readField(registry, hudSection, HUD_VISUAL_FIELD)
  if (visual === null) {
    return {
      ok: false,
      reason: `hud section '${hudSection}' (from '${section}') has no '${HUD_VISUAL_FIELD}' field`,
    }
  }
  return { ok: true, path: visual }
}

export function resolveModelPath(registry: ConfigRegistry, section: string, kind: ModelKind): PathResolution {
  return kind === 'world'
    ? resolveWorldModelPath(registry, section)
    : resolveHudModelPath(registry, section)
}
