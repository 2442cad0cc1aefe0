/**
 * Section Registry
 *
 * In-memory config registry. Sections iterate in insertion order.
 */

import type { ConfigRegistry } from '@modelwarm/core'

/** section -> field -> value */
export type SectionData = Record<string, Record<string, string>>

function isFieldMap(value: unknown): value is Record<string, string> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false
  return Object.values(value).every(v => typeof v === 'string')
}

/**
 * Validate parsed JSON as section data
 *
 * @throws If any section is not a map of string fields
 */
export function parseSectionData(value: unknown): SectionData {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error('Section data must be an object of sections')
  }
  const data: SectionData = {}
  for (const [section, fields] of Object.entries(value)) {
    if (!isFieldMap(fields)) {
      throw new Error(`Section '${section}' must map field names to strings`)
    }
    data[section] = { ...fields }
  }
  return data
}

export class SectionRegistry implements ConfigRegistry {
  private readonly data = new Map<string, Map<string, string>>()

  constructor(sections: SectionData = {}) {
    for (const [section, fields] of Object.entries(sections)) {
      this.define(section, fields)
    }
  }

  /** Add a section, or merge fields into an existing one */
  define(section: string, fields: Record<string, string>): void {
    let entry = this.data.get(section)
    if (!entry) {
      entry = new Map()
      this.data.set(section, entry)
    }
    for (const [field, value] of Object.entries(fields)) {
      entry.set(field, value)
    }
  }

  sections(): Iterable<string> {
    return this.data.keys()
  }

  readString(section: string, field: string): string | undefined {
    return this.data.get(section)?.get(field)
  }
}
