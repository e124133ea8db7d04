/**
 * Shadowrun edition identifiers and the per-edition threshold keyword tables.
 *
 * @module dice/edition
 */

export type Edition = 'SR4' | 'SR5' | 'SR6'

export const EDITIONS: readonly Edition[] = ['SR4', 'SR5', 'SR6']

export const DEFAULT_EDITION: Edition = 'SR5'

/** Human-readable list used in `/ed` replies. */
export const ALLOWED_EDITIONS = 'SR4, SR5, SR6 (or drop the SR prefix)'

type ThresholdTable = Readonly<Record<string, number>>

const SR4_THRESHOLDS: ThresholdTable = Object.freeze({
  easy: 1,
  ea: 1,
  average: 2,
  av: 2,
  hard: 4,
  ha: 4,
  extreme: 6,
  ex: 6,
})

const SR5_THRESHOLDS: ThresholdTable = Object.freeze({
  easy: 1,
  ea: 1,
  average: 2,
  av: 2,
  hard: 4,
  ha: 4,
  veryhard: 6,
  vh: 6,
  extreme: 8,
  ex: 8,
})

// SR6 dropped named difficulties
const THRESHOLD_TABLES: Readonly<Record<Edition, ThresholdTable | null>> = {
  SR4: SR4_THRESHOLDS,
  SR5: SR5_THRESHOLDS,
  SR6: null,
}

export function thresholdTable(edition: Edition): ThresholdTable | null {
  return THRESHOLD_TABLES[edition]
}

export function isEdition(value: unknown): value is Edition {
  return typeof value === 'string' && EDITIONS.some(e => e === value)
}

/**
 * Normalize user input such as `5`, `sr5` or `SR5` to an edition.
 *
 * @returns The `SRn` form, or `null` when the input names no known edition.
 */
export function normalizeEdition(input: string): Edition | null {
  const upper = input.trim().toUpperCase()
  const candidate = upper.startsWith('SR') ? upper : `SR${upper}`
  return isEdition(candidate) ? candidate : null
}
