/** Every unit an ingredient, pantry entry or price can be expressed in. */
export const UNITS = ['PCS', 'G', 'KG', 'ML', 'L'] as const

export type Unit = (typeof UNITS)[number]

export type UnitFamily = 'COUNT' | 'MASS' | 'VOLUME'

/** Family each unit belongs to. Units convert only within a family. */
export const UNIT_FAMILY: Record<Unit, UnitFamily> = {
  PCS: 'COUNT',
  G: 'MASS',
  KG: 'MASS',
  ML: 'VOLUME',
  L: 'VOLUME',
}

/** The single canonical unit of each family. */
export const CANONICAL_UNIT: Record<UnitFamily, Unit> = {
  COUNT: 'PCS',
  MASS: 'G',
  VOLUME: 'ML',
}

/** Multiplier from a unit to its family's canonical unit. */
export const TO_CANONICAL_FACTOR: Record<Unit, number> = {
  PCS: 1,
  G: 1,
  KG: 1000,
  ML: 1,
  L: 1000,
}

/** Check if a value is one of the supported units. */
export function isUnit(value: unknown): value is Unit {
  return typeof value === 'string' && UNITS.some((unit) => unit === value)
}
