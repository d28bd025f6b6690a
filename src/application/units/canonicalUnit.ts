import {
  CANONICAL_UNIT,
  TO_CANONICAL_FACTOR,
  UNIT_FAMILY,
  type Unit,
  type UnitFamily,
} from '@domain/constants/units.ts'
import type { Ingredient } from '@domain/models/Ingredient.ts'
import type { IngredientKey } from '@domain/models/IngredientKey.ts'

export function unitFamily(unit: Unit): UnitFamily {
  return UNIT_FAMILY[unit]
}

/** Canonical unit of the unit's family: G for mass, ML for volume, PCS for count. */
export function canonicalUnit(unit: Unit): Unit {
  return CANONICAL_UNIT[UNIT_FAMILY[unit]]
}

/**
 * Express an amount in the canonical unit of its family
 * (e.g., 1.5 KG -> 1500, 250 ML -> 250).
 */
export function toCanonical(amount: number, unit: Unit): number {
  return amount * TO_CANONICAL_FACTOR[unit]
}

export function areConvertible(a: Unit, b: Unit): boolean {
  return UNIT_FAMILY[a] === UNIT_FAMILY[b]
}

/** Canonical identity and amount of an ingredient occurrence. */
export function canonicalize(ingredient: Ingredient): { key: IngredientKey; amount: number } {
  return {
    key: { name: ingredient.name, unit: canonicalUnit(ingredient.unit) },
    amount: toCanonical(ingredient.amount, ingredient.unit),
  }
}
