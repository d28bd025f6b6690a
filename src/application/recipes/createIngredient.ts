import type { Unit } from '@domain/constants/units.ts'
import type { Ingredient } from '@domain/models/Ingredient.ts'
import { IngredientInputSchema, parseInput } from '@application/validation/schemas.ts'
import { normalizeIngredientName } from '@application/grocery/normalizeIngredientName.ts'

/**
 * Create an immutable ingredient. The name is normalized here so every
 * later comparison can use it as is.
 *
 * @throws ValidationError for a blank name, an unknown unit, or an amount
 *   that is negative or not finite
 */
export function createIngredient(name: string, amount: number, unit: Unit): Ingredient {
  const input = parseInput(IngredientInputSchema, { name, amount, unit }, 'ingredient')
  return Object.freeze({
    name: normalizeIngredientName(input.name),
    amount: input.amount,
    unit: input.unit,
  })
}

/** Identity comparison: amount is ignored. */
export function sameIngredient(a: Ingredient, b: Ingredient): boolean {
  return a.name === b.name && a.unit === b.unit
}

export function withAmount(ingredient: Ingredient, amount: number): Ingredient {
  return createIngredient(ingredient.name, amount, ingredient.unit)
}
