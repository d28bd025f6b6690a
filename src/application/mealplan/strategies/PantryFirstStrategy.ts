import type { MealPlan, MealType } from '@domain/models/MealPlan.ts'
import type { Recipe } from '@domain/models/Recipe.ts'
import type { StockLedger } from '@domain/models/IngredientKey.ts'
import type { Pantry } from '@application/pantry/Pantry.ts'
import { canonicalize } from '@application/units/canonicalUnit.ts'
import { logger } from '@infrastructure/logging/logger.ts'
import { assertPlanRequest, fillSlots, type MealPlanStrategy } from './MealPlanStrategy.ts'

/**
 * Amount that would still have to be bought to cook the recipe from the
 * given stock: the sum over its ingredients of max(0, need - stock),
 * in canonical units.
 */
export function missingAmount(recipe: Recipe, stock: StockLedger): number {
  let missing = 0
  for (const ing of recipe.ingredients) {
    const { key, amount } = canonicalize(ing)
    const shortfall = amount - (stock.get(key) ?? 0)
    if (shortfall > 0) missing += shortfall
  }
  return missing
}

/** First recipe in catalog order with the smallest missing amount. */
export function chooseLeastMissing(catalog: readonly Recipe[], stock: StockLedger): Recipe {
  let best = catalog[0]
  let bestMissing = missingAmount(best, stock)
  for (let i = 1; i < catalog.length; i++) {
    const missing = missingAmount(catalog[i], stock)
    if (missing < bestMissing) {
      best = catalog[i]
      bestMissing = missing
    }
  }
  return best
}

/** Use up the recipe's ingredients; identities that run out are removed. */
export function consumeFromStock(recipe: Recipe, stock: StockLedger): void {
  for (const ing of recipe.ingredients) {
    const { key, amount } = canonicalize(ing)
    const left = (stock.get(key) ?? 0) - amount
    if (left <= 0) {
      stock.delete(key)
    } else {
      stock.set(key, left)
    }
  }
}

/**
 * Greedy planner that fills each slot with the recipe needing the least
 * shopping given what is left in the pantry, then pretends to cook it.
 *
 * The pantry is read once, at construction. Each generatePlan call works on
 * its own copy of that snapshot.
 */
export class PantryFirstStrategy implements MealPlanStrategy {
  private readonly initialStock: StockLedger

  constructor(pantry: Pantry) {
    this.initialStock = pantry.snapshot()
  }

  generatePlan(days: number, mealTypes: readonly MealType[], catalog: readonly Recipe[]): MealPlan {
    assertPlanRequest(days, mealTypes, catalog)
    const stock = this.initialStock.clone()

    return fillSlots(days, mealTypes, (dayIndex, mealType) => {
      const chosen = chooseLeastMissing(catalog, stock)
      logger.debug(`pantry-first: day ${dayIndex} ${mealType} -> ${chosen.name}`)
      consumeFromStock(chosen, stock)
      return chosen
    })
  }
}
