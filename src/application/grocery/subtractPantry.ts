import type { MealPlan } from '@domain/models/MealPlan.ts'
import type { ShoppingList, ShoppingListItem } from '@domain/models/ShoppingList.ts'
import type { Pantry } from '@application/pantry/Pantry.ts'
import { buildNeededFromPlan } from './aggregateIngredients.ts'

/** Remainders at or below this are floating-point noise from repeated additions. */
export const FULFILLMENT_EPSILON = 1e-7

/**
 * Subtract pantry stock from the needed totals. Items the pantry fully
 * covers are dropped; the rest keep only the amount still to buy.
 * A pantry entry in another unit family never offsets a need.
 */
export function subtractPantry(need: ShoppingList, pantry: Pantry): ShoppingList {
  const remaining: ShoppingListItem[] = []

  for (const item of need.items) {
    const have = pantry.amountOf(item.name, item.unit)
    const buy = item.totalAmount - have
    if (buy > FULFILLMENT_EPSILON) {
      remaining.push(Object.freeze({ name: item.name, unit: item.unit, totalAmount: buy }))
    }
  }

  return Object.freeze({ items: Object.freeze(remaining) })
}

/** Shopping list for a plan, minus pantry stock when a pantry is given. */
export function buildShoppingListFromPlan(plan: MealPlan, pantry?: Pantry): ShoppingList {
  const need = buildNeededFromPlan(plan)
  return pantry ? subtractPantry(need, pantry) : need
}
