import type { MealPlan, MealType } from '@domain/models/MealPlan.ts'
import type { Recipe } from '@domain/models/Recipe.ts'
import type { ShoppingList } from '@domain/models/ShoppingList.ts'
import type { Pantry } from '@application/pantry/Pantry.ts'
import type { MealPlanStrategy } from './strategies/MealPlanStrategy.ts'
import { ValidationError } from '@domain/errors.ts'
import { RecipeCatalog } from '@application/catalog/RecipeCatalog.ts'
import { buildShoppingListFromPlan } from '@application/grocery/subtractPantry.ts'
import { logger } from '@infrastructure/logging/logger.ts'
import { mealTypesForCount } from './mealTypes.ts'

/** Meal types for each day, or just how many meals per day. */
export type MealTypesRequest = readonly MealType[] | number

/**
 * Wires a catalog and a strategy together: plan slots, then turn the plan
 * into a shopping list.
 */
export class MealPlanner {
  readonly catalog: readonly Recipe[]

  constructor(
    catalog: readonly Recipe[] | RecipeCatalog,
    private readonly strategy: MealPlanStrategy,
  ) {
    this.catalog = catalog instanceof RecipeCatalog ? catalog.all() : Object.freeze([...catalog])
    if (this.catalog.length === 0) {
      throw new ValidationError('catalog must not be empty', 'catalog')
    }
  }

  plan(days: number, mealTypes: MealTypesRequest): MealPlan {
    const types = typeof mealTypes === 'number' ? mealTypesForCount(mealTypes) : mealTypes
    const plan = this.strategy.generatePlan(days, types, this.catalog)
    logger.debug(`planned ${plan.slots.length} slots over ${days} day(s)`)
    return plan
  }

  /**
   * Plan, then aggregate every planned recipe. Without a pantry this is the
   * full need; with one, only what is left to buy.
   */
  buildShoppingList(days: number, mealTypes: MealTypesRequest, pantry?: Pantry): ShoppingList {
    const list = buildShoppingListFromPlan(this.plan(days, mealTypes), pantry)
    logger.debug(`shopping list has ${list.items.length} item(s)`)
    return list
  }
}
