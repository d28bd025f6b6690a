import type { MealPlan, MealType } from '@domain/models/MealPlan.ts'
import type { Recipe } from '@domain/models/Recipe.ts'
import type { PriceBook } from '@application/pricing/PriceBook.ts'
import { ValidationError } from '@domain/errors.ts'
import { logger } from '@infrastructure/logging/logger.ts'
import { assertPlanRequest, fillSlots, type MealPlanStrategy } from './MealPlanStrategy.ts'

/** Cost given to recipes the price book values at exactly 0. */
export const NOMINAL_RECIPE_COST = 1.0

/** Slack when comparing a recipe cost against the remaining budget. */
export const BUDGET_EPSILON = 1e-9

interface RankedRecipe {
  recipe: Recipe
  index: number  // position in the catalog
  cost: number
}

/**
 * Greedy planner that spends the budget on the most expensive recipes that
 * still fit. When nothing fits, the cheapest recipe is used anyway: the
 * budget guides the choice but a full plan is always returned.
 *
 * Equal costs are ordered by catalog position, and the fallback is the
 * first catalog recipe with the lowest cost.
 */
export class BudgetAwareStrategy implements MealPlanStrategy {
  constructor(
    private readonly priceBook: PriceBook,
    private readonly budget: number,
  ) {
    if (!Number.isFinite(budget) || budget <= 0) {
      throw new ValidationError('budget must be > 0', 'budget')
    }
  }

  estimateRecipeCost(recipe: Recipe): number {
    const cost = this.priceBook.estimateCost(recipe)
    return cost === 0 ? NOMINAL_RECIPE_COST : cost
  }

  generatePlan(days: number, mealTypes: readonly MealType[], catalog: readonly Recipe[]): MealPlan {
    assertPlanRequest(days, mealTypes, catalog)

    const ranked: RankedRecipe[] = catalog
      .map((recipe, index) => ({ recipe, index, cost: this.estimateRecipeCost(recipe) }))
      .sort((a, b) => b.cost - a.cost || a.index - b.index)

    const cheapest = ranked.reduce((min, candidate) =>
      candidate.cost < min.cost || (candidate.cost === min.cost && candidate.index < min.index)
        ? candidate
        : min,
    )

    let spent = 0

    return fillSlots(days, mealTypes, (dayIndex, mealType) => {
      const remaining = this.budget - spent
      const fitting = remaining > 0
        ? ranked.find((candidate) => candidate.cost <= remaining + BUDGET_EPSILON)
        : undefined

      if (!fitting) {
        logger.debug(
          `budget: nothing fits ${remaining.toFixed(2)} remaining for day ${dayIndex} ${mealType}, ` +
            `falling back to ${cheapest.recipe.name}`,
        )
      }

      const chosen = fitting ?? cheapest
      spent += chosen.cost
      return chosen.recipe
    })
  }
}
