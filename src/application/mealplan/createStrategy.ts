import type { Recipe } from '@domain/models/Recipe.ts'
import type { PlannerConfig } from '@infrastructure/config/plannerConfig.ts'
import type { MealPlanStrategy } from './strategies/MealPlanStrategy.ts'
import type { RecipeCatalog } from '@application/catalog/RecipeCatalog.ts'
import { ValidationError } from '@domain/errors.ts'
import { Pantry } from '@application/pantry/Pantry.ts'
import { PriceBook } from '@application/pricing/PriceBook.ts'
import { setLogLevel } from '@infrastructure/logging/logger.ts'
import { RandomStrategy } from './strategies/RandomStrategy.ts'
import { PantryFirstStrategy } from './strategies/PantryFirstStrategy.ts'
import { BudgetAwareStrategy } from './strategies/BudgetAwareStrategy.ts'
import { MealPlanner } from './MealPlanner.ts'

export interface StrategyDeps {
  pantry?: Pantry
  priceBook?: PriceBook
}

/**
 * Build the strategy named by the config. The pantry-first strategy plans
 * against an empty pantry when none is given; the budget strategy needs a
 * budget and uses an empty price book when none is given.
 */
export function createStrategy(
  config: Pick<PlannerConfig, 'strategy' | 'seed' | 'budget'>,
  deps: StrategyDeps = {},
): MealPlanStrategy {
  switch (config.strategy) {
    case 'random':
      return new RandomStrategy(config.seed)
    case 'pantry-first':
      return new PantryFirstStrategy(deps.pantry ?? new Pantry())
    case 'budget':
      if (config.budget === undefined) {
        throw new ValidationError('budget is required for the budget strategy', 'budget')
      }
      return new BudgetAwareStrategy(deps.priceBook ?? new PriceBook(), config.budget)
    default: {
      const exhaustive: never = config.strategy
      throw new ValidationError(`unknown strategy "${String(exhaustive)}"`, 'strategy')
    }
  }
}

/** Planner for the configured strategy; also applies the configured log level. */
export function createMealPlanner(
  catalog: readonly Recipe[] | RecipeCatalog,
  config: PlannerConfig,
  deps: StrategyDeps = {},
): MealPlanner {
  setLogLevel(config.logLevel)
  return new MealPlanner(catalog, createStrategy(config, deps))
}
