export { UNITS, isUnit, type Unit, type UnitFamily } from '@domain/constants/units.ts'
export type { Ingredient } from '@domain/models/Ingredient.ts'
export type { Recipe } from '@domain/models/Recipe.ts'
export { MEAL_TYPES, isMealType, type MealPlan, type MealSlot, type MealType } from '@domain/models/MealPlan.ts'
export type { ShoppingList, ShoppingListItem } from '@domain/models/ShoppingList.ts'
export { IngredientKeyMap, type IngredientKey, type StockLedger } from '@domain/models/IngredientKey.ts'
export { ValidationError, ConfigError, type PlannerErrorCode } from '@domain/errors.ts'

export { areConvertible, canonicalUnit, toCanonical, unitFamily } from '@application/units/canonicalUnit.ts'
export { createIngredient, sameIngredient, withAmount } from '@application/recipes/createIngredient.ts'
export { createRecipe, parseRecipe } from '@application/recipes/createRecipe.ts'
export {
  aggregateIngredients,
  buildNeededFromPlan,
  createShoppingListBuilder,
  type ShoppingListBuilder,
} from '@application/grocery/aggregateIngredients.ts'
export {
  FULFILLMENT_EPSILON,
  buildShoppingListFromPlan,
  subtractPantry,
} from '@application/grocery/subtractPantry.ts'
export { Pantry } from '@application/pantry/Pantry.ts'
export { PriceBook } from '@application/pricing/PriceBook.ts'
export { RecipeCatalog } from '@application/catalog/RecipeCatalog.ts'
export type { MealPlanStrategy } from '@application/mealplan/strategies/MealPlanStrategy.ts'
export { RandomStrategy, type RandomSource } from '@application/mealplan/strategies/RandomStrategy.ts'
export { PantryFirstStrategy, missingAmount } from '@application/mealplan/strategies/PantryFirstStrategy.ts'
export {
  BUDGET_EPSILON,
  BudgetAwareStrategy,
  NOMINAL_RECIPE_COST,
} from '@application/mealplan/strategies/BudgetAwareStrategy.ts'
export { MealPlanner, type MealTypesRequest } from '@application/mealplan/MealPlanner.ts'
export { mealTypesForCount } from '@application/mealplan/mealTypes.ts'
export { createMealPlanner, createStrategy, type StrategyDeps } from '@application/mealplan/createStrategy.ts'

export { loadPlannerConfig, type PlannerConfig, type StrategyKind } from '@infrastructure/config/plannerConfig.ts'
export { logger, setLogLevel, type LogLevel } from '@infrastructure/logging/logger.ts'
export { loadSampleCatalog, loadSamplePriceBook } from '@infrastructure/samples/loadSamples.ts'
