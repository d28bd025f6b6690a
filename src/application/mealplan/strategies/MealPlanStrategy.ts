import type { MealPlan, MealSlot, MealType } from '@domain/models/MealPlan.ts'
import type { Recipe } from '@domain/models/Recipe.ts'
import { isMealType } from '@domain/models/MealPlan.ts'
import { ValidationError } from '@domain/errors.ts'

/**
 * Assigns one catalog recipe to every (day, meal type) slot.
 *
 * Implementations return exactly `days * mealTypes.length` slots in
 * day-major order and never mutate the catalog. Any state they build while
 * filling slots belongs to that single call.
 */
export interface MealPlanStrategy {
  generatePlan(days: number, mealTypes: readonly MealType[], catalog: readonly Recipe[]): MealPlan
}

/** Shared preconditions of every strategy. Throws before any slot is filled. */
export function assertPlanRequest(
  days: number,
  mealTypes: readonly MealType[],
  catalog: readonly Recipe[],
): void {
  if (catalog.length === 0) {
    throw new ValidationError('catalog must not be empty', 'catalog')
  }
  if (!Number.isInteger(days) || days <= 0) {
    throw new ValidationError('days must be a positive integer', 'days')
  }
  if (mealTypes.length === 0) {
    throw new ValidationError('mealTypes must not be empty', 'mealTypes')
  }
  const unknown = mealTypes.find((type) => !isMealType(type))
  if (unknown !== undefined) {
    throw new ValidationError(`mealTypes contains unknown meal type "${String(unknown)}"`, 'mealTypes')
  }
}

/**
 * Walk the slots day by day, in the requested meal-type order, asking
 * `pick` for each one. `pick` runs once per slot, in slot order.
 */
export function fillSlots(
  days: number,
  mealTypes: readonly MealType[],
  pick: (dayIndex: number, mealType: MealType) => Recipe,
): MealPlan {
  const slots: MealSlot[] = []
  for (let dayIndex = 0; dayIndex < days; dayIndex++) {
    for (const mealType of mealTypes) {
      slots.push(Object.freeze({ dayIndex, mealType, recipe: pick(dayIndex, mealType) }))
    }
  }
  return Object.freeze({ slots: Object.freeze(slots) })
}
