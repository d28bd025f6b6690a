import type { MealType } from '@domain/models/MealPlan.ts'
import { ValidationError } from '@domain/errors.ts'

/**
 * Default meal types for a number of meals per day:
 * the first meal is lunch, every later one is dinner.
 */
export function mealTypesForCount(mealsPerDay: number): MealType[] {
  if (!Number.isInteger(mealsPerDay) || mealsPerDay <= 0) {
    throw new ValidationError('mealsPerDay must be a positive integer', 'mealsPerDay')
  }
  return Array.from({ length: mealsPerDay }, (_, i): MealType => (i === 0 ? 'lunch' : 'dinner'))
}
