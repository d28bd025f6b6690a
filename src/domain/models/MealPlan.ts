import type { Recipe } from './Recipe.ts'

export const MEAL_TYPES = ['breakfast', 'lunch', 'dinner'] as const

export type MealType = (typeof MEAL_TYPES)[number]

export interface MealSlot {
  readonly dayIndex: number   // 0-based
  readonly mealType: MealType
  readonly recipe: Recipe     // shared reference into the catalog
}

export interface MealPlan {
  /** Day-major, then meal types in the order they were requested. */
  readonly slots: readonly MealSlot[]
}

export function isMealType(value: unknown): value is MealType {
  return typeof value === 'string' && MEAL_TYPES.some((type) => type === value)
}
