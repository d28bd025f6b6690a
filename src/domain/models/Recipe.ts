import type { Ingredient } from './Ingredient.ts'

export interface Recipe {
  readonly name: string
  readonly ingredients: readonly Ingredient[]
}
