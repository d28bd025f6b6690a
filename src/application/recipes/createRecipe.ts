import type { Ingredient } from '@domain/models/Ingredient.ts'
import type { Recipe } from '@domain/models/Recipe.ts'
import { ValidationError } from '@domain/errors.ts'
import { RecipeInputSchema, parseInput } from '@application/validation/schemas.ts'
import { createIngredient } from './createIngredient.ts'

/**
 * Create an immutable recipe. The name is trimmed but keeps its casing.
 * Every ingredient is rebuilt through createIngredient, so plain objects are
 * validated and their names normalized. The same ingredient may appear more
 * than once.
 */
export function createRecipe(name: string, ingredients: readonly Ingredient[]): Recipe {
  if (typeof name !== 'string' || name.trim().length === 0) {
    throw new ValidationError('recipe.name must not be blank', 'name')
  }
  return Object.freeze({
    name: name.trim(),
    ingredients: Object.freeze(ingredients.map((ing) => createIngredient(ing.name, ing.amount, ing.unit))),
  })
}

/**
 * Build a recipe from untyped data (e.g., a parsed JSON document),
 * validating every ingredient along the way.
 */
export function parseRecipe(input: unknown): Recipe {
  const data = parseInput(RecipeInputSchema, input, 'recipe')
  return createRecipe(data.name, data.ingredients)
}
