import type { Recipe } from '@domain/models/Recipe.ts'
import type { MealPlan } from '@domain/models/MealPlan.ts'
import type { ShoppingList, ShoppingListItem } from '@domain/models/ShoppingList.ts'
import { IngredientKeyMap } from '@domain/models/IngredientKey.ts'
import { canonicalize } from '@application/units/canonicalUnit.ts'

export interface ShoppingListBuilder {
  addRecipe(recipe: Recipe): ShoppingListBuilder
  addRecipes(recipes: Iterable<Recipe>): ShoppingListBuilder
  build(): ShoppingList
}

/**
 * Accumulates the canonical totals of every ingredient added through
 * recipes. Amounts of the same (name, canonical unit) are summed; mass and
 * volume of the same name stay separate rows.
 */
export function createShoppingListBuilder(): ShoppingListBuilder {
  const totals = new IngredientKeyMap<number>()

  const builder: ShoppingListBuilder = {
    addRecipe(recipe) {
      for (const ing of recipe.ingredients) {
        const { key, amount } = canonicalize(ing)
        totals.set(key, (totals.get(key) ?? 0) + amount)
      }
      return builder
    },

    addRecipes(recipes) {
      for (const recipe of recipes) builder.addRecipe(recipe)
      return builder
    },

    build() {
      const items: ShoppingListItem[] = []
      for (const [key, totalAmount] of totals) {
        items.push(Object.freeze({ name: key.name, unit: key.unit, totalAmount }))
      }
      return Object.freeze({ items: Object.freeze(items) })
    },
  }

  return builder
}

/** Aggregate the ingredients of several recipes into one shopping list. */
export function aggregateIngredients(recipes: Iterable<Recipe>): ShoppingList {
  return createShoppingListBuilder().addRecipes(recipes).build()
}

/**
 * Total need of a plan. Every slot counts, so a recipe planned twice
 * contributes its ingredients twice.
 */
export function buildNeededFromPlan(plan: MealPlan): ShoppingList {
  return aggregateIngredients(plan.slots.map((slot) => slot.recipe))
}
