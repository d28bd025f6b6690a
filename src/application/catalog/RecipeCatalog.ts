import type { Recipe } from '@domain/models/Recipe.ts'

/** Ordered, read-only collection of recipes to plan from. */
export class RecipeCatalog {
  private readonly recipes: readonly Recipe[]

  constructor(recipes: Iterable<Recipe>) {
    this.recipes = Object.freeze([...recipes])
  }

  all(): readonly Recipe[] {
    return this.recipes
  }

  get size(): number {
    return this.recipes.length
  }

  /** New catalog with the recipe appended; this one is unchanged. */
  plus(recipe: Recipe): RecipeCatalog {
    return new RecipeCatalog([...this.recipes, recipe])
  }

  find(name: string): Recipe | undefined {
    const wanted = name.trim().toLowerCase()
    return this.recipes.find((recipe) => recipe.name.toLowerCase() === wanted)
  }
}
