import sampleRecipes from './recipes.json'
import samplePrices from './prices.json'
import { parseRecipe } from '@application/recipes/createRecipe.ts'
import { RecipeCatalog } from '@application/catalog/RecipeCatalog.ts'
import { PriceBook } from '@application/pricing/PriceBook.ts'

/** Built-in demo catalog: Eggs, Pasta, Chicken Salad, Fried Rice. */
export function loadSampleCatalog(): RecipeCatalog {
  return new RecipeCatalog(sampleRecipes.map((recipe) => parseRecipe(recipe)))
}

/** Built-in demo prices, per G, ML or PCS. */
export function loadSamplePriceBook(): PriceBook {
  return PriceBook.fromEntries(samplePrices)
}
