import type { Unit } from '@domain/constants/units.ts'
import type { Ingredient } from '@domain/models/Ingredient.ts'
import type { Recipe } from '@domain/models/Recipe.ts'
import { IngredientKeyMap } from '@domain/models/IngredientKey.ts'
import { PriceEntrySchema, parseInput } from '@application/validation/schemas.ts'
import { normalizeIngredientName } from '@application/grocery/normalizeIngredientName.ts'

/**
 * Unit prices keyed by (normalized name, unit). Prices are looked up in the
 * unit they were recorded in: a price per G says nothing about KG.
 */
export class PriceBook {
  private readonly prices = new IngredientKeyMap<number>()

  /** Build a price book from untyped `{ name, unit, pricePerUnit }` records. */
  static fromEntries(entries: Iterable<unknown>): PriceBook {
    const book = new PriceBook()
    for (const raw of entries) {
      const entry = parseInput(PriceEntrySchema, raw, 'price entry')
      book.add(entry.name, entry.unit, entry.pricePerUnit)
    }
    return book
  }

  get size(): number {
    return this.prices.size
  }

  /** Record (or replace) the price of one unit of an ingredient. */
  add(name: string, unit: Unit, pricePerUnit: number): this {
    const entry = parseInput(PriceEntrySchema, { name, unit, pricePerUnit }, 'price entry')
    this.prices.set({ name: normalizeIngredientName(entry.name), unit: entry.unit }, entry.pricePerUnit)
    return this
  }

  /** Price per unit, or null when the ingredient has no price (0 is a real price). */
  unitPrice(name: string, unit: Unit): number | null {
    return this.prices.get({ name: normalizeIngredientName(name), unit }) ?? null
  }

  priceOf(ingredient: Ingredient): number | null {
    return this.unitPrice(ingredient.name, ingredient.unit)
  }

  /** Sum of amount * unit price; unpriced ingredients contribute nothing. */
  estimateCost(recipe: Recipe): number {
    let total = 0
    for (const ing of recipe.ingredients) {
      const price = this.priceOf(ing)
      if (price !== null) total += price * ing.amount
    }
    return total
  }
}
