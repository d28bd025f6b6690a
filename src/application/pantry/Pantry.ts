import type { Unit } from '@domain/constants/units.ts'
import { IngredientKeyMap, type StockLedger } from '@domain/models/IngredientKey.ts'
import { PantryEntrySchema, parseInput } from '@application/validation/schemas.ts'
import { normalizeIngredientName } from '@application/grocery/normalizeIngredientName.ts'
import { canonicalUnit, toCanonical } from '@application/units/canonicalUnit.ts'

/**
 * Stock on hand, keyed by (normalized name, canonical unit).
 * Adding 1 L of milk and 250 ML of milk leaves 1250 ML of milk.
 */
export class Pantry {
  private readonly stock: StockLedger = new IngredientKeyMap<number>()

  /** Build a pantry from untyped `{ name, amount, unit }` records. */
  static fromEntries(entries: Iterable<unknown>): Pantry {
    const pantry = new Pantry()
    for (const raw of entries) {
      const entry = parseInput(PantryEntrySchema, raw, 'pantry entry')
      pantry.add(entry.name, entry.amount, entry.unit)
    }
    return pantry
  }

  get size(): number {
    return this.stock.size
  }

  /**
   * Add stock, merging with whatever is already held for the same identity.
   *
   * @throws ValidationError for a blank name, an unknown unit, or a
   *   negative or non-finite amount
   */
  add(name: string, amount: number, unit: Unit): this {
    const input = parseInput(PantryEntrySchema, { name, amount, unit }, 'pantry entry')
    const key = { name: normalizeIngredientName(input.name), unit: canonicalUnit(input.unit) }
    const added = toCanonical(input.amount, input.unit)
    this.stock.set(key, (this.stock.get(key) ?? 0) + added)
    return this
  }

  /** Stock held for the name, in the canonical unit of `unit`'s family. 0 when absent. */
  amountOf(name: string, unit: Unit): number {
    return this.stock.get({ name: normalizeIngredientName(name), unit: canonicalUnit(unit) }) ?? 0
  }

  /** Detached copy of the stock; changing it does not touch the pantry. */
  snapshot(): StockLedger {
    return this.stock.clone()
  }
}
