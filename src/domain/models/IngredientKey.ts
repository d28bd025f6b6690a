import type { Unit } from '@domain/constants/units.ts'

/** Identity of an ingredient: normalized name plus unit. */
export interface IngredientKey {
  readonly name: string
  readonly unit: Unit
}

interface Entry<V> {
  readonly key: IngredientKey
  value: V
}

/**
 * Map keyed by (name, unit) pairs, compared structurally.
 * Iteration follows the order in which keys were first inserted.
 */
export class IngredientKeyMap<V> {
  private readonly index = new Map<string, Map<Unit, Entry<V>>>()
  private readonly ordered = new Set<Entry<V>>()

  get size(): number {
    return this.ordered.size
  }

  has(key: IngredientKey): boolean {
    return this.entry(key) !== undefined
  }

  get(key: IngredientKey): V | undefined {
    return this.entry(key)?.value
  }

  set(key: IngredientKey, value: V): this {
    const existing = this.entry(key)
    if (existing) {
      existing.value = value
      return this
    }

    let byUnit = this.index.get(key.name)
    if (!byUnit) {
      byUnit = new Map()
      this.index.set(key.name, byUnit)
    }
    const entry: Entry<V> = { key: { name: key.name, unit: key.unit }, value }
    byUnit.set(key.unit, entry)
    this.ordered.add(entry)
    return this
  }

  delete(key: IngredientKey): boolean {
    const byUnit = this.index.get(key.name)
    const entry = byUnit?.get(key.unit)
    if (!byUnit || !entry) return false

    byUnit.delete(key.unit)
    if (byUnit.size === 0) this.index.delete(key.name)
    this.ordered.delete(entry)
    return true
  }

  *entries(): IterableIterator<[IngredientKey, V]> {
    for (const entry of this.ordered) {
      yield [entry.key, entry.value]
    }
  }

  [Symbol.iterator](): IterableIterator<[IngredientKey, V]> {
    return this.entries()
  }

  clone(): IngredientKeyMap<V> {
    const copy = new IngredientKeyMap<V>()
    for (const entry of this.ordered) {
      copy.set(entry.key, entry.value)
    }
    return copy
  }

  private entry(key: IngredientKey): Entry<V> | undefined {
    return this.index.get(key.name)?.get(key.unit)
  }
}

/** Amounts per canonical ingredient identity. */
export type StockLedger = IngredientKeyMap<number>
