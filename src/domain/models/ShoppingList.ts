import type { Unit } from '@domain/constants/units.ts'

export interface ShoppingListItem {
  readonly name: string         // normalized name (aggregation key)
  readonly unit: Unit           // canonical unit of the family
  readonly totalAmount: number  // in `unit`, never negative
}

export interface ShoppingList {
  /** First-seen order from aggregation. Sorting is left to the caller. */
  readonly items: readonly ShoppingListItem[]
}
