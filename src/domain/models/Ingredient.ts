import type { Unit } from '@domain/constants/units.ts'

/**
 * A quantity of one ingredient. `name` is already normalized (trimmed,
 * lowercased). Two ingredients are the same ingredient when name and unit
 * match; amount is not part of identity so occurrences can be summed.
 */
export interface Ingredient {
  readonly name: string
  readonly amount: number
  readonly unit: Unit
}
