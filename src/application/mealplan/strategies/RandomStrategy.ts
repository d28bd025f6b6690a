import seedrandom from 'seedrandom'
import type { MealPlan, MealType } from '@domain/models/MealPlan.ts'
import type { Recipe } from '@domain/models/Recipe.ts'
import { ValidationError } from '@domain/errors.ts'
import { assertPlanRequest, fillSlots, type MealPlanStrategy } from './MealPlanStrategy.ts'

/** Returns numbers in [0, 1), like Math.random. */
export type RandomSource = () => number

/**
 * Uniform random pick per slot; the same recipe may fill many slots.
 *
 * Given a numeric seed, each generatePlan call starts a fresh seeded
 * generator, so the same seed and catalog order always give the same plan.
 * An injected source is used as is and keeps advancing across calls.
 */
export class RandomStrategy implements MealPlanStrategy {
  private readonly nextSource: () => RandomSource

  constructor(seedOrSource: number | RandomSource) {
    if (typeof seedOrSource === 'number') {
      if (!Number.isInteger(seedOrSource)) {
        throw new ValidationError('seed must be an integer', 'seed')
      }
      const seed = String(seedOrSource)
      this.nextSource = () => seedrandom(seed)
    } else {
      const source = seedOrSource
      this.nextSource = () => source
    }
  }

  generatePlan(days: number, mealTypes: readonly MealType[], catalog: readonly Recipe[]): MealPlan {
    assertPlanRequest(days, mealTypes, catalog)
    const random = this.nextSource()
    return fillSlots(days, mealTypes, () => catalog[pickIndex(random, catalog.length)])
  }
}

function pickIndex(random: RandomSource, size: number): number {
  // Clamp in case a custom source returns exactly 1
  return Math.min(Math.floor(random() * size), size - 1)
}
