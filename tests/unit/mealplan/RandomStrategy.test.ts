import { describe, it, expect, vi } from 'vitest'
import { RandomStrategy } from '@application/mealplan/strategies/RandomStrategy.ts'
import { createIngredient } from '@application/recipes/createIngredient.ts'
import { createRecipe } from '@application/recipes/createRecipe.ts'
import { ValidationError } from '@domain/errors.ts'
import type { MealPlan } from '@domain/models/MealPlan.ts'

const catalog = ['Eggs', 'Pasta', 'Salad', 'Rice', 'Soup'].map((name) =>
  createRecipe(name, [createIngredient(name, 1, 'PCS')]),
)

function names(plan: MealPlan): string[] {
  return plan.slots.map((slot) => slot.recipe.name)
}

describe('RandomStrategy', () => {
  it('fills days * meal types slots in day-major order', () => {
    const plan = new RandomStrategy(42).generatePlan(3, ['breakfast', 'dinner'], catalog)

    expect(plan.slots).toHaveLength(6)
    expect(plan.slots.map((s) => [s.dayIndex, s.mealType])).toEqual([
      [0, 'breakfast'],
      [0, 'dinner'],
      [1, 'breakfast'],
      [1, 'dinner'],
      [2, 'breakfast'],
      [2, 'dinner'],
    ])
  })

  it('produces the same plan for the same seed', () => {
    const a = new RandomStrategy(7).generatePlan(5, ['lunch', 'dinner'], catalog)
    const b = new RandomStrategy(7).generatePlan(5, ['lunch', 'dinner'], catalog)
    expect(names(a)).toEqual(names(b))
  })

  it('repeats itself across calls on one seeded instance', () => {
    const strategy = new RandomStrategy(123)
    const first = strategy.generatePlan(4, ['lunch'], catalog)
    const second = strategy.generatePlan(4, ['lunch'], catalog)
    expect(names(first)).toEqual(names(second))
  })

  it('uses catalog references, not copies', () => {
    const plan = new RandomStrategy(1).generatePlan(2, ['lunch'], catalog)
    for (const slot of plan.slots) {
      expect(catalog).toContain(slot.recipe)
    }
  })

  it('maps the injected source onto catalog indexes', () => {
    const values = [0, 0.99, 0.5, 0.2]
    const source = vi.fn(() => values.shift() ?? 0)
    const plan = new RandomStrategy(source).generatePlan(2, ['lunch', 'dinner'], catalog)

    expect(names(plan)).toEqual(['Eggs', 'Soup', 'Salad', 'Pasta'])
    expect(source).toHaveBeenCalledTimes(4)
  })

  it('clamps a source that returns 1', () => {
    const plan = new RandomStrategy(() => 1).generatePlan(1, ['lunch'], catalog)
    expect(names(plan)).toEqual(['Soup'])
  })

  it('does not mutate the catalog', () => {
    const before = [...catalog]
    new RandomStrategy(3).generatePlan(3, ['lunch'], catalog)
    expect(catalog).toEqual(before)
  })

  it('rejects invalid requests', () => {
    const strategy = new RandomStrategy(1)
    expect(() => strategy.generatePlan(1, ['lunch'], [])).toThrow('catalog must not be empty')
    expect(() => strategy.generatePlan(0, ['lunch'], catalog)).toThrow('days must be a positive integer')
    expect(() => strategy.generatePlan(-2, ['lunch'], catalog)).toThrow(ValidationError)
    expect(() => strategy.generatePlan(1.5, ['lunch'], catalog)).toThrow(ValidationError)
    expect(() => strategy.generatePlan(1, [], catalog)).toThrow('mealTypes must not be empty')
  })

  it('rejects non-integer seeds', () => {
    expect(() => new RandomStrategy(1.5)).toThrow('seed must be an integer')
  })
})
