import { describe, it, expect } from 'vitest'
import {
  aggregateIngredients,
  buildNeededFromPlan,
  createShoppingListBuilder,
} from '@application/grocery/aggregateIngredients.ts'
import { createIngredient } from '@application/recipes/createIngredient.ts'
import { createRecipe } from '@application/recipes/createRecipe.ts'
import type { Recipe } from '@domain/models/Recipe.ts'
import type { ShoppingList } from '@domain/models/ShoppingList.ts'

function totalsOf(list: ShoppingList): Record<string, number> {
  const totals: Record<string, number> = {}
  for (const item of list.items) {
    totals[`${item.name} ${item.unit}`] = item.totalAmount
  }
  return totals
}

const cereal = createRecipe('Cereal', [
  createIngredient('Milk', 100, 'ML'),
  createIngredient('Oats', 50, 'G'),
])
const latte = createRecipe('Latte', [
  createIngredient('milk', 200, 'ML'),
  createIngredient('Coffee', 18, 'G'),
])
const pancakes = createRecipe('Pancakes', [
  createIngredient('Flour', 0.2, 'KG'),
  createIngredient('Egg', 2, 'PCS'),
  createIngredient('Milk', 0.3, 'L'),
])

describe('aggregateIngredients', () => {
  it('sums the same ingredient across recipes', () => {
    const list = aggregateIngredients([
      createRecipe('A', [createIngredient('Milk', 100, 'ML')]),
      createRecipe('B', [createIngredient('Milk', 200, 'ML')]),
    ])
    expect(list.items).toEqual([{ name: 'milk', unit: 'ML', totalAmount: 300 }])
  })

  it('converts to canonical units before merging', () => {
    const list = aggregateIngredients([cereal, pancakes])
    const totals = totalsOf(list)
    expect(totals['milk ML']).toBeCloseTo(400, 9)
    expect(totals['flour G']).toBeCloseTo(200, 9)
    expect(totals['egg PCS']).toBe(2)
  })

  it('keeps mass and volume of the same name as separate rows', () => {
    const list = aggregateIngredients([
      createRecipe('A', [createIngredient('Flour', 1, 'L')]),
      createRecipe('B', [createIngredient('Flour', 200, 'G')]),
    ])
    expect(list.items).toEqual([
      { name: 'flour', unit: 'ML', totalAmount: 1000 },
      { name: 'flour', unit: 'G', totalAmount: 200 },
    ])
  })

  it('preserves first-seen order', () => {
    const list = aggregateIngredients([cereal, latte])
    expect(list.items.map((i) => i.name)).toEqual(['milk', 'oats', 'coffee'])
  })

  it('sums duplicate ingredients within one recipe', () => {
    const list = aggregateIngredients([
      createRecipe('Egg Twice', [createIngredient('egg', 1, 'PCS'), createIngredient('Egg', 2, 'PCS')]),
    ])
    expect(list.items).toEqual([{ name: 'egg', unit: 'PCS', totalAmount: 3 }])
  })

  it('gives the same totals for any recipe order', () => {
    const orders: Recipe[][] = [
      [cereal, latte, pancakes],
      [pancakes, cereal, latte],
      [latte, pancakes, cereal],
    ]
    const expected = totalsOf(aggregateIngredients(orders[0]))
    for (const order of orders.slice(1)) {
      const totals = totalsOf(aggregateIngredients(order))
      expect(Object.keys(totals).sort()).toEqual(Object.keys(expected).sort())
      for (const key of Object.keys(expected)) {
        expect(totals[key]).toBeCloseTo(expected[key], 9)
      }
    }
  })

  it('gives the same totals for any ingredient order within a recipe', () => {
    const ingredients = [
      createIngredient('Milk', 0.3, 'L'),
      createIngredient('Flour', 200, 'G'),
      createIngredient('milk', 150, 'ML'),
      createIngredient('Egg', 2, 'PCS'),
      createIngredient('flour', 0.05, 'KG'),
    ]
    const expected = totalsOf(aggregateIngredients([createRecipe('Batter', ingredients)]))
    const permutations = [
      [ingredients[4], ingredients[3], ingredients[2], ingredients[1], ingredients[0]],
      [ingredients[2], ingredients[0], ingredients[4], ingredients[3], ingredients[1]],
      [ingredients[3], ingredients[1], ingredients[0], ingredients[4], ingredients[2]],
    ]
    for (const order of permutations) {
      const totals = totalsOf(aggregateIngredients([createRecipe('Batter', order)]))
      expect(Object.keys(totals).sort()).toEqual(['egg PCS', 'flour G', 'milk ML'])
      for (const key of Object.keys(expected)) {
        expect(totals[key]).toBeCloseTo(expected[key], 9)
      }
    }
    expect(expected['milk ML']).toBeCloseTo(450, 9)
    expect(expected['flour G']).toBeCloseTo(250, 9)
    expect(expected['egg PCS']).toBe(2)
  })

  it('returns an empty list for no recipes', () => {
    expect(aggregateIngredients([]).items).toEqual([])
  })
})

describe('createShoppingListBuilder', () => {
  it('supports chaining and repeated builds', () => {
    const builder = createShoppingListBuilder().addRecipe(cereal)
    const first = builder.build()
    builder.addRecipes([cereal])
    const second = builder.build()

    expect(totalsOf(first)['milk ML']).toBe(100)
    expect(totalsOf(second)['milk ML']).toBe(200)
  })
})

describe('buildNeededFromPlan', () => {
  it('counts a recipe once per slot', () => {
    const list = buildNeededFromPlan({
      slots: [
        { dayIndex: 0, mealType: 'breakfast', recipe: cereal },
        { dayIndex: 1, mealType: 'breakfast', recipe: cereal },
      ],
    })
    expect(totalsOf(list)).toEqual({ 'milk ML': 200, 'oats G': 100 })
  })
})
