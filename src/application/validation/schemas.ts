import { z } from 'zod'
import { UNITS } from '@domain/constants/units.ts'
import { ValidationError } from '@domain/errors.ts'
import { toCanonical } from '@application/units/canonicalUnit.ts'

const nameSchema = z
  .string({ required_error: 'is required', invalid_type_error: 'must be a string' })
  .trim()
  .min(1, 'must not be blank')

const unitSchema = z.enum(UNITS, {
  errorMap: () => ({ message: `must be one of ${UNITS.join(', ')}` }),
})

const amountSchema = z
  .number({ required_error: 'is required', invalid_type_error: 'must be a number' })
  .finite('must be finite')
  .nonnegative('must be >= 0')

export const IngredientInputSchema = z
  .object({
    name: nameSchema,
    amount: amountSchema,
    unit: unitSchema,
  })
  .superRefine((input, ctx) => {
    // 1e306 KG is finite but overflows once expressed in G
    if (!Number.isFinite(toCanonical(input.amount, input.unit))) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['amount'],
        message: 'must be finite in canonical units',
      })
    }
  })

export type IngredientInput = z.infer<typeof IngredientInputSchema>

/** Pantry entries share the ingredient shape: a name, a stocked amount and its unit. */
export const PantryEntrySchema = IngredientInputSchema

export type PantryEntry = z.infer<typeof PantryEntrySchema>

export const PriceEntrySchema = z.object({
  name: nameSchema,
  unit: unitSchema,
  pricePerUnit: amountSchema,
})

export type PriceEntry = z.infer<typeof PriceEntrySchema>

export const RecipeInputSchema = z.object({
  name: nameSchema,
  ingredients: z.array(IngredientInputSchema, {
    required_error: 'is required',
    invalid_type_error: 'must be a list',
  }),
})

export type RecipeInput = z.infer<typeof RecipeInputSchema>

/**
 * Parse untyped input against a schema, converting the first zod issue into
 * a ValidationError such as "ingredient.amount must be >= 0".
 */
export function parseInput<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  context: string,
): z.output<S> {
  const result = schema.safeParse(input)
  if (result.success) return result.data

  const [issue] = result.error.issues
  const path = issue.path.join('.')
  throw new ValidationError(
    path ? `${context}.${path} ${issue.message}` : `${context} ${issue.message}`,
    path || context,
    result.error.issues,
  )
}
