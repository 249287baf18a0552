import { z } from 'zod'
import { InvalidInputError } from './errors'
import type { AssumptionInput, AssumptionSet, LineEconomics, UnitEconomics, UnitRange, Volumes } from './types'

export const moneySchema = z
  .number()
  .int('must be a whole number of minor units')
  .nonnegative('must be >= 0')

export const unitsSchema = z
  .number()
  .int('must be a whole number of units')
  .nonnegative('must be >= 0')

export const quantitySchema = z.number().finite('must be finite').nonnegative('must be >= 0')

export const rateSchema = z.number().min(0, 'must be within [0, 1]').max(1, 'must be within [0, 1]')

function perScenario<T extends z.ZodTypeAny>(value: T) {
  return z.object({ Pessimistic: value, Base: value, Optimistic: value }).strict()
}

const productSchema = z
  .object({
    price: moneySchema,
    pilot_price: moneySchema.optional(),
    cogs: moneySchema,
  })
  .strict()

// Derived B2B volume (annual demand × rate) need not be whole
export const volumesSchema: z.ZodType<Volumes, z.ZodTypeDef, unknown> = z
  .object({ b2b: quantitySchema, b2c: unitsSchema })
  .strict()

export const unitEconomicsSchema: z.ZodType<UnitEconomics, z.ZodTypeDef, unknown> = z
  .object({ price: moneySchema, cogs: moneySchema })
  .strict()

export const lineEconomicsSchema: z.ZodType<LineEconomics, z.ZodTypeDef, unknown> = z
  .object({ b2b: unitEconomicsSchema, b2c: unitEconomicsSchema })
  .strict()

export const unitRangeSchema: z.ZodType<UnitRange, z.ZodTypeDef, unknown> = z
  .object({
    start: unitsSchema,
    end: unitsSchema,
    points: z.number().int('must be a whole number').min(2, 'must be >= 2'),
  })
  .strict()
  .superRefine((value, context) => {
    if (value.end < value.start) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['end'],
        message: 'must be >= start',
      })
    }
  })

export const assumptionSchema: z.ZodType<AssumptionInput, z.ZodTypeDef, unknown> = z
  .object({
    market: z
      .object({
        active_bikes: unitsSchema,
        bags_per_bike_per_year: quantitySchema,
      })
      .strict(),
    b2b: productSchema,
    b2c: productSchema,
    adoption_rate: perScenario(rateSchema),
    fixed_costs: z.record(z.string(), moneySchema),
    pilot_volumes: z.object({ b2b: unitsSchema, b2c: unitsSchema }).strict(),
    year1_b2c_volume: perScenario(unitsSchema),
  })
  .strict()

export function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, label: string): T {
  const result = schema.safeParse(value)
  if (!result.success) throw InvalidInputError.fromZod(result.error, label)
  return result.data
}

/**
 * Validates raw inputs and returns a frozen snapshot. A changed input means a
 * new set; downstream code never writes to one.
 */
export function createAssumptionSet(input: AssumptionInput): AssumptionSet {
  const p = parseInput(assumptionSchema, input, 'assumptions')
  return Object.freeze({
    market: Object.freeze({ ...p.market }),
    b2b: Object.freeze({ ...p.b2b }),
    b2c: Object.freeze({ ...p.b2c }),
    adoption_rate: Object.freeze({ ...p.adoption_rate }),
    fixed_costs: Object.freeze({ ...p.fixed_costs }),
    pilot_volumes: Object.freeze({ ...p.pilot_volumes }),
    year1_b2c_volume: Object.freeze({ ...p.year1_b2c_volume }),
  })
}

export function toInput(a: AssumptionSet): AssumptionInput {
  return {
    market: { ...a.market },
    b2b: { ...a.b2b },
    b2c: { ...a.b2c },
    adoption_rate: { ...a.adoption_rate },
    fixed_costs: { ...a.fixed_costs },
    pilot_volumes: { ...a.pilot_volumes },
    year1_b2c_volume: { ...a.year1_b2c_volume },
  }
}
