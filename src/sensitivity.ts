import { adoptedUnits } from './demand'
import { computePnL } from './finance'
import { parseInput, quantitySchema, rateSchema, unitsSchema } from './schema'
import type { LineEconomics, Money, SensitivityRow } from './types'

export const DEFAULT_ADOPTION_RATES = [0.15, 0.25, 0.4] as const

/**
 * Sweeps B2B adoption with B2C volume held fixed. Rows follow the input order;
 * duplicate rates give duplicate rows and a zero rate is kept.
 */
export function sensitivity(
  annualUnits: number,
  adoptionRates: readonly number[],
  fixedB2cUnits: number,
  economics: LineEconomics,
  totalFixedCost: Money,
): SensitivityRow[] {
  parseInput(quantitySchema, annualUnits, 'annual_units')
  parseInput(unitsSchema, fixedB2cUnits, 'fixed_b2c_units')
  adoptionRates.forEach((rate, i) => parseInput(rateSchema, rate, `adoption_rates.${i}`))
  return adoptionRates.map(rate => {
    const p = computePnL({ b2b: adoptedUnits(annualUnits, rate), b2c: fixedB2cUnits }, economics, totalFixedCost)
    return {
      adoption_rate: rate,
      b2b_units: p.b2b_units,
      b2c_units: p.b2c_units,
      revenue: p.revenue,
      gross_profit: p.gross_profit,
      ebit: p.ebit,
      ebit_margin_pct: p.ebit_margin_pct,
    }
  })
}
