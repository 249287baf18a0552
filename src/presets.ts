import { toMinor } from './money'
import { createAssumptionSet } from './schema'
import type { AssumptionInput, AssumptionSet, View } from './types'
import { DEFAULT_ADOPTION_RATES } from './sensitivity'

// Dubai launch case, AED
export function dubaiPreset(): AssumptionInput {
  return {
    market: {
      active_bikes: 40000,
      bags_per_bike_per_year: 1.5, // heat wear; 1–2 bags/year is typical
    },
    b2b: {
      price: toMinor(450),
      pilot_price: toMinor(399),
      cogs: toMinor(200), // retrofit of existing boxes
    },
    b2c: {
      price: toMinor(599),
      pilot_price: toMinor(499),
      cogs: toMinor(305),
    },
    adoption_rate: {
      Pessimistic: 0.05,
      Base: 0.1,
      Optimistic: 0.2,
    },
    fixed_costs: {
      salaries: toMinor(360000),
      marketing: toMinor(90000),
      rnd: toMinor(40000),
      operations: toMinor(120000),
      other: toMinor(30000),
    },
    pilot_volumes: { b2b: 400, b2c: 200 },
    year1_b2c_volume: {
      Pessimistic: 600,
      Base: 900,
      Optimistic: 1200,
    },
  }
}

export function defaultAssumptions(): AssumptionSet {
  return createAssumptionSet(dubaiPreset())
}

export function defaultView(): View {
  return {
    breakeven_scenario: 'Base',
    sensitivity_rates: [...DEFAULT_ADOPTION_RATES],
    sensitivity_b2c_units: 900,
  }
}

export const FIXED_COST_LABELS: Record<string, string> = {
  salaries: "Salaries & founders' compensation",
  marketing: 'Brand & performance marketing',
  rnd: 'Product development & R&D',
  operations: 'Operations, logistics & office',
  other: 'Other (legal, accounting)',
}

export const MARKET_NARRATIVE: string[] = [
  'Focus geography: Dubai only.',
  'Demand driver: food delivery, quick-commerce and outdoor lifestyle.',
  'B2B: retrofit of existing delivery boxes.',
  'B2C: beach-lite box for families and tourists.',
]
