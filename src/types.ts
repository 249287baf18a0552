export const SCENARIOS = ['Pessimistic', 'Base', 'Optimistic'] as const

export type Scenario = (typeof SCENARIOS)[number]

export type PerScenario<T> = Record<Scenario, T>

export type Phase = 'pilot' | 'year1'

export type ProductLine = 'b2b' | 'b2c'

// Currency amounts are integer minor units (fils) throughout.
export type Money = number

export type Market = {
  active_bikes: number
  bags_per_bike_per_year: number
}

export type ProductEconomics = {
  price: Money // launch price
  pilot_price?: Money // falls back to price
  cogs: Money
}

export type Volumes = {
  b2b: number
  b2c: number
}

export type AssumptionInput = {
  market: Market
  b2b: ProductEconomics
  b2c: ProductEconomics
  adoption_rate: PerScenario<number> // fraction of annual bag demand, B2B
  fixed_costs: Record<string, Money> // annual
  pilot_volumes: Volumes
  year1_b2c_volume: PerScenario<number>
}

export type AssumptionSet = {
  readonly [K in keyof AssumptionInput]: Readonly<AssumptionInput[K]>
}

export type UnitEconomics = {
  price: Money
  cogs: Money
}

export type LineEconomics = Record<ProductLine, UnitEconomics>

export type PnL = {
  b2b_units: number
  b2c_units: number
  total_units: number
  revenue: Money
  total_cogs: Money
  gross_profit: Money
  gross_margin_pct: number | null // null when revenue is 0
  fixed_costs: Money
  ebit: Money
  ebit_margin_pct: number | null
}

export type ScenarioResult = PnL & { scenario: Scenario }

export type SensitivityRow = {
  adoption_rate: number
  b2b_units: number
  b2c_units: number
  revenue: Money
  gross_profit: Money
  ebit: Money
  ebit_margin_pct: number | null
}

export type Breakeven =
  | { kind: 'reachable'; units: number }
  | { kind: 'unreachable'; reason: 'zero_margin' | 'negative_margin' }

export type UnitRange = {
  start: number
  end: number
  points: number
}

export type ProfitPoint = {
  units: number
  cumulative_profit: Money
}

export type BreakevenSummary = {
  scenario: Scenario
  contribution_per_unit: number // fractional for a blended mix
  breakeven: Breakeven
  profit_curve: (range: UnitRange) => Iterable<ProfitPoint>
}

export type View = {
  breakeven_scenario: Scenario
  sensitivity_rates: number[]
  sensitivity_b2c_units: number
}

export type Computed = {
  annual_units: number
  total_fixed_costs: Money
  pilot: PnL
  year1: ScenarioResult[]
  breakeven: BreakevenSummary
  breakeven_b2b_units: number | null
  curve: ProfitPoint[]
  sensitivity: SensitivityRow[]
}

export const CHART = {
  curve_points: 50,
  curve_multiple: 1.5, // chart past breakeven for readability
}
