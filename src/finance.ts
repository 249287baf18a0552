import { scenarioVolumes } from './demand'
import { getEffective } from './effects'
import { formatAed, formatUnits } from './money'
import { lineEconomicsSchema, moneySchema, parseInput, volumesSchema } from './schema'
import { SCENARIOS } from './types'
import type {
  AssumptionSet,
  Computed,
  LineEconomics,
  Money,
  Phase,
  PnL,
  ScenarioResult,
  Volumes,
} from './types'

export function sumFixedCosts(fixed: Readonly<Record<string, Money>>): Money {
  return Object.values(fixed).reduce((acc, v) => acc + v, 0)
}

export function marginPct(part: Money, revenue: Money): number | null {
  return revenue > 0 ? (part / revenue) * 100 : null
}

/**
 * Revenue, gross profit and EBIT for a B2B/B2C volume pair. Loss-making
 * results are returned as-is; only malformed inputs are rejected.
 */
export function computePnL(volume: Volumes, economics: LineEconomics, totalFixedCost: Money): PnL {
  const v = parseInput(volumesSchema, volume, 'volume')
  const e = parseInput(lineEconomicsSchema, economics, 'economics')
  const fixed = parseInput(moneySchema, totalFixedCost, 'total_fixed_cost')

  // B2B volume can be fractional, so each line is rounded to the fil
  const revenue = Math.round(v.b2b * e.b2b.price) + Math.round(v.b2c * e.b2c.price)
  const totalCogs = Math.round(v.b2b * e.b2b.cogs) + Math.round(v.b2c * e.b2c.cogs)
  const grossProfit = revenue - totalCogs
  const ebit = grossProfit - fixed

  return {
    b2b_units: v.b2b,
    b2c_units: v.b2c,
    total_units: v.b2b + v.b2c,
    revenue,
    total_cogs: totalCogs,
    gross_profit: grossProfit,
    gross_margin_pct: marginPct(grossProfit, revenue),
    fixed_costs: fixed,
    ebit,
    ebit_margin_pct: marginPct(ebit, revenue),
  }
}

export function pilotPnL(a: AssumptionSet): PnL {
  return computePnL(a.pilot_volumes, getEffective(a, 'pilot'), sumFixedCosts(a.fixed_costs))
}

// Always Pessimistic, Base, Optimistic
export function scenarioPnL(a: AssumptionSet, phase: Phase): ScenarioResult[] {
  const economics = getEffective(a, phase)
  const fixed = sumFixedCosts(a.fixed_costs)
  return SCENARIOS.map(scenario => ({
    scenario,
    ...computePnL(scenarioVolumes(a, phase, scenario), economics, fixed),
  }))
}

// Gross profit per unit sold, null when nothing is sold
export function grossProfitPerUnit(p: PnL): number | null {
  return p.total_units > 0 ? p.gross_profit / p.total_units : null
}

export function buildNarrative(a: AssumptionSet, computed: Computed): string {
  const base = computed.year1.find(r => r.scenario === 'Base')
  if (!base) return ''
  const be = computed.breakeven.breakeven
  const beText = be.kind === 'reachable'
    ? `breaks even at ${formatUnits(be.units)} units`
    : 'does not break even at these assumptions'
  return `With ${formatUnits(computed.annual_units)} bags/year in demand and ${(a.adoption_rate.Base * 100).toFixed(0)}% B2B adoption, the Base case sells ${formatUnits(base.total_units)} units for ${formatAed(base.revenue)} AED revenue and ${formatAed(base.ebit)} AED EBIT; the ${computed.breakeven.scenario} mix ${beText}.`
}
