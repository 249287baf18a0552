import { z } from 'zod'
import { scenarioVolumes } from './demand'
import { getEffective } from './effects'
import { computePnL, sumFixedCosts } from './finance'
import { moneySchema, parseInput, unitEconomicsSchema, unitRangeSchema } from './schema'
import { CHART } from './types'
import type {
  AssumptionSet,
  Breakeven,
  BreakevenSummary,
  Money,
  PnL,
  ProfitPoint,
  Scenario,
  UnitEconomics,
  UnitRange,
  Volumes,
} from './types'

// A blended mix has a fractional contribution, so only finiteness is required
const contributionSchema = z.number().finite('must be finite')

// Breakeven where `margin` is earned over `per` units: ceil(fixed × per / margin)
function solve(fixed: Money, margin: number, per: number): Breakeven {
  if (margin > 0) return { kind: 'reachable', units: Math.ceil((fixed * per) / margin) }
  if (margin === 0) {
    return fixed === 0 ? { kind: 'reachable', units: 0 } : { kind: 'unreachable', reason: 'zero_margin' }
  }
  return { kind: 'unreachable', reason: 'negative_margin' }
}

function curve(margin: number, per: number, fixed: Money, range: UnitRange): Iterable<ProfitPoint> {
  const r = parseInput(unitRangeSchema, range, 'range')
  return {
    *[Symbol.iterator]() {
      for (let i = 0; i < r.points; i++) {
        const units = Math.round(r.start + ((r.end - r.start) * i) / (r.points - 1))
        yield { units, cumulative_profit: Math.round((units * margin) / per) - fixed }
      }
    },
  }
}

export function breakevenUnits(contributionPerUnit: number, totalFixedCost: Money): Breakeven {
  const contribution = parseInput(contributionSchema, contributionPerUnit, 'contribution_per_unit')
  const fixed = parseInput(moneySchema, totalFixedCost, 'total_fixed_cost')
  return solve(fixed, contribution, 1)
}

/**
 * Cumulative profit sampled evenly over `range`, rounded to whole units and
 * to the fil. The returned iterable is lazy and can be iterated any number of times.
 */
export function profitCurve(contributionPerUnit: number, totalFixedCost: Money, range: UnitRange): Iterable<ProfitPoint> {
  const contribution = parseInput(contributionSchema, contributionPerUnit, 'contribution_per_unit')
  const fixed = parseInput(moneySchema, totalFixedCost, 'total_fixed_cost')
  return curve(contribution, 1, fixed, range)
}

export function breakeven(scenario: Scenario, economics: UnitEconomics, totalFixedCost: Money): BreakevenSummary {
  const e = parseInput(unitEconomicsSchema, economics, 'economics')
  const fixed = parseInput(moneySchema, totalFixedCost, 'total_fixed_cost')
  const contribution = e.price - e.cogs
  return {
    scenario,
    contribution_per_unit: contribution,
    breakeven: solve(fixed, contribution, 1),
    profit_curve: (range: UnitRange) => curve(contribution, 1, fixed, range),
  }
}

/**
 * Breakeven at the product mix of a P&L row. The blended contribution is
 * gross_profit / total_units; units are solved from the totals so the ratio
 * is never rounded.
 */
export function mixBreakeven(scenario: Scenario, pnl: PnL): BreakevenSummary {
  const { gross_profit: margin, total_units: units, fixed_costs: fixed } = pnl
  // nothing sold means nothing earned, so one unit stands in as the divisor
  const per = units > 0 ? units : 1
  return {
    scenario,
    contribution_per_unit: margin / per,
    breakeven: solve(fixed, margin, per),
    profit_curve: (range: UnitRange) => curve(margin, per, fixed, range),
  }
}

export function defaultCurveRange(b: Breakeven): UnitRange | null {
  if (b.kind === 'unreachable') return null
  return {
    start: 0,
    end: Math.max(1, Math.ceil(b.units * CHART.curve_multiple)),
    points: CHART.curve_points,
  }
}

// B2B part of the breakeven volume, at the scenario's own product mix
export function breakevenB2bUnits(b: Breakeven, volumes: Volumes): number | null {
  const total = volumes.b2b + volumes.b2c
  if (b.kind === 'unreachable' || total === 0) return null
  return Math.round((b.units * volumes.b2b) / total)
}

export function scenarioBreakeven(a: AssumptionSet, scenario: Scenario): BreakevenSummary {
  const fixed = sumFixedCosts(a.fixed_costs)
  return mixBreakeven(scenario, computePnL(scenarioVolumes(a, 'year1', scenario), getEffective(a, 'year1'), fixed))
}
