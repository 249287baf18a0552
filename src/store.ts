import { useState } from 'react'
import { breakevenB2bUnits, defaultCurveRange, scenarioBreakeven } from './breakeven'
import { annualDemand, scenarioVolumes } from './demand'
import { getEffective } from './effects'
import { InvalidInputError } from './errors'
import { pilotPnL, scenarioPnL, sumFixedCosts } from './finance'
import { log } from './log'
import { toMajor } from './money'
import { defaultAssumptions, defaultView } from './presets'
import { createAssumptionSet, toInput } from './schema'
import { sensitivity } from './sensitivity'
import type { AssumptionInput, AssumptionSet, Computed, ScenarioResult, View } from './types'

export function computeAll(a: AssumptionSet, view: View): Computed {
  const annual = annualDemand(a)
  const fixed = sumFixedCosts(a.fixed_costs)
  const be = scenarioBreakeven(a, view.breakeven_scenario)
  const range = defaultCurveRange(be.breakeven)
  return {
    annual_units: annual,
    total_fixed_costs: fixed,
    pilot: pilotPnL(a),
    year1: scenarioPnL(a, 'year1'),
    breakeven: be,
    breakeven_b2b_units: breakevenB2bUnits(be.breakeven, scenarioVolumes(a, 'year1', view.breakeven_scenario)),
    curve: range ? [...be.profit_curve(range)] : [],
    sensitivity: sensitivity(
      annual,
      view.sensitivity_rates,
      view.sensitivity_b2c_units,
      getEffective(a, 'year1'),
      fixed,
    ),
  }
}

type Snapshot = {
  assumptions: AssumptionSet
  view: View
  computed: Computed
}

// Computing is also the view's validation, so the result is kept with its inputs
function snapshot(assumptions: AssumptionSet, view: View): Snapshot {
  return { assumptions, view, computed: computeAll(assumptions, view) }
}

function initialSnapshot(): Snapshot {
  return snapshot(defaultAssumptions(), defaultView())
}

export function useModel() {
  const [state, setState] = useState<Snapshot>(initialSnapshot)
  const [error, setError] = useState<string | null>(null)

  // Rejected input leaves the last good snapshot in place
  function commit(input: AssumptionInput, nextView: View) {
    try {
      setState(snapshot(createAssumptionSet(input), nextView))
      setError(null)
      log.debug('recomputed', nextView.breakeven_scenario)
    } catch (err) {
      if (!(err instanceof InvalidInputError)) throw err
      log.warn('input rejected', err.issues)
      setError(err.message)
    }
  }

  function update<K extends keyof AssumptionInput>(section: K, next: AssumptionInput[K]) {
    commit({ ...toInput(state.assumptions), [section]: next }, state.view)
  }

  function setView(patch: Partial<View>) {
    commit(toInput(state.assumptions), { ...state.view, ...patch })
  }

  function reset() {
    setState(initialSnapshot())
    setError(null)
  }

  return { ...state, error, update, setView, reset }
}

function cell(n: number | null, digits: number): string {
  return n === null ? '' : n.toFixed(digits)
}

// Whole volumes print as integers; a derived fractional B2B volume to 2 places
function units(n: number): string {
  return Number.isInteger(n) ? String(n) : n.toFixed(2)
}

export function scenarioCsv(rows: ScenarioResult[]): string {
  const out: string[] = []
  out.push('Scenario,B2B units,B2C units,Revenue (AED),Total COGS (AED),Gross profit (AED),Gross margin (%),EBIT (AED),EBIT margin (%)')
  for (const r of rows) {
    out.push([
      r.scenario,
      units(r.b2b_units),
      units(r.b2c_units),
      cell(toMajor(r.revenue), 2),
      cell(toMajor(r.total_cogs), 2),
      cell(toMajor(r.gross_profit), 2),
      cell(r.gross_margin_pct, 1),
      cell(toMajor(r.ebit), 2),
      cell(r.ebit_margin_pct, 1),
    ].join(','))
  }
  return out.join('\n')
}
