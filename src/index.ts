export * from './types'
export { InvalidInputError } from './errors'
export type { InputIssue } from './errors'
export { createAssumptionSet, toInput } from './schema'
export { impliedAnnualDemand, annualDemand, adoptedUnits, scenarioVolumes } from './demand'
export { getEffective, describePricing } from './effects'
export { computePnL, pilotPnL, scenarioPnL, sumFixedCosts, grossProfitPerUnit, marginPct } from './finance'
export {
  breakeven,
  breakevenUnits,
  mixBreakeven,
  profitCurve,
  defaultCurveRange,
  breakevenB2bUnits,
  scenarioBreakeven,
} from './breakeven'
export { sensitivity, DEFAULT_ADOPTION_RATES } from './sensitivity'
export { computeAll, scenarioCsv } from './store'
export { dubaiPreset, defaultAssumptions, defaultView } from './presets'
export { toMinor, toMajor, formatAed, formatMoney, MINOR_PER_MAJOR } from './money'
