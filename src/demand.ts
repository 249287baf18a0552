import { parseInput, quantitySchema, rateSchema, unitsSchema } from './schema'
import type { AssumptionSet, Phase, Scenario, Volumes } from './types'

/**
 * Annual addressable bag demand. Kept as its own seam: what counts as an
 * active bike or a bag is the assumption most likely to be revised.
 */
export function impliedAnnualDemand(activeBikes: number, bagsPerBikePerYear: number): number {
  parseInput(quantitySchema, activeBikes, 'active_bikes')
  parseInput(quantitySchema, bagsPerBikePerYear, 'bags_per_bike_per_year')
  return activeBikes * bagsPerBikePerYear
}

export function annualDemand(a: AssumptionSet): number {
  return impliedAnnualDemand(a.market.active_bikes, a.market.bags_per_bike_per_year)
}

// Not rounded: volume stays strictly increasing in the rate
export function adoptedUnits(annualUnits: number, rate: number): number {
  parseInput(quantitySchema, annualUnits, 'annual_units')
  parseInput(rateSchema, rate, 'adoption_rate')
  return annualUnits * rate
}

export function scenarioVolumes(a: AssumptionSet, phase: Phase, scenario: Scenario): Volumes {
  if (phase === 'pilot') return { ...a.pilot_volumes }
  return {
    b2b: adoptedUnits(annualDemand(a), a.adoption_rate[scenario]),
    b2c: parseInput(unitsSchema, a.year1_b2c_volume[scenario], `year1_b2c_volume.${scenario}`),
  }
}
