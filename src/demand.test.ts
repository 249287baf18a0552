import { describe, expect, it } from 'vitest'

import { adoptedUnits, annualDemand, impliedAnnualDemand, scenarioVolumes } from './demand'
import { InvalidInputError } from './errors'
import { defaultAssumptions, dubaiPreset } from './presets'
import { createAssumptionSet } from './schema'

describe('impliedAnnualDemand', () => {
  it('multiplies bikes by bags per bike', () => {
    expect(impliedAnnualDemand(50000, 2)).toBe(100000)
    expect(impliedAnnualDemand(40000, 1.5)).toBe(60000)
  })

  it('is zero when either input is zero', () => {
    expect(impliedAnnualDemand(0, 2)).toBe(0)
    expect(impliedAnnualDemand(50000, 0)).toBe(0)
  })

  it('scales linearly in each argument', () => {
    const base = impliedAnnualDemand(50000, 2)
    expect(impliedAnnualDemand(150000, 2)).toBe(base * 3)
    expect(impliedAnnualDemand(50000, 6)).toBe(base * 3)
  })

  it('rejects negative inputs', () => {
    expect(() => impliedAnnualDemand(-1, 2)).toThrow(InvalidInputError)
    expect(() => impliedAnnualDemand(-1, 2)).toThrow('active_bikes: must be >= 0')
    expect(() => impliedAnnualDemand(10, Number.NaN)).toThrow(/bags_per_bike_per_year/)
  })
})

describe('adoptedUnits', () => {
  it('applies the adoption rate', () => {
    expect(adoptedUnits(100000, 0.25)).toBe(25000)
  })

  it('keeps fractional volume', () => {
    expect(adoptedUnits(100000, 0.15)).toBe(15000)
    expect(adoptedUnits(1001, 0.5)).toBe(500.5)
    expect(adoptedUnits(4, 0.15)).toBeCloseTo(0.6, 12)
  })

  it('grows strictly with the rate on small demand', () => {
    const volumes = [0.15, 0.25, 0.4].map(rate => adoptedUnits(4, rate))
    expect(volumes[0]).toBeLessThan(volumes[1] ?? 0)
    expect(volumes[1]).toBeLessThan(volumes[2] ?? 0)
  })

  it('keeps a zero rate', () => {
    expect(adoptedUnits(100000, 0)).toBe(0)
  })

  it('rejects rates outside [0, 1]', () => {
    expect(() => adoptedUnits(100000, 1.2)).toThrow('adoption_rate: must be within [0, 1]')
    expect(() => adoptedUnits(100000, -0.1)).toThrow(InvalidInputError)
  })
})

describe('scenarioVolumes', () => {
  const a = defaultAssumptions()

  it('derives Year 1 B2B volume from demand and adoption', () => {
    expect(annualDemand(a)).toBe(60000)
    expect(scenarioVolumes(a, 'year1', 'Pessimistic')).toEqual({ b2b: 3000, b2c: 600 })
    expect(scenarioVolumes(a, 'year1', 'Base')).toEqual({ b2b: 6000, b2c: 900 })
    expect(scenarioVolumes(a, 'year1', 'Optimistic')).toEqual({ b2b: 12000, b2c: 1200 })
  })

  it('follows fractional annual demand', () => {
    const odd = createAssumptionSet({ ...dubaiPreset(), market: { active_bikes: 40001, bags_per_bike_per_year: 1.5 } })
    expect(annualDemand(odd)).toBe(60001.5)
    expect(scenarioVolumes(odd, 'year1', 'Base').b2b).toBeCloseTo(6000.15, 6)
  })

  it('uses pilot volumes regardless of scenario', () => {
    expect(scenarioVolumes(a, 'pilot', 'Pessimistic')).toEqual({ b2b: 400, b2c: 200 })
    expect(scenarioVolumes(a, 'pilot', 'Optimistic')).toEqual({ b2b: 400, b2c: 200 })
  })
})
