import { describe, expect, it } from 'vitest'

import { InvalidInputError } from './errors'
import { buildNarrative, computePnL, grossProfitPerUnit, pilotPnL, scenarioPnL, sumFixedCosts } from './finance'
import { toMinor } from './money'
import { defaultAssumptions, defaultView, dubaiPreset } from './presets'
import { createAssumptionSet } from './schema'
import { computeAll } from './store'
import type { LineEconomics } from './types'

const ECONOMICS: LineEconomics = {
  b2b: { price: toMinor(20), cogs: toMinor(8) },
  b2c: { price: toMinor(30), cogs: toMinor(10) },
}

describe('computePnL', () => {
  it('computes B2B gross profit from volume and margin', () => {
    const p = computePnL({ b2b: 25000, b2c: 0 }, ECONOMICS, 0)
    expect(p.revenue).toBe(toMinor(500000))
    expect(p.gross_profit).toBe(toMinor(300000))
    expect(p.ebit).toBe(toMinor(300000))
  })

  it('combines both product lines', () => {
    const p = computePnL({ b2b: 100, b2c: 10 }, ECONOMICS, toMinor(1000))
    expect(p.revenue).toBe(230000)
    expect(p.total_cogs).toBe(90000)
    expect(p.gross_profit).toBe(140000)
    expect(p.ebit).toBe(40000)
    expect(p.total_units).toBe(110)
  })

  it('has zero gross profit when price equals cogs', () => {
    const flat: LineEconomics = { b2b: { price: 1500, cogs: 1500 }, b2c: { price: 900, cogs: 900 } }
    expect(computePnL({ b2b: 1234, b2c: 567 }, flat, 100).gross_profit).toBe(0)
  })

  it('reports the full fixed cost as a loss on zero volume', () => {
    const p = computePnL({ b2b: 0, b2c: 0 }, ECONOMICS, 5000)
    expect(p.revenue).toBe(0)
    expect(p.gross_profit).toBe(0)
    expect(p.ebit).toBe(-5000)
    expect(p.gross_margin_pct).toBeNull()
    expect(p.ebit_margin_pct).toBeNull()
  })

  it('propagates negative margins', () => {
    const loss: LineEconomics = { b2b: { price: 1000, cogs: 1500 }, b2c: { price: 0, cogs: 0 } }
    const p = computePnL({ b2b: 10, b2c: 0 }, loss, 0)
    expect(p.gross_profit).toBe(-5000)
    expect(p.gross_margin_pct).toBe(-50)
  })

  it('rounds money on a fractional B2B volume to the fil', () => {
    const p = computePnL({ b2b: 0.5, b2c: 1 }, { b2b: { price: 1001, cogs: 333 }, b2c: { price: 100, cogs: 40 } }, 0)
    expect(p.revenue).toBe(601)
    expect(p.total_cogs).toBe(207)
    expect(p.gross_profit).toBe(394)
    expect(p.total_units).toBe(1.5)
  })

  it('keeps B2C volume whole', () => {
    expect(() => computePnL({ b2b: 0, b2c: 1.5 }, ECONOMICS, 0)).toThrow('volume.b2c: must be a whole number of units')
  })

  it('rejects negative volumes and fractional currency', () => {
    expect(() => computePnL({ b2b: -1, b2c: 0 }, ECONOMICS, 0)).toThrow('volume.b2b: must be >= 0')
    const fractional: LineEconomics = { ...ECONOMICS, b2b: { price: 10.5, cogs: 8 } }
    expect(() => computePnL({ b2b: 1, b2c: 0 }, fractional, 0)).toThrow(/economics\.b2b\.price/)
    expect(() => computePnL({ b2b: 1, b2c: 0 }, ECONOMICS, -1)).toThrow(InvalidInputError)
  })

  it('returns identical results for identical inputs', () => {
    expect(computePnL({ b2b: 7, b2c: 3 }, ECONOMICS, 99)).toEqual(computePnL({ b2b: 7, b2c: 3 }, ECONOMICS, 99))
  })
})

describe('scenario P&L', () => {
  const a = defaultAssumptions()

  it('sums fixed cost categories', () => {
    expect(sumFixedCosts(a.fixed_costs)).toBe(toMinor(640000))
  })

  it('returns Year 1 rows in scenario order at launch pricing', () => {
    const rows = scenarioPnL(a, 'year1')
    expect(rows.map(r => r.scenario)).toEqual(['Pessimistic', 'Base', 'Optimistic'])
    expect(rows.map(r => r.revenue)).toEqual([170940000, 323910000, 611880000])
    expect(rows.map(r => r.gross_profit)).toEqual([92640000, 176460000, 335280000])
    expect(rows.map(r => r.ebit)).toEqual([28640000, 112460000, 271280000])
  })

  it('keeps ebit equal to gross profit less fixed costs', () => {
    for (const phase of ['pilot', 'year1'] as const) {
      for (const r of scenarioPnL(a, phase)) {
        expect(r.ebit).toBe(r.gross_profit - r.fixed_costs)
      }
    }
  })

  it('prices fractional Year 1 demand', () => {
    const odd = createAssumptionSet({ ...dubaiPreset(), market: { active_bikes: 40001, bags_per_bike_per_year: 1.5 } })
    const base = scenarioPnL(odd, 'year1')[1]
    expect(base?.revenue).toBe(323916750)
  })

  it('gives the same pilot row for every scenario', () => {
    const [pess, base, opt] = scenarioPnL(a, 'pilot')
    expect(pess?.revenue).toBe(base?.revenue)
    expect(base?.ebit).toBe(opt?.ebit)
  })

  it('prices the pilot at pilot prices', () => {
    const p = pilotPnL(a)
    expect(p.revenue).toBe(25940000)
    expect(p.gross_profit).toBe(11840000)
    expect(p.ebit).toBe(-52160000)
    expect(p.gross_margin_pct).toBeCloseTo(45.64, 2)
  })
})

describe('grossProfitPerUnit', () => {
  it('divides gross profit over the pilot units', () => {
    expect(grossProfitPerUnit(pilotPnL(defaultAssumptions()))).toBeCloseTo(11840000 / 600, 6)
  })

  it('is null when nothing is sold', () => {
    expect(grossProfitPerUnit(computePnL({ b2b: 0, b2c: 0 }, ECONOMICS, 0))).toBeNull()
  })
})

describe('buildNarrative', () => {
  it('summarises the Base case', () => {
    const a = defaultAssumptions()
    expect(buildNarrative(a, computeAll(a, defaultView()))).toBe(
      'With 60,000 bags/year in demand and 10% B2B adoption, the Base case sells 6,900 units for 3,239,100 AED revenue and 1,124,600 AED EBIT; the Base mix breaks even at 2,503 units.',
    )
  })
})
