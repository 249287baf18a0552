import { formatAed } from './money'
import type { AssumptionSet, LineEconomics, Phase, ProductEconomics, UnitEconomics } from './types'

function phasePrice(p: Readonly<ProductEconomics>, phase: Phase): UnitEconomics {
  const price = phase === 'pilot' ? p.pilot_price ?? p.price : p.price
  return { price, cogs: p.cogs }
}

// Pilot runs on introductory pricing where set; COGS is the same in both phases
export function getEffective(a: AssumptionSet, phase: Phase): LineEconomics {
  return {
    b2b: phasePrice(a.b2b, phase),
    b2c: phasePrice(a.b2c, phase),
  }
}

export function describePricing(a: AssumptionSet): string[] {
  const out: string[] = []
  if (a.b2b.pilot_price !== undefined && a.b2b.pilot_price !== a.b2b.price) {
    out.push(`B2B pilot ${formatAed(a.b2b.pilot_price)} vs launch ${formatAed(a.b2b.price)} AED`)
  }
  if (a.b2c.pilot_price !== undefined && a.b2c.pilot_price !== a.b2c.price) {
    out.push(`B2C pilot ${formatAed(a.b2c.pilot_price)} vs launch ${formatAed(a.b2c.price)} AED`)
  }
  if (a.b2b.cogs > a.b2b.price) out.push('B2B sells below cost')
  if (a.b2c.cogs > a.b2c.price) out.push('B2C sells below cost')
  return out
}
