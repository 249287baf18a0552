import type { Money } from './types'

export const MINOR_PER_MAJOR = 100
export const CURRENCY = 'AED'

export function toMinor(major: number): Money {
  return Math.round(major * MINOR_PER_MAJOR)
}

export function toMajor(minor: Money): number {
  return minor / MINOR_PER_MAJOR
}

const wholeNumber = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 })

// Short form for chart labels and KPI chips
export function formatMoney(minor: Money): string {
  if (!isFinite(minor)) return '—'
  const n = toMajor(minor)
  const sign = n < 0 ? '-' : ''
  const v = Math.abs(n)
  if (v >= 1_000_000) return `${sign}${(v/1_000_000).toFixed(1)}m`
  if (v >= 1_000) return `${sign}${(v/1_000).toFixed(1)}k`
  return `${sign}${v.toFixed(0)}`
}

export function formatAed(minor: Money): string {
  if (!isFinite(minor)) return '—'
  return wholeNumber.format(toMajor(minor))
}

export function formatUnits(units: number): string {
  return isFinite(units) ? wholeNumber.format(units) : '—'
}

export function formatPct(pct: number | null, digits = 1): string {
  return pct === null ? '—' : `${pct.toFixed(digits)}%`
}

export function formatRate(rate: number): string {
  return `${Math.round(rate * 100)}%`
}
