import React, { useEffect, useRef, useState } from 'react'
import { useModel, scenarioCsv } from './store'
import { describePricing } from './effects'
import { drawBar, drawLine, drawLines } from './charts'
import { FIXED_COST_LABELS, MARKET_NARRATIVE } from './presets'
import { buildNarrative, grossProfitPerUnit } from './finance'
import { CURRENCY, formatAed, formatMoney, formatPct, formatRate, formatUnits, toMajor, toMinor } from './money'
import { SCENARIOS } from './types'
import type { PnL, ProductEconomics, Scenario } from './types'

type NumProps = {
  label: string
  value: number
  onChange: (v: number) => void
  min?: number
  max?: number
  step?: number
  suffix?: string
  title?: string
}

function Num({ label, value, onChange, min, max, step, suffix, title }: NumProps) {
  return (
    <label className="flex items-center justify-between gap-2 py-1" title={title}>
      <span className="text-sm text-slate-700">{label}</span>
      <span className="flex items-center gap-1">
        <input
          className="w-28 px-2 py-1 border rounded text-right"
          type="number"
          value={Number.isFinite(value) ? value : ''}
          min={min}
          max={max}
          step={step ?? 1}
          onChange={(e) => onChange(parseFloat(e.target.value))}
        />
        {suffix && <span className="text-sm text-slate-500">{suffix}</span>}
      </span>
    </label>
  )
}

function Slider({ label, value, onChange, min, max, step, suffix, title }: NumProps) {
  return (
    <div className="flex flex-col gap-1 py-1" title={title}>
      <span className="text-sm text-slate-700">{label}</span>
      <div className="flex items-center gap-2">
        <input type="range" aria-label={label} min={min} max={max} step={step ?? 1} value={value}
               onChange={(e) => onChange(parseFloat(e.target.value))} className="flex-1" />
        <span className="w-14 text-right text-sm">{value.toFixed(2)}{suffix}</span>
      </div>
    </div>
  )
}

function Section({ title, children }: { title: string; children: React.ReactNode }) {
  return (
    <div className="bg-white rounded border p-3 shadow-sm">
      <h3 className="font-semibold text-slate-800 mb-2">{title}</h3>
      {children}
    </div>
  )
}

function Metric({ label, value }: { label: string; value: string }) {
  return (
    <div className="bg-white border rounded p-3 text-center">
      <div className="text-xs text-slate-500">{label}</div>
      <div className="text-xl font-semibold">{value}</div>
    </div>
  )
}

function useCanvas(draw: (el: HTMLCanvasElement) => void, deps: React.DependencyList) {
  const ref = useRef<HTMLCanvasElement | null>(null)
  useEffect(() => {
    if (!ref.current) return
    draw(ref.current)
  }, deps)
  return ref
}

const TABS = ['Overview', 'Assumptions', 'P&L', 'Breakeven', 'Sensitivity'] as const
type Tab = (typeof TABS)[number]

function PnLTable({ rows }: { rows: (PnL & { label: string })[] }) {
  return (
    <table className="w-full text-sm">
      <thead>
        <tr className="text-left text-slate-500">
          <th>Scenario</th><th>B2B units</th><th>B2C units</th><th>Revenue</th>
          <th>Gross profit</th><th>Gross margin</th><th>EBIT</th><th>EBIT margin</th>
        </tr>
      </thead>
      <tbody>
        {rows.map(r => (
          <tr key={r.label}>
            <td>{r.label}</td>
            <td>{formatUnits(r.b2b_units)}</td>
            <td>{formatUnits(r.b2c_units)}</td>
            <td>{formatAed(r.revenue)}</td>
            <td>{formatAed(r.gross_profit)}</td>
            <td>{formatPct(r.gross_margin_pct)}</td>
            <td>{formatAed(r.ebit)}</td>
            <td>{formatPct(r.ebit_margin_pct)}</td>
          </tr>
        ))}
      </tbody>
    </table>
  )
}

export function App() {
  const { assumptions: a, view, computed, error, update, setView, reset } = useModel()
  const [tab, setTab] = useState<Tab>('Overview')

  const year1Rows = computed.year1.map(r => ({ ...r, label: r.scenario }))
  const be = computed.breakeven.breakeven
  const pilotGpPerUnit = grossProfitPerUnit(computed.pilot)

  const summary: [string, string][] = [
    ['B2B price – pilot (AED)', formatAed(a.b2b.pilot_price ?? a.b2b.price)],
    ['B2B price – launch (AED)', formatAed(a.b2b.price)],
    ['B2B COGS (AED)', formatAed(a.b2b.cogs)],
    ['B2C price – pilot (AED)', formatAed(a.b2c.pilot_price ?? a.b2c.price)],
    ['B2C price – launch (AED)', formatAed(a.b2c.price)],
    ['B2C COGS (AED)', formatAed(a.b2c.cogs)],
    ...SCENARIOS.map((s): [string, string] => [`Adoption – ${s}`, formatRate(a.adoption_rate[s])]),
    ['Total fixed costs (AED/year)', formatAed(computed.total_fixed_costs)],
  ]

  const ebitRef = useCanvas((c) => drawBar(c, computed.year1.map(r => r.scenario), computed.year1.map(r => toMajor(r.ebit))), [computed.year1, tab])
  const curveRef = useCanvas((c) => drawLine(c, computed.curve.map(p => toMajor(p.cumulative_profit))), [computed.curve, tab])
  const sensRef = useCanvas((c) => drawLines(c, [
    { label: 'Revenue', values: computed.sensitivity.map(r => toMajor(r.revenue)), stroke: { r: 59, g: 130, b: 246 } },
    { label: 'Gross profit', values: computed.sensitivity.map(r => toMajor(r.gross_profit)), stroke: { r: 16, g: 185, b: 129 } },
    { label: 'EBIT', values: computed.sensitivity.map(r => toMajor(r.ebit)), stroke: { r: 234, g: 88, b: 12 } },
  ]), [computed.sensitivity, tab])

  function product(line: 'b2b' | 'b2c', patch: Partial<ProductEconomics>) {
    update(line, { ...a[line], ...patch })
  }

  function exportCSV() {
    const blob = new Blob([scenarioCsv(computed.year1)], { type: 'text/csv;charset=utf-8' })
    const url = URL.createObjectURL(blob)
    const link = document.createElement('a')
    link.href = url
    link.download = 'year1_scenarios.csv'
    document.body.appendChild(link)
    link.click()
    link.remove()
    URL.revokeObjectURL(url)
  }

  return (
    <div className="max-w-[1200px] mx-auto p-4 space-y-3">
      <header className="flex items-center justify-between">
        <div>
          <h1 className="text-xl font-semibold">Dubai Delivery-Box Financial Model</h1>
          <p className="text-sm text-slate-600">Solar-powered delivery and outdoor boxes: pilot, Year 1, breakeven and sensitivity</p>
        </div>
        <div className="flex gap-2">
          <button className="px-3 py-1 border rounded" onClick={reset}>Reset</button>
          <button className="px-3 py-1 border rounded" onClick={exportCSV}>Export CSV</button>
        </div>
      </header>

      {error && <div role="alert" className="bg-red-50 border border-red-200 text-red-700 text-sm rounded p-2">Invalid input: {error}</div>}

      <nav className="flex gap-2">
        {TABS.map(t => (
          <button key={t} className={`px-3 py-1 border rounded ${tab === t ? 'bg-slate-100' : ''}`} onClick={() => setTab(t)}>{t}</button>
        ))}
      </nav>

      <div className="grid grid-cols-1 md:grid-cols-3 gap-3">
        <div className="space-y-3">
          <Section title="Delivery ecosystem">
            <Num label="Active delivery bikes" value={a.market.active_bikes} step={1000}
                 onChange={(v) => update('market', { ...a.market, active_bikes: v })} />
            <Num label="Bags per bike per year" value={a.market.bags_per_bike_per_year} step={0.1}
                 onChange={(v) => update('market', { ...a.market, bags_per_bike_per_year: v })}
                 title="Wear and replacement in the heat; 1–2 bags/year is typical" />
          </Section>

          <Section title="Unit economics">
            <Num label="B2B launch price" suffix={CURRENCY} value={toMajor(a.b2b.price)} step={10} onChange={(v) => product('b2b', { price: toMinor(v) })} />
            <Num label="B2B pilot price" suffix={CURRENCY} value={toMajor(a.b2b.pilot_price ?? a.b2b.price)} step={10} onChange={(v) => product('b2b', { pilot_price: toMinor(v) })} />
            <Num label="B2B COGS" suffix={CURRENCY} value={toMajor(a.b2b.cogs)} step={5} onChange={(v) => product('b2b', { cogs: toMinor(v) })} />
            <Num label="B2C launch price" suffix={CURRENCY} value={toMajor(a.b2c.price)} step={10} onChange={(v) => product('b2c', { price: toMinor(v) })} />
            <Num label="B2C pilot price" suffix={CURRENCY} value={toMajor(a.b2c.pilot_price ?? a.b2c.price)} step={10} onChange={(v) => product('b2c', { pilot_price: toMinor(v) })} />
            <Num label="B2C COGS" suffix={CURRENCY} value={toMajor(a.b2c.cogs)} step={5} onChange={(v) => product('b2c', { cogs: toMinor(v) })} />
            <div className="mt-1 text-xs text-slate-600 flex flex-wrap gap-2">
              {describePricing(a).map((d) => <span key={d} className="px-2 py-1 bg-slate-100 rounded">{d}</span>)}
            </div>
          </Section>

          <Section title="B2B adoption of annual bag demand">
            {SCENARIOS.map(s => (
              <Slider key={s} label={s} value={a.adoption_rate[s]} min={0} max={1} step={0.01}
                      onChange={(v) => update('adoption_rate', { ...a.adoption_rate, [s]: v })} />
            ))}
          </Section>

          <Section title={`Fixed costs (${CURRENCY}/year)`}>
            {Object.entries(a.fixed_costs).map(([key, amount]) => (
              <Num key={key} label={FIXED_COST_LABELS[key] ?? key} value={toMajor(amount)} step={5000}
                   onChange={(v) => update('fixed_costs', { ...a.fixed_costs, [key]: toMinor(v) })} />
            ))}
            <div className="text-sm flex justify-between font-semibold"><span>Total</span><span>{formatAed(computed.total_fixed_costs)}</span></div>
          </Section>
        </div>

        <div className="md:col-span-2 space-y-3">
          {tab === 'Overview' && <>
            <div className="grid grid-cols-3 gap-2">
              <Metric label="Active delivery bikes" value={formatUnits(a.market.active_bikes)} />
              <Metric label="Annual bag demand" value={formatUnits(computed.annual_units)} />
              <Metric label="Total fixed costs (AED)" value={formatMoney(computed.total_fixed_costs)} />
            </div>
            <div className="bg-white border rounded p-3 text-sm">{buildNarrative(a, computed)}</div>
            <Section title="Year 1 snapshot (launch pricing)">
              <PnLTable rows={year1Rows} />
              <canvas ref={ebitRef} className="w-full h-40 mt-2" />
            </Section>
          </>}

          {tab === 'Assumptions' && <>
            <Section title="Market context">
              <ul className="text-sm list-disc pl-5">
                <li>Implied annual bag demand: {formatUnits(computed.annual_units)} bags</li>
                {MARKET_NARRATIVE.map(line => <li key={line}>{line}</li>)}
              </ul>
            </Section>
            <Section title="Financial assumptions summary">
              <table className="w-full text-sm" aria-label="Financial assumptions summary">
                <tbody>
                  {summary.map(([label, value]) => (
                    <tr key={label}><td className="text-slate-600">{label}</td><td className="text-right">{value}</td></tr>
                  ))}
                </tbody>
              </table>
            </Section>
          </>}

          {tab === 'P&L' && <>
            <Section title="Pilot phase (pilot pricing)">
              <Num label="Pilot B2B units" value={a.pilot_volumes.b2b} step={50}
                   onChange={(v) => update('pilot_volumes', { ...a.pilot_volumes, b2b: v })} />
              <Num label="Pilot B2C units" value={a.pilot_volumes.b2c} step={50}
                   onChange={(v) => update('pilot_volumes', { ...a.pilot_volumes, b2c: v })} />
              <div className="grid grid-cols-2 gap-2 my-2">
                <Metric label="Pilot units" value={formatUnits(computed.pilot.total_units)} />
                <Metric label="Gross profit / unit (AED)" value={pilotGpPerUnit === null ? '—' : formatAed(pilotGpPerUnit)} />
              </div>
              <PnLTable rows={[{ ...computed.pilot, label: 'Pilot' }]} />
            </Section>
            <Section title="Year 1 by scenario (launch pricing)">
              {SCENARIOS.map(s => (
                <Num key={s} label={`Year 1 B2C units – ${s}`} value={a.year1_b2c_volume[s]} step={50}
                     onChange={(v) => update('year1_b2c_volume', { ...a.year1_b2c_volume, [s]: v })} />
              ))}
              <PnLTable rows={year1Rows} />
            </Section>
          </>}

          {tab === 'Breakeven' && <Section title="Breakeven">
            <label className="flex items-center gap-2 text-sm py-1">
              <span>Scenario</span>
              <select className="border rounded px-2 py-1" value={view.breakeven_scenario}
                      onChange={(e) => {
                        const s = SCENARIOS.find(x => x === e.target.value)
                        if (s) setView({ breakeven_scenario: s })
                      }}>
                {SCENARIOS.map((s: Scenario) => <option key={s} value={s}>{s}</option>)}
              </select>
            </label>
            <div className="grid grid-cols-3 gap-2">
              <Metric label="Contribution / unit (AED)" value={formatAed(computed.breakeven.contribution_per_unit)} />
              <Metric label="Breakeven units (total)" value={be.kind === 'reachable' ? formatUnits(be.units) : '∞'} />
              <Metric label="Breakeven B2B units (approx.)" value={computed.breakeven_b2b_units === null ? 'N/A' : formatUnits(computed.breakeven_b2b_units)} />
            </div>
            {be.kind === 'reachable'
              ? <canvas ref={curveRef} className="w-full h-48 mt-2" />
              : <div className="text-sm text-slate-600 mt-2">Breakeven not achievable at these assumptions.</div>}
          </Section>}

          {tab === 'Sensitivity' && <Section title="Adoption rate vs financial outcomes">
            <Num label="B2C units held fixed" value={view.sensitivity_b2c_units} step={50}
                 onChange={(v) => setView({ sensitivity_b2c_units: v })} />
            <table className="w-full text-sm">
              <thead>
                <tr className="text-left text-slate-500"><th>Adoption</th><th>B2B units</th><th>Revenue</th><th>Gross profit</th><th>EBIT</th><th>EBIT margin</th></tr>
              </thead>
              <tbody>
                {computed.sensitivity.map((r, i) => (
                  <tr key={i}>
                    <td>{formatRate(r.adoption_rate)}</td>
                    <td>{formatUnits(r.b2b_units)}</td>
                    <td>{formatAed(r.revenue)}</td>
                    <td>{formatAed(r.gross_profit)}</td>
                    <td>{formatAed(r.ebit)}</td>
                    <td>{formatPct(r.ebit_margin_pct)}</td>
                  </tr>
                ))}
              </tbody>
            </table>
            <canvas ref={sensRef} className="w-full h-40 mt-2" />
          </Section>}
        </div>
      </div>
    </div>
  )
}
