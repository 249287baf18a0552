export type RGBA = { r: number; g: number; b: number; a?: number }

export type Series = { label: string; values: number[]; stroke: RGBA }

const PAD = 16

function dpiCanvas(canvas: HTMLCanvasElement) {
  const ctx = canvas.getContext('2d')
  if (!ctx) return null
  const dpr = window.devicePixelRatio || 1
  const rect = canvas.getBoundingClientRect()
  canvas.width = Math.max(1, Math.floor(rect.width * dpr))
  canvas.height = Math.max(1, Math.floor(rect.height * dpr))
  ctx.scale(dpr, dpr)
  ctx.clearRect(0, 0, rect.width, rect.height)
  return { ctx, w: rect.width, h: rect.height }
}

function color({ r, g, b, a = 1 }: RGBA) {
  return `rgba(${r}, ${g}, ${b}, ${a})`
}

// y-scale always spans zero so profit and loss read against the same baseline
function yScale(values: number[], h: number) {
  const max = Math.max(0, ...values)
  const min = Math.min(0, ...values)
  return (v: number) => {
    if (max === min) return h / 2
    return h - PAD - ((v - min) / (max - min)) * (h - PAD * 2)
  }
}

function drawZero(ctx: CanvasRenderingContext2D, w: number, y0: number) {
  ctx.strokeStyle = '#94a3b8'
  ctx.lineWidth = 1
  ctx.beginPath()
  ctx.moveTo(PAD, y0)
  ctx.lineTo(w - PAD, y0)
  ctx.stroke()
}

export function drawLines(canvas: HTMLCanvasElement, series: Series[]) {
  const c = dpiCanvas(canvas)
  if (!c) return
  const { ctx, w, h } = c
  const all = series.flatMap(s => s.values)
  if (all.length === 0) return
  const y = yScale(all, h)
  drawZero(ctx, w, y(0))
  series.forEach((s, k) => {
    const x = (i: number) => PAD + (i / Math.max(1, s.values.length - 1)) * (w - PAD * 2)
    ctx.strokeStyle = color(s.stroke)
    ctx.lineWidth = 2
    ctx.beginPath()
    ctx.moveTo(x(0), y(s.values[0] ?? 0))
    for (let i = 1; i < s.values.length; i++) ctx.lineTo(x(i), y(s.values[i] ?? 0))
    ctx.stroke()
    ctx.fillStyle = color(s.stroke)
    ctx.font = '11px sans-serif'
    ctx.textAlign = 'left'
    ctx.fillText(s.label, PAD + 4, PAD + 12 * k)
  })
}

// Cumulative profit vs units sold
export function drawLine(canvas: HTMLCanvasElement, data: number[], opts?: { stroke?: RGBA }) {
  drawLines(canvas, [{ label: '', values: data, stroke: opts?.stroke ?? { r: 16, g: 185, b: 129 } }])
}

export function drawBar(canvas: HTMLCanvasElement, categories: string[], values: number[]) {
  const c = dpiCanvas(canvas)
  if (!c) return
  const { ctx, w, h } = c
  const barW = (w - PAD * 2) / Math.max(1, values.length)
  const y = yScale(values, h)
  const baseline = y(0)
  values.forEach((v, i) => {
    const x = PAD + i * barW + 4
    const yv = y(v)
    ctx.fillStyle = v >= 0 ? 'rgba(16,185,129,0.8)' : 'rgba(239,68,68,0.8)'
    ctx.fillRect(x, v >= 0 ? yv : baseline, barW - 8, Math.abs(baseline - yv))
    ctx.fillStyle = '#475569'
    ctx.font = '11px sans-serif'
    ctx.textAlign = 'center'
    ctx.fillText(categories[i] ?? '', x + (barW - 8) / 2, h - 2)
  })
  drawZero(ctx, w, baseline)
}
