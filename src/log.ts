// ── Debug flag (dev server only; tests and production builds stay quiet) ──
const DEBUG_MODEL = import.meta.env.DEV && import.meta.env.MODE !== 'test'

export const log = {
  debug(message: string, ...details: unknown[]) {
    if (DEBUG_MODEL) console.log(`[model] ${message}`, ...details)
  },
  warn(message: string, ...details: unknown[]) {
    console.warn(`[model] ${message}`, ...details)
  },
}
