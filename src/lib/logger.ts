/**
 * Console logger with a context tag per line.
 * Info, warn and debug are muted in production; errors always go out.
 */

const isProd = () => process.env.NODE_ENV === 'production'

export function logInfo(context: string, message: string, extra?: unknown) {
  if (isProd()) return
  const ts = new Date().toISOString()
  console.log(`[INFO ${ts}] ${context}: ${message}`, extra ?? '')
}

export function logWarn(context: string, message: string, extra?: unknown) {
  if (isProd()) return
  const ts = new Date().toISOString()
  console.warn(`[WARN ${ts}] ${context}: ${message}`, extra ?? '')
}

export function logError(context: string, error: unknown, extra?: unknown) {
  const ts = new Date().toISOString()
  const msg = error instanceof Error ? error.message : String(error)
  console.error(`[ERROR ${ts}] ${context}: ${msg}`, extra ?? error)
}

export function logDebug(context: string, message: string, extra?: unknown) {
  if (isProd()) return
  const ts = new Date().toISOString()
  console.debug(`[DEBUG ${ts}] ${context}: ${message}`, extra ?? '')
}
