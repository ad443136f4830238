/**
 * Reads a number out of scraped page text. Surrounding whitespace is ignored;
 * anything else that is not a plain decimal literal gives null.
 */
export function parseLogNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null
  if (typeof value !== 'string') return null

  const str = value.trim()
  if (!/^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i.test(str)) return null

  const num = Number(str)
  return Number.isFinite(num) ? num : null
}
