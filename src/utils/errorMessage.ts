/**
 * Pulls a printable message out of whatever was thrown.
 *
 * @example
 * catch (e: unknown) {
 *   logError('workout-logs', getErrorMessage(e))
 * }
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  if (typeof error === 'string') return error
  if (error !== null && typeof error === 'object' && 'message' in error) {
    const { message } = error
    if (typeof message === 'string') return message
  }
  return String(error)
}
