import { logDebug, logError, logInfo, logWarn } from '@/lib/logger'
import type { ClientConfig, ClientConfigInput, ClientOptionsInput, ExerciseRecord } from '@/schemas/workoutLog'
import { resolveClientConfig, resolveClientOptions } from './config'
import { LogHttpError } from './errors'
import { extractExercises } from './extractor'

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

const charsetOf = (contentType: string | null) => {
  const m = /charset\s*=\s*"?([^";\s]+)"?/i.exec(contentType ?? '')
  return m?.[1] ?? 'utf-8'
}

/** Decodes the body with the charset the server declares, utf-8 when it declares none we know. */
export async function readBodyText(res: Response): Promise<string> {
  const bytes = await res.arrayBuffer()
  const charset = charsetOf(res.headers.get('content-type'))
  let decoder: TextDecoder
  try {
    decoder = new TextDecoder(charset)
  } catch (e: unknown) {
    if (!(e instanceof RangeError)) throw e
    logWarn('workout-logs', `unknown charset "${charset}", decoding as utf-8`)
    decoder = new TextDecoder()
  }
  return decoder.decode(bytes)
}

export type WorkoutLogClientOptions = ClientOptionsInput & {
  fetch?: FetchLike
}

export type WorkoutLogClient = {
  readonly config: ClientConfig
  buildLogsUrl: (username: string, date: string) => string
  buildProfileUrl: (username: string) => string
  getWorkout: (username: string, date: string) => Promise<ExerciseRecord[]>
}

/**
 * Client for a user's workout logs page. Holds nothing but its resolved
 * config, so concurrent getWorkout calls do not interfere.
 */
export function createWorkoutLogClient(
  configInput: ClientConfigInput = {},
  { fetch: fetchImpl = fetch, ...optionsInput }: WorkoutLogClientOptions = {},
): WorkoutLogClient {
  const config = resolveClientConfig(configInput)
  const options = resolveClientOptions(optionsInput)

  const buildLogsUrl = (username: string, date: string) => {
    const url = new URL(config.logs_base_url)
    url.searchParams.set('xid', username)
    url.searchParams.set('dd', date)
    return url.toString()
  }

  const buildProfileUrl = (username: string) =>
    `${config.user_base_url.replace(/\/$/, '')}/${encodeURIComponent(username)}`

  const getWorkout = async (username: string, date: string): Promise<ExerciseRecord[]> => {
    const url = buildLogsUrl(username, date)
    logDebug('workout-logs', `GET ${url}`)

    const headers: Record<string, string> = {}
    if (options.userAgent) headers['User-Agent'] = options.userAgent

    const res = await fetchImpl(url, {
      method: 'GET',
      headers,
      signal: AbortSignal.timeout(options.timeoutMs),
    })

    if (!res.ok) {
      // release the connection; the error page itself is never read
      await res.body?.cancel()
      const err = new LogHttpError(res.status, url)
      logError('workout-logs', err, { status: res.status, url })
      throw err
    }

    const html = await readBodyText(res)
    const exercises = extractExercises(html, { missingLogList: options.missingLogList })
    logInfo('workout-logs', `extracted ${exercises.length} exercises`, { url })
    return exercises
  }

  return { config, buildLogsUrl, buildProfileUrl, getWorkout }
}
