import type { SerializedIssue } from '@/utils/zod'

/**
 * Base for everything the logs client throws on purpose. The message is the
 * snake_case code so callers can switch on either.
 */
export class WorkoutLogError extends Error {
  readonly code: string

  constructor(code: string, options?: { cause?: unknown }) {
    super(code, options)
    this.name = 'WorkoutLogError'
    this.code = code
  }
}

export class ClientConfigError extends WorkoutLogError {
  readonly issues: SerializedIssue[]

  constructor(issues: SerializedIssue[]) {
    super('client_config_invalid')
    this.name = 'ClientConfigError'
    this.issues = issues
  }
}

/** Non-2xx answer from the logs page. */
export class LogHttpError extends WorkoutLogError {
  readonly status: number
  readonly url: string

  constructor(status: number, url: string) {
    super(`logs_http_${status}`)
    this.name = 'LogHttpError'
    this.status = status
    this.url = url
  }
}

export type LogLayoutCode =
  | 'log_list_missing'
  | 'log_bar_block_count'
  | 'exercise_name_missing'
  | 'one_rep_max_invalid'

export type LogLayoutDetails = {
  exerciseIndex?: number
  expected?: number
  actual?: number
  text?: string
}

/** The page no longer has the layout the extractor reads. */
export class LogLayoutError extends WorkoutLogError {
  declare readonly code: LogLayoutCode
  readonly details: LogLayoutDetails

  constructor(code: LogLayoutCode, details: LogLayoutDetails = {}) {
    super(code)
    this.name = 'LogLayoutError'
    this.details = details
  }
}
