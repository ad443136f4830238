import { z } from 'zod'

export const DEFAULT_USER_BASE_URL = 'https://www.jefit.com/user'
export const DEFAULT_LOGS_BASE_URL = 'https://www.jefit.com/members/user-logs/log/'

export const SetRecordSchema = z.object({
  set_number: z.number().int().safe().min(1),
  weight: z.number().min(0).max(Number.MAX_SAFE_INTEGER),
  reps: z.number().int().safe().min(0),
})
export type SetRecord = Readonly<z.infer<typeof SetRecordSchema>>

export type ExerciseRecord = Readonly<{
  exercise_name: string
  one_rep_max: number
  lifting_logs: readonly SetRecord[]
}>

export const ClientConfigSchema = z.object({
  user_base_url: z.string().url().default(DEFAULT_USER_BASE_URL),
  logs_base_url: z.string().url().default(DEFAULT_LOGS_BASE_URL),
})
export type ClientConfig = Readonly<z.output<typeof ClientConfigSchema>>
export type ClientConfigInput = z.input<typeof ClientConfigSchema>

export const MissingLogListSchema = z.enum(['empty', 'error'])
export type MissingLogListMode = z.infer<typeof MissingLogListSchema>

export const ClientOptionsSchema = z.object({
  timeoutMs: z.number().int().positive().default(15_000),
  userAgent: z.string().trim().min(1).optional(),
  missingLogList: MissingLogListSchema.default('empty'),
})
export type ClientOptions = z.output<typeof ClientOptionsSchema>
export type ClientOptionsInput = z.input<typeof ClientOptionsSchema>
