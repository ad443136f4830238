export { createWorkoutLogClient } from './lib/workoutLogs/client'
export type { FetchLike, WorkoutLogClient, WorkoutLogClientOptions } from './lib/workoutLogs/client'
export { DEFAULT_CLIENT_CONFIG, resolveClientConfig, resolveClientOptions } from './lib/workoutLogs/config'
export { extractExercises, unpackLogBar } from './lib/workoutLogs/extractor'
export type { ExtractOptions } from './lib/workoutLogs/extractor'
export { parseSets } from './lib/workoutLogs/parser'
export {
  ClientConfigError,
  LogHttpError,
  LogLayoutError,
  WorkoutLogError,
} from './lib/workoutLogs/errors'
export type { LogLayoutCode, LogLayoutDetails } from './lib/workoutLogs/errors'
export {
  DEFAULT_LOGS_BASE_URL,
  DEFAULT_USER_BASE_URL,
  type ClientConfig,
  type ClientConfigInput,
  type ClientOptions,
  type ClientOptionsInput,
  type ExerciseRecord,
  type MissingLogListMode,
  type SetRecord,
} from './schemas/workoutLog'
