import {
  ClientConfigSchema,
  ClientOptionsSchema,
  type ClientConfig,
  type ClientConfigInput,
  type ClientOptions,
  type ClientOptionsInput,
} from '@/schemas/workoutLog'
import { parseWithSchema } from '@/utils/zod'
import { ClientConfigError } from './errors'

export const resolveClientConfig = (input: ClientConfigInput = {}): ClientConfig => {
  const parsed = parseWithSchema(input, ClientConfigSchema)
  if (!parsed.ok) throw new ClientConfigError(parsed.issues)
  return Object.freeze(parsed.data)
}

export const resolveClientOptions = (input: ClientOptionsInput = {}): ClientOptions => {
  const parsed = parseWithSchema(input, ClientOptionsSchema)
  if (!parsed.ok) throw new ClientConfigError(parsed.issues)
  return parsed.data
}

export const DEFAULT_CLIENT_CONFIG: ClientConfig = resolveClientConfig()
