import { describe, it, expect } from 'vitest'
import { DEFAULT_LOGS_BASE_URL, DEFAULT_USER_BASE_URL } from '@/schemas/workoutLog'
import { DEFAULT_CLIENT_CONFIG, resolveClientConfig, resolveClientOptions } from '../config'
import { ClientConfigError } from '../errors'

const catchConfigError = (fn: () => unknown): ClientConfigError => {
  try {
    fn()
  } catch (e: unknown) {
    if (e instanceof ClientConfigError) return e
    throw e
  }
  throw new Error('expected ClientConfigError')
}

describe('resolveClientConfig', () => {
  it('defaults to the production endpoints', () => {
    expect(DEFAULT_CLIENT_CONFIG).toEqual({
      user_base_url: DEFAULT_USER_BASE_URL,
      logs_base_url: DEFAULT_LOGS_BASE_URL,
    })
  })

  it('merges overrides onto the defaults and freezes the result', () => {
    const config = resolveClientConfig({ logs_base_url: 'https://logs.example.test/log/' })
    expect(config).toEqual({
      user_base_url: DEFAULT_USER_BASE_URL,
      logs_base_url: 'https://logs.example.test/log/',
    })
    expect(Object.isFrozen(config)).toBe(true)
  })

  it('rejects a url that does not parse', () => {
    const err = catchConfigError(() => resolveClientConfig({ user_base_url: 'not a url' }))
    expect(err.code).toBe('client_config_invalid')
    expect(err.issues.map((i) => i.path)).toEqual(['user_base_url'])
  })
})

describe('resolveClientOptions', () => {
  it('fills in defaults', () => {
    expect(resolveClientOptions()).toEqual({ timeoutMs: 15_000, missingLogList: 'empty' })
  })

  it('rejects a non-positive timeout', () => {
    const err = catchConfigError(() => resolveClientOptions({ timeoutMs: 0 }))
    expect(err.issues.map((i) => i.path)).toEqual(['timeoutMs'])
  })
})
