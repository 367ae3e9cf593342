import { describe, it, expect } from 'vitest'
import { envSchema, overpassConfigFromEnv } from './env.js'
import { DEFAULT_OVERPASS_CONFIG } from '../providers/overpass/client.js'

describe('envSchema', () => {
  it('falls back to defaults', () => {
    const parsed = envSchema.parse({})

    expect(parsed.PORT).toBe(3000)
    expect(parsed.NODE_ENV).toBe('development')
    expect(overpassConfigFromEnv(parsed)).toEqual(DEFAULT_OVERPASS_CONFIG)
  })

  it('coerces numeric settings', () => {
    const parsed = envSchema.parse({
      OVERPASS_URL: 'https://overpass.test/api/interpreter',
      OVERPASS_USER_AGENT: 'pawpoints-test/1.0',
      OVERPASS_TIMEOUT_MS: '10000',
      OVERPASS_MAX_ATTEMPTS: '3',
      OVERPASS_BACKOFF_MS: '0',
      PORT: '8080',
      NODE_ENV: 'test',
    })

    expect(overpassConfigFromEnv(parsed)).toEqual({
      url: 'https://overpass.test/api/interpreter',
      userAgent: 'pawpoints-test/1.0',
      timeoutMs: 10000,
      maxAttempts: 3,
      backoffMs: 0,
    })
    expect(parsed.PORT).toBe(8080)
  })

  it('rejects invalid values', () => {
    expect(envSchema.safeParse({ OVERPASS_URL: 'not a url' }).success).toBe(false)
    expect(envSchema.safeParse({ OVERPASS_MAX_ATTEMPTS: '0' }).success).toBe(false)
    expect(envSchema.safeParse({ OVERPASS_TIMEOUT_MS: 'soon' }).success).toBe(false)
    expect(envSchema.safeParse({ NODE_ENV: 'staging' }).success).toBe(false)
  })
})
