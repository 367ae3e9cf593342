// MUST load .env FIRST before any other imports
import { config } from 'dotenv'
config()

import { z } from 'zod'
import { DEFAULT_OVERPASS_CONFIG, type OverpassConfig } from '../providers/overpass/client.js'

// Environment variable schema
export const envSchema = z.object({
  // Overpass instance
  OVERPASS_URL: z.string().url().default(DEFAULT_OVERPASS_CONFIG.url),
  OVERPASS_USER_AGENT: z.string().min(1).default(DEFAULT_OVERPASS_CONFIG.userAgent),
  OVERPASS_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_OVERPASS_CONFIG.timeoutMs),
  OVERPASS_MAX_ATTEMPTS: z.coerce.number().int().positive().default(DEFAULT_OVERPASS_CONFIG.maxAttempts),
  OVERPASS_BACKOFF_MS: z.coerce.number().int().nonnegative().default(DEFAULT_OVERPASS_CONFIG.backoffMs),

  // Server
  PORT: z.string().default('3000').transform(Number),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
})

// Type-safe environment variables
export type Env = z.infer<typeof envSchema>

// Parse and validate environment variables
export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  try {
    return envSchema.parse(source)
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('❌ Invalid environment variables:')
      error.issues.forEach((issue) => {
        console.error(`  - ${issue.path.join('.')}: ${issue.message}`)
      })
      process.exit(1)
    }
    throw error
  }
}

/**
 * Explicit client configuration; the Overpass client never reads the environment itself
 */
export function overpassConfigFromEnv(source: Env): OverpassConfig {
  return {
    url: source.OVERPASS_URL,
    userAgent: source.OVERPASS_USER_AGENT,
    timeoutMs: source.OVERPASS_TIMEOUT_MS,
    maxAttempts: source.OVERPASS_MAX_ATTEMPTS,
    backoffMs: source.OVERPASS_BACKOFF_MS,
  }
}

export const env = parseEnv()
