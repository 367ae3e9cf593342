import axios, { type AxiosInstance } from 'axios'
import { setTimeout as sleep } from 'node:timers/promises'
import { OverpassResponseError, TransportError } from './errors.js'
import { overpassResponseSchema, type OverpassResponse } from './schema.js'

/**
 * Connection settings for one Overpass instance
 */
export interface OverpassConfig {
  url: string
  userAgent: string // public instances ask for a contact in the UA
  timeoutMs: number // per attempt, constant across retries
  maxAttempts: number
  backoffMs: number // first retry delay, doubled after every failure
}

export const DEFAULT_OVERPASS_CONFIG: OverpassConfig = {
  url: 'https://overpass-api.de/api/interpreter',
  userAgent: 'pawpoints/1.0 (contact: you@example.com)',
  timeoutMs: 45000,
  maxAttempts: 6,
  backoffMs: 1250,
}

// Rate limited, bad gateway, unavailable, gateway timeout
export const TRANSIENT_STATUSES: ReadonlySet<number> = new Set([429, 502, 503, 504])

export interface OverpassClientOptions {
  http?: Pick<AxiosInstance, 'post'>
  sleep?: (ms: number) => Promise<void>
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void
}

/**
 * Whether another attempt could succeed without caller intervention.
 * Transient HTTP statuses and transport-level axios failures (no response:
 * DNS, connection reset, timeout) are retryable; everything else is not.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof OverpassResponseError) {
    return TRANSIENT_STATUSES.has(error.status)
  }

  if (axios.isAxiosError(error)) {
    return error.response === undefined || TRANSIENT_STATUSES.has(error.response.status)
  }

  return false
}

function statusOf(error: unknown): number | undefined {
  if (error instanceof OverpassResponseError) return error.status
  if (axios.isAxiosError(error)) return error.response?.status
  return undefined
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * OverpassClient posts Overpass QL to an interpreter endpoint with
 * exponential backoff (no jitter, no cap) on transient failures.
 *
 * @example
 * ```typescript
 * const client = new OverpassClient(DEFAULT_OVERPASS_CONFIG)
 * const { elements } = await client.execute(buildVeterinaryQuery(origin, 1500))
 * ```
 */
export class OverpassClient {
  private readonly http: Pick<AxiosInstance, 'post'>
  private readonly sleep: (ms: number) => Promise<void>
  private readonly onRetry?: OverpassClientOptions['onRetry']

  constructor(
    public readonly config: OverpassConfig,
    options: OverpassClientOptions = {}
  ) {
    this.http = options.http ?? axios.create()
    this.sleep = options.sleep ?? ((ms) => sleep(ms))
    this.onRetry = options.onRetry
  }

  /**
   * Run a query, retrying transient failures up to `maxAttempts` times in total.
   *
   * @throws TransportError when attempts run out (retryable: true) or on the
   * first non-retryable failure (retryable: false)
   */
  async execute(query: string): Promise<OverpassResponse> {
    const { maxAttempts } = this.config
    let delayMs = this.config.backoffMs
    let lastError: unknown

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        return await this.post(query)
      } catch (error) {
        lastError = error

        if (!isRetryableError(error)) {
          throw new TransportError(
            `Overpass request failed: ${messageOf(error)}`,
            attempt,
            false,
            statusOf(error),
            { cause: error }
          )
        }

        if (attempt < maxAttempts) {
          this.onRetry?.(error, attempt, delayMs)
          await this.sleep(delayMs)
          delayMs *= 2
        }
      }
    }

    throw new TransportError(
      `Overpass request failed after ${maxAttempts} attempts: ${messageOf(lastError)}`,
      maxAttempts,
      true,
      statusOf(lastError),
      { cause: lastError }
    )
  }

  /**
   * Single POST, form-encoded `data=<query>`
   */
  private async post(query: string): Promise<OverpassResponse> {
    const response = await this.http.post<unknown>(this.config.url, new URLSearchParams({ data: query }), {
      headers: {
        'User-Agent': this.config.userAgent,
        Accept: 'application/json',
      },
      timeout: this.config.timeoutMs,
      responseType: 'json',
      validateStatus: () => true,
    })

    if (response.status < 200 || response.status >= 300) {
      throw new OverpassResponseError(`Overpass returned HTTP ${response.status}`, response.status)
    }

    const parsed = overpassResponseSchema.safeParse(response.data)
    if (!parsed.success) {
      throw new OverpassResponseError('Overpass returned a body that is not Overpass JSON', response.status)
    }

    return parsed.data
  }
}
