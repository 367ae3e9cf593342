import { BaseProvider } from './base.js'
import type { SearchRequest, ProviderResult } from './types.js'
import { OverpassClient, type OverpassClientOptions, type OverpassConfig } from './overpass/client.js'
import { buildQuery } from './overpass/query.js'
import { normalizeElements } from './overpass/normalize.js'

/**
 * OpenStreetMap Overpass Provider
 * Public API, no key required. Shared instances rate limit aggressively (429/5xx),
 * which the client absorbs with backoff.
 * API Docs: https://wiki.openstreetmap.org/wiki/Overpass_API
 */
export class OverpassProvider extends BaseProvider {
  private readonly client: OverpassClient

  constructor(config: OverpassConfig, options: Omit<OverpassClientOptions, 'onRetry'> = {}) {
    super({
      name: 'overpass',
      timeout: config.timeoutMs,
    })

    this.client = new OverpassClient(config, {
      ...options,
      onRetry: (error, attempt, delayMs) => {
        const reason = error instanceof Error ? error.message : String(error)
        this.log('warn', `Attempt ${attempt}/${config.maxAttempts} failed, retrying in ${delayMs}ms`, reason)
      },
    })
  }

  get endpoint(): string {
    return this.client.config.url
  }

  async search(request: SearchRequest): Promise<ProviderResult> {
    const query = buildQuery(request)

    const { result, latency } = await this.measureTime(async () => {
      try {
        const response = await this.client.execute(query)

        if (response.remark) {
          this.log('warn', 'Overpass attached a remark to the response', response.remark)
        }

        return normalizeElements(response, request.origin, {
          topN: request.topN,
          dedupe: request.category === 'pet_friendly_food',
        })
      } catch (error) {
        this.log('error', `Overpass ${request.category} search failed`, error)
        throw error
      }
    })

    this.log('info', `Found ${result.length} ${request.category} places in ${latency}ms`)

    return {
      provider: this.name,
      category: request.category,
      places: result,
      metadata: {
        count: result.length,
        latency,
      },
    }
  }
}
