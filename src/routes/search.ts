import { Hono } from 'hono'
import { nearbyService, type NearbySearchService } from '../services/nearby.service.js'
import { isInvalidArgumentError, isTransportError } from '../providers/overpass/errors.js'
import { validateBody, nearbyQuerySchema } from '../middleware/validator.js'

export function createSearchRoutes(service: NearbySearchService = nearbyService) {
  const search = new Hono()

  /**
   * POST /api/v1/search/nearby
   * Nearby veterinary or pet-friendly food places
   */
  search.post('/nearby', validateBody(nearbyQuerySchema), async (c) => {
    const query = c.get('validatedData')
    const started = performance.now()

    try {
      const results = await service.searchNearby(query.lat, query.lon, {
        radiusM: query.radius_m,
        topN: query.top_n,
        mode: query.mode,
        strict: query.strict,
      })

      return c.json({
        success: true,
        results,
        metadata: {
          mode: query.mode,
          count: results.length,
          latency_ms: Math.round(performance.now() - started),
        },
      })
    } catch (error) {
      if (isInvalidArgumentError(error)) {
        return c.json({ success: false, error: 'Invalid argument', message: error.message }, 400)
      }

      console.error('[API] Nearby search failed:', error)

      if (isTransportError(error)) {
        return c.json(
          { success: false, error: 'Upstream unavailable', message: error.message, attempts: error.attempts },
          502
        )
      }

      return c.json(
        {
          success: false,
          error: 'Search failed',
          message: error instanceof Error ? error.message : 'Unknown error',
        },
        500
      )
    }
  })

  /**
   * GET /api/v1/search/health
   */
  search.get('/health', (c) => {
    return c.json({
      success: true,
      status: 'healthy',
      provider: service.providerName,
    })
  })

  return search
}
