import { Hono } from 'hono'
import { logger } from 'hono/logger'
import { createSearchRoutes } from './routes/search.js'
import type { NearbySearchService } from './services/nearby.service.js'

export function createApp(service?: NearbySearchService) {
  const app = new Hono()

  app.use('*', logger())

  app.get('/', (c) =>
    c.json({
      name: 'pawpoints',
      endpoints: ['POST /api/v1/search/nearby', 'GET /api/v1/search/health'],
    })
  )

  app.route('/api/v1/search', createSearchRoutes(service))

  return app
}
