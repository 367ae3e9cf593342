import type { MiddlewareHandler } from 'hono'
import { z } from 'zod'

/**
 * Parse the JSON body against a zod schema and expose it as `validatedData`
 */
export function validateBody<T extends z.ZodTypeAny>(
  schema: T
): MiddlewareHandler<{ Variables: { validatedData: z.infer<T> } }> {
  return async (c, next) => {
    let body: unknown
    try {
      body = await c.req.json()
    } catch {
      return c.json({ success: false, error: 'Request body must be JSON' }, 400)
    }

    const result = schema.safeParse(body)
    if (!result.success) {
      return c.json(
        {
          success: false,
          error: 'Validation failed',
          issues: result.error.issues.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
          })),
        },
        400
      )
    }

    c.set('validatedData', result.data)
    await next()
  }
}

// Nearby search request body
export const nearbyQuerySchema = z.object({
  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(180),
  radius_m: z.number().int().positive().default(1500),
  top_n: z.number().int().nonnegative().default(20),
  mode: z.string().default('veterinary'),
  strict: z.boolean().default(true),
})

export type NearbyQueryInput = z.infer<typeof nearbyQuerySchema>
