import { z } from 'zod'

/**
 * Overpass JSON output (`[out:json]`).
 * The envelope is checked strictly; elements are parsed one at a time by the
 * normalizer so a single odd element does not sink the whole response.
 */

const coordinateSchema = z.object({
  lat: z.number().nullish(),
  lon: z.number().nullish(),
})

export const overpassElementSchema = z.object({
  type: z.string().optional(), // node | way | relation
  id: z.number().optional(),
  lat: z.number().nullish(),
  lon: z.number().nullish(),
  center: coordinateSchema.nullish(),
  tags: z.record(z.string(), z.unknown()).nullish(),
})

export const overpassResponseSchema = z.object({
  elements: z.array(z.unknown()).default([]),
  remark: z.string().optional(),
})

export type OverpassElement = z.infer<typeof overpassElementSchema>
export type OverpassResponse = z.infer<typeof overpassResponseSchema>
export type OverpassTags = NonNullable<OverpassElement['tags']>
