import type { GeoPoint, ResultRecord } from '../types.js'
import { overpassElementSchema, type OverpassElement, type OverpassResponse, type OverpassTags } from './schema.js'

const EARTH_RADIUS_M = 6371000

// Joined in this order when no addr:full is present
const ADDRESS_PARTS = ['addr:housenumber', 'addr:street', 'addr:district', 'addr:city', 'addr:postcode'] as const

export interface NormalizeOptions {
  topN: number
  // Collapse records sharing (name, address); a way and its member node often both match
  dedupe: boolean
}

/**
 * Great-circle distance between two points (Haversine formula)
 * Returns distance in meters
 */
export function haversineMeters(a: GeoPoint, b: GeoPoint): number {
  const φ1 = (a.lat * Math.PI) / 180
  const φ2 = (b.lat * Math.PI) / 180
  const Δφ = ((b.lat - a.lat) * Math.PI) / 180
  const Δλ = ((b.lon - a.lon) * Math.PI) / 180

  const h =
    Math.sin(Δφ / 2) * Math.sin(Δφ / 2) +
    Math.cos(φ1) * Math.cos(φ2) * Math.sin(Δλ / 2) * Math.sin(Δλ / 2)

  return 2 * EARTH_RADIUS_M * Math.asin(Math.min(1, Math.sqrt(h)))
}

/**
 * Direct lat/lon for nodes, computed center for ways and relations
 */
export function extractCenter(element: OverpassElement): GeoPoint | null {
  if (element.lat != null && element.lon != null) {
    return { lat: element.lat, lon: element.lon }
  }

  const center = element.center
  if (center?.lat != null && center.lon != null) {
    return { lat: center.lat, lon: center.lon }
  }

  return null
}

function tag(tags: OverpassTags, key: string): string | undefined {
  const value = tags[key]
  return typeof value === 'string' && value !== '' ? value : undefined
}

/**
 * Best-effort address from OSM addr:* tags
 */
export function buildAddress(tags: OverpassTags | null | undefined): string | null {
  if (!tags) return null

  const full = tag(tags, 'addr:full')
  if (full) {
    return full.trim() || null
  }

  const parts: string[] = []
  for (const key of ADDRESS_PARTS) {
    const value = tag(tags, key)
    if (value) parts.push(value)
  }

  // Some shops only fill in a short contact address
  if (parts.length === 0) {
    const contact = tag(tags, 'contact:address')
    if (contact) parts.push(contact)
  }

  return parts.join(' ').trim() || null
}

export function toResultRecord(name: string | null, address: string | null, distanceM: number): ResultRecord {
  return {
    name,
    address,
    rating: null,
    distance_m: Math.round(distanceM),
  }
}

/**
 * Turn an Overpass response into records ordered by distance from the origin.
 * Elements without usable coordinates are dropped.
 */
export function normalizeElements(
  response: Pick<OverpassResponse, 'elements'>,
  origin: GeoPoint,
  options: NormalizeOptions
): ResultRecord[] {
  const seen = new Set<string>()
  const records: ResultRecord[] = []

  for (const raw of response.elements) {
    const parsed = overpassElementSchema.safeParse(raw)
    if (!parsed.success) continue

    const element = parsed.data
    const center = extractCenter(element)
    if (!center) continue

    const tags = element.tags ?? {}
    const name = tag(tags, 'name') ?? null
    const address = buildAddress(tags)

    if (options.dedupe) {
      const key = JSON.stringify([name ?? '', address ?? ''])
      if (seen.has(key)) continue
      seen.add(key)
    }

    records.push(toResultRecord(name, address, haversineMeters(origin, center)))
  }

  records.sort((a, b) => a.distance_m - b.distance_m)

  const limit = Number.isNaN(options.topN) ? 0 : Math.max(0, Math.trunc(options.topN))
  return records.slice(0, limit)
}
