import type { GeoPoint, SearchRequest } from '../types.js'

/**
 * Overpass QL query builder
 * Emits union queries over node/way/relation scoped to a circle around the origin.
 * Ways and relations come back with a computed center (`out center tags`).
 */

const QUERY_HEADER = '[out:json][timeout:25];'
const QUERY_FOOTER = 'out center tags;'

const ELEMENT_TYPES = ['node', 'way', 'relation'] as const

// dog=yes or dog=outside count as pet friendly, as does pets=yes
export const DOG_FILTER = '["dog"~"^(yes|outside)$"]'
export const PETS_FILTER = '["pets"="yes"]'

const VETERINARY_FILTER = '["amenity"="veterinary"]'
const RESTAURANT_FILTER = '["amenity"="restaurant"]'
const CAFE_FILTER = '["amenity"="cafe"]'
const FOOD_FILTER = '["amenity"~"^(restaurant|cafe)$"]'

/**
 * Build the `(around:radius,lat,lon)` spatial filter
 */
export function aroundFilter(origin: GeoPoint, radiusM: number): string {
  return `(around:${radiusM},${origin.lat},${origin.lon})`
}

/**
 * Expand one tag filter into node, way and relation clauses
 */
function elementClauses(filter: string, around: string): string[] {
  return ELEMENT_TYPES.map((type) => `${type}${filter}${around};`)
}

function assemble(clauses: string[]): string {
  return [QUERY_HEADER, '(', ...clauses.map((clause) => `  ${clause}`), ');', QUERY_FOOTER].join('\n')
}

export function buildVeterinaryQuery(origin: GeoPoint, radiusM: number): string {
  return assemble(elementClauses(VETERINARY_FILTER, aroundFilter(origin, radiusM)))
}

/**
 * Restaurants and cafes near the origin.
 * strict keeps only places tagged dog-friendly or pets=yes; otherwise every
 * restaurant/cafe is returned and the caller is expected to post-filter.
 */
export function buildPetFriendlyFoodQuery(origin: GeoPoint, radiusM: number, strict: boolean): string {
  const around = aroundFilter(origin, radiusM)

  if (!strict) {
    return assemble(elementClauses(FOOD_FILTER, around))
  }

  const filters = [
    RESTAURANT_FILTER + DOG_FILTER,
    CAFE_FILTER + DOG_FILTER,
    RESTAURANT_FILTER + PETS_FILTER,
    CAFE_FILTER + PETS_FILTER,
  ]

  return assemble(filters.flatMap((filter) => elementClauses(filter, around)))
}

export function buildQuery(request: SearchRequest): string {
  switch (request.category) {
    case 'veterinary':
      return buildVeterinaryQuery(request.origin, request.radiusM)
    case 'pet_friendly_food':
      return buildPetFriendlyFoodQuery(request.origin, request.radiusM, request.strict)
  }
}
