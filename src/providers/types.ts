/**
 * Core type definitions for the nearby place provider layer
 */

// Origin of a search, supplied by the caller
export interface GeoPoint {
  readonly lat: number
  readonly lon: number
}

export type SearchCategory = 'veterinary' | 'pet_friendly_food'

// Search request structure
export interface SearchRequest {
  origin: GeoPoint
  radiusM: number // meters
  topN: number // max records returned, clamped to >= 0
  category: SearchCategory
  strict: boolean // only meaningful for pet_friendly_food
}

// Output record (fixed shape, exactly these four keys)
export interface ResultRecord {
  name: string | null
  address: string | null
  rating: null // OSM has no rating concept
  distance_m: number // integer meters from the origin
}

// Provider result structure
export interface ProviderResult {
  provider: string
  category: SearchCategory
  places: ResultRecord[]
  metadata: {
    count: number
    latency: number // milliseconds
  }
}

// Base provider interface
export interface PlaceProvider {
  readonly name: string
  readonly timeout: number // per-attempt wait in ms

  search(request: SearchRequest): Promise<ProviderResult>
}

// Provider configuration
export interface ProviderConfig {
  name: string
  timeout: number
}
