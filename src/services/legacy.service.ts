import type { ResultRecord } from '../providers/types.js'
import { nearbyService, type NearbySearchService } from './nearby.service.js'

/**
 * Call shapes kept from the Google Places era so older callers only swap the import.
 * apiKey, language and fieldMask mean nothing to Overpass and are ignored.
 */

export interface LegacyVeterinaryParams {
  apiKey: string
  latitude: number
  longitude: number
  radius?: number
  language?: string | null
  topN?: number
}

export interface VeterinaryV1Params {
  apiKey: string
  latitude: number
  longitude: number
  radius?: number
  maxResults?: number
  fieldMask?: string | null
}

export function searchNearbyVeterinaryLegacy(
  params: LegacyVeterinaryParams,
  service: NearbySearchService = nearbyService
): Promise<ResultRecord[]> {
  const { latitude, longitude, radius = 1500, topN = 20 } = params
  return service.searchVeterinary(latitude, longitude, { radiusM: radius, topN })
}

// v1 took a float radius
export function searchNearbyVeterinaryV1(
  params: VeterinaryV1Params,
  service: NearbySearchService = nearbyService
): Promise<ResultRecord[]> {
  const { latitude, longitude, radius = 1500, maxResults = 20 } = params
  return service.searchVeterinary(latitude, longitude, { radiusM: Math.trunc(radius), topN: maxResults })
}
