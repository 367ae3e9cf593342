import type { PlaceProvider, ResultRecord, SearchCategory, SearchRequest } from '../providers/types.js'
import { OverpassProvider } from '../providers/overpass.provider.js'
import { InvalidArgumentError } from '../providers/overpass/errors.js'
import { env, overpassConfigFromEnv } from '../config/env.js'

export const DEFAULT_RADIUS_M = 1500
export const DEFAULT_TOP_N = 20

export interface VeterinarySearchOptions {
  radiusM?: number
  topN?: number
}

export interface PetFriendlyFoodSearchOptions extends VeterinarySearchOptions {
  // true: only dog/pets tagged places; false: every restaurant/cafe nearby
  strict?: boolean
}

export interface NearbySearchOptions extends PetFriendlyFoodSearchOptions {
  mode?: string
}

const MODE_ALIASES = new Map<string, SearchCategory>([
  ['veterinary', 'veterinary'],
  ['pet_friendly_food', 'pet_friendly_food'],
  ['pet_food', 'pet_friendly_food'],
  ['food', 'pet_friendly_food'],
])

/**
 * Resolve a free-form mode string (case and surrounding whitespace ignored)
 *
 * @throws InvalidArgumentError for anything but veterinary / pet_friendly_food and their aliases
 */
export function parseSearchMode(mode: string | null | undefined): SearchCategory {
  const key = (mode ?? '').trim().toLowerCase()
  const category = MODE_ALIASES.get(key)
  if (!category) {
    throw new InvalidArgumentError("mode must be 'veterinary' or 'pet_friendly_food'", 'mode')
  }
  return category
}

/**
 * Entry points for nearby searches. Every call is independent; the service
 * only holds the provider it was built with.
 */
export class NearbySearchService {
  constructor(private readonly provider: PlaceProvider) {}

  get providerName(): string {
    return this.provider.name
  }

  async searchVeterinary(lat: number, lon: number, options: VeterinarySearchOptions = {}): Promise<ResultRecord[]> {
    return this.run({
      origin: { lat, lon },
      radiusM: options.radiusM ?? DEFAULT_RADIUS_M,
      topN: options.topN ?? DEFAULT_TOP_N,
      category: 'veterinary',
      strict: false,
    })
  }

  async searchPetFriendlyFood(
    lat: number,
    lon: number,
    options: PetFriendlyFoodSearchOptions = {}
  ): Promise<ResultRecord[]> {
    return this.run({
      origin: { lat, lon },
      radiusM: options.radiusM ?? DEFAULT_RADIUS_M,
      topN: options.topN ?? DEFAULT_TOP_N,
      category: 'pet_friendly_food',
      strict: options.strict ?? true,
    })
  }

  /**
   * Unified entry point, dispatching on `mode` (default: veterinary)
   */
  async searchNearby(lat: number, lon: number, options: NearbySearchOptions = {}): Promise<ResultRecord[]> {
    const { mode = 'veterinary', ...rest } = options
    const category = parseSearchMode(mode)

    if (category === 'veterinary') {
      return this.searchVeterinary(lat, lon, { radiusM: rest.radiusM, topN: rest.topN })
    }
    return this.searchPetFriendlyFood(lat, lon, rest)
  }

  private async run(request: SearchRequest): Promise<ResultRecord[]> {
    const result = await this.provider.search(request)
    return result.places
  }
}

// Shared instance configured from the environment
export const nearbyService = new NearbySearchService(new OverpassProvider(overpassConfigFromEnv(env)))

export function searchNearbyVeterinary(
  lat: number,
  lon: number,
  options?: VeterinarySearchOptions
): Promise<ResultRecord[]> {
  return nearbyService.searchVeterinary(lat, lon, options)
}

export function searchNearbyPetFriendlyFood(
  lat: number,
  lon: number,
  options?: PetFriendlyFoodSearchOptions
): Promise<ResultRecord[]> {
  return nearbyService.searchPetFriendlyFood(lat, lon, options)
}

export function searchNearby(lat: number, lon: number, options?: NearbySearchOptions): Promise<ResultRecord[]> {
  return nearbyService.searchNearby(lat, lon, options)
}
