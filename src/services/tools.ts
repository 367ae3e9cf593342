import { tool } from 'ai'
import { z } from 'zod'
import type { ResultRecord } from '../providers/types.js'
import { nearbyService, type NearbySearchService } from './nearby.service.js'

/**
 * Pet place tool definitions
 * Each tool represents a capability that the LLM can invoke
 */

const coordinatesSchema = {
  lat: z.number().min(-90).max(90).describe("Latitude of search location - use the user's current latitude from the system message"),
  lon: z.number().min(-180).max(180).describe("Longitude of search location - use the user's current longitude from the system message"),
  radius: z.number().int().positive().optional().describe('Search radius in meters (default: 1500)'),
  limit: z.number().int().nonnegative().optional().describe('Maximum number of results (default: 10)'),
}

export const veterinaryInputSchema = z.object(coordinatesSchema)

export const petFriendlyFoodInputSchema = z.object({
  ...coordinatesSchema,
  strict: z
    .boolean()
    .optional()
    .describe('true (default): only places tagged dog/pet friendly; false: every restaurant and cafe nearby'),
})

export interface ToolSearchResult {
  count: number
  places: ResultRecord[]
  error?: string
}

function toolError(prefix: string, error: unknown): ToolSearchResult {
  return {
    error: `${prefix}: ${error instanceof Error ? error.message : 'Unknown error'}`,
    count: 0,
    places: [],
  }
}

export async function runVeterinaryTool(
  service: NearbySearchService,
  input: z.infer<typeof veterinaryInputSchema>
): Promise<ToolSearchResult> {
  const { lat, lon, radius = 1500, limit = 10 } = input
  console.log(`[Tool: search_veterinary] lat=${lat}, lon=${lon}, radius=${radius}m`)

  try {
    const places = await service.searchVeterinary(lat, lon, { radiusM: radius, topN: limit })
    return { count: places.length, places }
  } catch (error) {
    return toolError('Failed to search veterinary clinics', error)
  }
}

export async function runPetFriendlyFoodTool(
  service: NearbySearchService,
  input: z.infer<typeof petFriendlyFoodInputSchema>
): Promise<ToolSearchResult> {
  const { lat, lon, radius = 1500, limit = 10, strict = true } = input
  console.log(`[Tool: search_pet_friendly_food] lat=${lat}, lon=${lon}, radius=${radius}m, strict=${strict}`)

  try {
    const places = await service.searchPetFriendlyFood(lat, lon, { radiusM: radius, topN: limit, strict })
    return { count: places.length, places }
  } catch (error) {
    return toolError('Failed to search pet-friendly food', error)
  }
}

/**
 * All available tools for the AI service, bound to one search service
 */
export function createPetTools(service: NearbySearchService = nearbyService) {
  return {
    search_veterinary: tool({
      description:
        "Search for veterinary clinics and animal hospitals near a location. Use this when users ask about a vet, a sick pet or pet emergencies. IMPORTANT: You must provide the user's latitude and longitude coordinates.",
      inputSchema: veterinaryInputSchema,
      execute: (input) => runVeterinaryTool(service, input),
    }),
    search_pet_friendly_food: tool({
      description:
        "Search for restaurants and cafes that welcome pets near a location. Use this when users want to eat out with their dog or other pets. IMPORTANT: You must provide the user's latitude and longitude coordinates.",
      inputSchema: petFriendlyFoodInputSchema,
      execute: (input) => runPetFriendlyFoodTool(service, input),
    }),
  }
}
