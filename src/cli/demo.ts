import { InvalidArgumentError } from '../providers/overpass/errors.js'
import type { NearbySearchService } from '../services/nearby.service.js'
import { formatSection } from './format.js'

export interface DemoFlags {
  lat?: string
  lon?: string
  radius?: string
  top?: string
  lenient?: boolean
}

export interface DemoDeps {
  service: NearbySearchService
  prompt: (question: string) => Promise<string>
  print: (text: string) => void
}

function parseNumber(raw: string, argument: string, fallback?: number): number {
  const text = raw.trim()
  if (text === '' && fallback !== undefined) return fallback

  const value = Number(text)
  if (text === '' || !Number.isFinite(value)) {
    throw new InvalidArgumentError(`${argument} must be a number, got "${raw}"`, argument)
  }
  return value
}

async function resolve(
  flag: string | undefined,
  question: string,
  deps: DemoDeps
): Promise<string> {
  return flag ?? (await deps.prompt(question))
}

/**
 * Ask for whatever the flags left out, then print both searches
 */
export async function runDemo(flags: DemoFlags, deps: DemoDeps): Promise<void> {
  const lat = parseNumber(await resolve(flags.lat, 'Latitude: ', deps), 'latitude')
  const lon = parseNumber(await resolve(flags.lon, 'Longitude: ', deps), 'longitude')
  const radiusM = Math.trunc(parseNumber(await resolve(flags.radius, 'Radius meters (e.g. 1500): ', deps), 'radius', 1500))
  const topN = Math.trunc(parseNumber(await resolve(flags.top, 'Top N (e.g. 10): ', deps), 'top', 10))
  const strict = !flags.lenient

  const vets = await deps.service.searchNearby(lat, lon, { radiusM, topN, mode: 'veterinary' })
  deps.print('\n' + formatSection('Nearby veterinary', vets))

  const foods = await deps.service.searchNearby(lat, lon, { radiusM, topN, mode: 'pet_friendly_food', strict })
  deps.print('\n' + formatSection(`Nearby pet-friendly food (strict=${strict})`, foods))
}
