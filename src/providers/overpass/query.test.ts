import { describe, it, expect } from 'vitest'
import { aroundFilter, buildPetFriendlyFoodQuery, buildQuery, buildVeterinaryQuery } from './query.js'

const origin = { lat: 25.04, lon: 121.5 }

describe('aroundFilter', () => {
  it('formats radius, latitude and longitude in that order', () => {
    expect(aroundFilter(origin, 800)).toBe('(around:800,25.04,121.5)')
  })
})

describe('buildVeterinaryQuery', () => {
  it('unions node, way and relation clauses for amenity=veterinary', () => {
    expect(buildVeterinaryQuery(origin, 1500)).toBe(
      [
        '[out:json][timeout:25];',
        '(',
        '  node["amenity"="veterinary"](around:1500,25.04,121.5);',
        '  way["amenity"="veterinary"](around:1500,25.04,121.5);',
        '  relation["amenity"="veterinary"](around:1500,25.04,121.5);',
        ');',
        'out center tags;',
      ].join('\n')
    )
  })
})

describe('buildPetFriendlyFoodQuery', () => {
  it('strict mode filters restaurants and cafes by dog or pets tags', () => {
    const query = buildPetFriendlyFoodQuery(origin, 500, true)
    const clauses = query.split('\n').filter((line) => line.startsWith('  '))

    expect(clauses).toHaveLength(12)
    expect(clauses[0]).toBe('  node["amenity"="restaurant"]["dog"~"^(yes|outside)$"](around:500,25.04,121.5);')
    expect(clauses[5]).toBe('  relation["amenity"="cafe"]["dog"~"^(yes|outside)$"](around:500,25.04,121.5);')
    expect(clauses[6]).toBe('  node["amenity"="restaurant"]["pets"="yes"](around:500,25.04,121.5);')
    expect(clauses[11]).toBe('  relation["amenity"="cafe"]["pets"="yes"](around:500,25.04,121.5);')
  })

  it('lenient mode returns every restaurant and cafe', () => {
    const query = buildPetFriendlyFoodQuery(origin, 500, false)

    expect(query).toBe(
      [
        '[out:json][timeout:25];',
        '(',
        '  node["amenity"~"^(restaurant|cafe)$"](around:500,25.04,121.5);',
        '  way["amenity"~"^(restaurant|cafe)$"](around:500,25.04,121.5);',
        '  relation["amenity"~"^(restaurant|cafe)$"](around:500,25.04,121.5);',
        ');',
        'out center tags;',
      ].join('\n')
    )
    expect(query).not.toContain('"dog"')
  })
})

describe('buildQuery', () => {
  it('dispatches on category', () => {
    const base = { origin, radiusM: 1000, topN: 5, strict: true }

    expect(buildQuery({ ...base, category: 'veterinary' })).toBe(buildVeterinaryQuery(origin, 1000))
    expect(buildQuery({ ...base, category: 'pet_friendly_food' })).toBe(buildPetFriendlyFoodQuery(origin, 1000, true))
  })

  it('ignores strict for veterinary searches', () => {
    const base = { origin, radiusM: 1000, topN: 5, category: 'veterinary' as const }

    expect(buildQuery({ ...base, strict: false })).toBe(buildQuery({ ...base, strict: true }))
  })
})
