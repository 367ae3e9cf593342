import { describe, it, expect } from 'vitest'
import { buildAddress, extractCenter, haversineMeters, normalizeElements, toResultRecord } from './normalize.js'

const origin = { lat: 0, lon: 0 }

// Along the equator one thousandth of a degree is ~111.19m
function node(lon: number, tags: Record<string, string> = {}) {
  return { type: 'node', id: Math.round(lon * 1e6), lat: 0, lon, tags }
}

describe('haversineMeters', () => {
  it('is zero for identical points', () => {
    const points = [origin, { lat: 25.033, lon: 121.5654 }, { lat: -33.86, lon: 151.21 }, { lat: 89.9, lon: -179.9 }]
    for (const p of points) {
      expect(haversineMeters(p, p)).toBe(0)
    }
  })

  it('is symmetric', () => {
    const a = { lat: 25.033, lon: 121.5654 }
    const b = { lat: 25.0478, lon: 121.517 }

    expect(haversineMeters(a, b)).toBe(haversineMeters(b, a))
  })

  it('uses an earth radius of 6,371,000 m', () => {
    expect(haversineMeters(origin, { lat: 0, lon: 1 })).toBeCloseTo(111194.93, 1)
    expect(haversineMeters(origin, { lat: 0.001, lon: 0 })).toBeCloseTo(111.19, 2)
  })
})

describe('extractCenter', () => {
  it('prefers direct coordinates', () => {
    expect(extractCenter({ lat: 1, lon: 2, center: { lat: 3, lon: 4 } })).toEqual({ lat: 1, lon: 2 })
  })

  it('falls back to the computed center of ways and relations', () => {
    expect(extractCenter({ type: 'way', center: { lat: 3, lon: 4 } })).toEqual({ lat: 3, lon: 4 })
  })

  it('returns null without any coordinate', () => {
    expect(extractCenter({ type: 'relation' })).toBeNull()
    expect(extractCenter({ lat: 1 })).toBeNull()
    expect(extractCenter({ center: { lat: 3 } })).toBeNull()
  })
})

describe('buildAddress', () => {
  it('uses addr:full when present', () => {
    expect(buildAddress({ 'addr:full': '  12 Harbour Rd, Springfield  ', 'addr:street': 'Ignored St' })).toBe(
      '12 Harbour Rd, Springfield'
    )
  })

  it('returns null when addr:full is blank', () => {
    expect(buildAddress({ 'addr:full': '   ' })).toBeNull()
  })

  it('joins the addr parts in fixed order', () => {
    expect(
      buildAddress({
        'addr:postcode': '100',
        'addr:city': 'Springfield',
        'addr:street': 'Harbour Rd',
        'addr:housenumber': '12',
        'addr:district': 'Docklands',
      })
    ).toBe('12 Harbour Rd Docklands Springfield 100')
  })

  it('skips missing parts', () => {
    expect(buildAddress({ 'addr:street': 'Harbour Rd', 'addr:city': 'Springfield' })).toBe('Harbour Rd Springfield')
  })

  it('falls back to contact:address', () => {
    expect(buildAddress({ 'contact:address': 'Pier 4' })).toBe('Pier 4')
  })

  it('ignores contact:address when addr parts exist', () => {
    expect(buildAddress({ 'addr:street': 'Harbour Rd', 'contact:address': 'Pier 4' })).toBe('Harbour Rd')
  })

  it('returns null for no tags', () => {
    expect(buildAddress(undefined)).toBeNull()
    expect(buildAddress({})).toBeNull()
    expect(buildAddress({ name: 'Only a name' })).toBeNull()
  })
})

describe('toResultRecord', () => {
  it('has exactly the four output keys with a null rating', () => {
    const record = toResultRecord('Paws Clinic', null, 111.6)

    expect(Object.keys(record).sort()).toEqual(['address', 'distance_m', 'name', 'rating'])
    expect(record).toEqual({ name: 'Paws Clinic', address: null, rating: null, distance_m: 112 })
  })
})

describe('normalizeElements', () => {
  it('sorts by distance and rounds meters', () => {
    const records = normalizeElements(
      {
        elements: [
          node(0.005, { name: 'Far' }),
          node(0.001, { name: 'Near', 'addr:street': 'Harbour Rd' }),
          { type: 'way', id: 7, center: { lat: 0, lon: 0.003 }, tags: { name: 'Middle' } },
        ],
      },
      origin,
      { topN: 20, dedupe: false }
    )

    expect(records).toEqual([
      { name: 'Near', address: 'Harbour Rd', rating: null, distance_m: 111 },
      { name: 'Middle', address: null, rating: null, distance_m: 334 },
      { name: 'Far', address: null, rating: null, distance_m: 556 },
    ])
  })

  it('drops elements without coordinates or with an unexpected shape', () => {
    const records = normalizeElements(
      {
        elements: [
          { type: 'relation', id: 1, tags: { name: 'No center' } },
          'not an element',
          { type: 'node', id: 2, lat: 'north', lon: 0 },
          node(0.002, { name: 'Kept' }),
        ],
      },
      origin,
      { topN: 20, dedupe: false }
    )

    expect(records).toEqual([{ name: 'Kept', address: null, rating: null, distance_m: 222 }])
  })

  it('maps missing or empty names to null', () => {
    const records = normalizeElements({ elements: [node(0.001), node(0.002, { name: '' })] }, origin, {
      topN: 20,
      dedupe: false,
    })

    expect(records.map((r) => r.name)).toEqual([null, null])
  })

  it('deduplicates on (name, address), keeping the first occurrence', () => {
    const elements = [
      node(0.005, { name: 'Dog Cafe', 'addr:street': 'Harbour Rd' }),
      { type: 'way', id: 9, center: { lat: 0, lon: 0.001 }, tags: { name: 'Dog Cafe', 'addr:street': 'Harbour Rd' } },
      node(0.002, { name: 'Dog Cafe', 'addr:street': 'Other Rd' }),
    ]

    expect(normalizeElements({ elements }, origin, { topN: 20, dedupe: true })).toEqual([
      { name: 'Dog Cafe', address: 'Other Rd', rating: null, distance_m: 222 },
      { name: 'Dog Cafe', address: 'Harbour Rd', rating: null, distance_m: 556 },
    ])
    expect(normalizeElements({ elements }, origin, { topN: 20, dedupe: false })).toHaveLength(3)
  })

  it('treats unnamed, unaddressed places as one dedupe key', () => {
    const records = normalizeElements({ elements: [node(0.001), node(0.002)] }, origin, { topN: 20, dedupe: true })

    expect(records).toEqual([{ name: null, address: null, rating: null, distance_m: 111 }])
  })

  it('truncates to topN after sorting', () => {
    const elements = [node(0.003, { name: 'C' }), node(0.001, { name: 'A' }), node(0.002, { name: 'B' })]

    expect(normalizeElements({ elements }, origin, { topN: 2, dedupe: false }).map((r) => r.name)).toEqual(['A', 'B'])
    expect(normalizeElements({ elements }, origin, { topN: 2.9, dedupe: false })).toHaveLength(2)
  })

  it('returns nothing for topN of zero or below', () => {
    const elements = [node(0.001, { name: 'A' }), node(0.002, { name: 'B' })]

    expect(normalizeElements({ elements }, origin, { topN: 0, dedupe: false })).toEqual([])
    expect(normalizeElements({ elements }, origin, { topN: -3, dedupe: false })).toEqual([])
  })

  it('produces a non-decreasing distance sequence', () => {
    const elements = [0.009, 0.004, 0.007, 0.001, 0.006, 0.002].map((lon, i) => node(lon, { name: `P${i}` }))
    const distances = normalizeElements({ elements }, origin, { topN: 20, dedupe: true }).map((r) => r.distance_m)

    for (let i = 1; i < distances.length; i++) {
      expect(distances[i]).toBeGreaterThanOrEqual(distances[i - 1])
    }
    expect(distances).toHaveLength(6)
  })
})
