import { describe, expect, it } from 'vitest'
import { CHART_SOURCES, defineSources, type SourceDescriptor } from '../index.js'

const base: SourceDescriptor = {
  id: 'alpha',
  name: 'Alpha',
  identifierPrefixes: ['AA'],
  adapterKind: 'StaticHTML',
  baseEndpoint: 'https://alpha.example/',
  timeoutClass: 'fast',
  isOffline: false,
}

describe('defineSources', () => {
  it('accepts the shipped table', () => {
    expect(CHART_SOURCES.map((s) => s.id)).toEqual([
      'aipnz',
      'anac',
      'aviationapi',
      'avinor',
      'decea',
      'enaire',
      'faa',
    ])
    expect(Object.isFrozen(CHART_SOURCES)).toBe(true)
    expect(Object.isFrozen(CHART_SOURCES[0])).toBe(true)
  })

  it('rejects a prefix claimed by two sources', () => {
    expect(() =>
      defineSources([base, { ...base, id: 'beta', identifierPrefixes: ['BB', 'AA'] }])
    ).toThrow('Prefix AA is claimed by both alpha and beta')
  })

  it('allows nested prefixes of different length', () => {
    const table = defineSources([base, { ...base, id: 'beta', identifierPrefixes: ['AAB'] }])
    expect(table).toHaveLength(2)
  })

  it('rejects duplicate ids', () => {
    expect(() => defineSources([base, { ...base, identifierPrefixes: ['CC'] }])).toThrow(
      'Duplicate chart source id: alpha'
    )
  })

  it('ties isOffline to the offline database kind', () => {
    expect(() => defineSources([{ ...base, isOffline: true }])).toThrow('isOffline')
    expect(() => defineSources([{ ...base, adapterKind: 'OfflineDatabase' }])).toThrow('isOffline')
  })

  it('requires the slow class for browser automation', () => {
    expect(() => defineSources([{ ...base, adapterKind: 'BrowserAutomation' }])).toThrow(
      'slow timeout class'
    )
  })

  it('rejects lower-case prefixes', () => {
    expect(() => defineSources([{ ...base, identifierPrefixes: ['aa'] }])).toThrow('invalid prefix')
  })
})
