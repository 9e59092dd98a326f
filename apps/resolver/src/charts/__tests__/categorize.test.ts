import { describe, expect, it } from 'vitest'
import { CATEGORY_KEYWORDS, categorize } from '../categorize.js'

describe('categorize', () => {
  it.each([
    ['RNAV (GPS) RWY 04 SID', 'DepartureProcedure'],
    ['ILS OR LOC RWY 22', 'Approach'],
    ['AIRPORT DIAGRAM', 'Ground'],
    ['ALTERNATE MINIMUMS', 'General'],
    ['Llegada Normalizada RNAV', 'ArrivalProcedure'],
  ] as const)('%s -> %s', (title, expected) => {
    expect(categorize(title)).toBe(expected)
  })

  it('reads Portuguese and French titles', () => {
    expect(categorize('Carta de Saída Padrão por Instrumentos')).toBe('DepartureProcedure')
    expect(categorize("Carte d'aérodrome")).toBe('Ground')
    expect(categorize('Carta de Chegada Padrão')).toBe('ArrivalProcedure')
  })

  it('matches short acronyms only as whole words', () => {
    expect(categorize('AERODROME DETAILS')).toBe('General')
    expect(categorize('START-UP AND PUSH-BACK CHART')).toBe('General')
    expect(categorize('OUTSIDE AIR TEMPERATURE NOTES')).toBe('General')
    expect(categorize('RNAV(GPS) Z RWY 16')).toBe('Approach')
    expect(categorize('SIDS RWY 05')).toBe('DepartureProcedure')
  })

  it('ignores case and surrounding whitespace', () => {
    expect(categorize('  airport   diagram ')).toBe('Ground')
  })

  it('lets a section hint decide over keywords', () => {
    expect(categorize('ILS RWY 22', 'General')).toBe('General')
    expect(categorize('TAKEOFF MINIMUMS', 'DepartureProcedure')).toBe('DepartureProcedure')
  })

  it('loads every keyword group', () => {
    expect(CATEGORY_KEYWORDS.DepartureProcedure).toContain(' sid ')
    expect(CATEGORY_KEYWORDS.Ground).toContain('airport diagram')
  })
})
