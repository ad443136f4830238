import { describe, it, expect } from 'vitest'
import { parseSets } from '../parser'

describe('parseSets', () => {
  it('reads every set in order', () => {
    expect(parseSets('Set 1 : 70x5 Set 2 : 75x3 Set 3 : 80x1')).toEqual([
      { set_number: 1, weight: 70, reps: 5 },
      { set_number: 2, weight: 75, reps: 3 },
      { set_number: 3, weight: 80, reps: 1 },
    ])
  })

  it('keeps page order instead of sorting by set number', () => {
    const sets = parseSets('Set 3 : 60x10 Set 1 : 100x2 Set 2 : 80x6')
    expect(sets.map((s) => s.set_number)).toEqual([3, 1, 2])
  })

  it('returns an empty list when nothing matches', () => {
    expect(parseSets('')).toEqual([])
    expect(parseSets('no matches here')).toEqual([])
  })

  it('ignores tokens with the wrong separator or spacing', () => {
    expect(parseSets('Set 1 - 70x5')).toEqual([])
    expect(parseSets('Set 1: 70x5')).toEqual([])
    expect(parseSets('Set 1 :  70x5')).toEqual([])
    expect(parseSets('Set 1 : 70 x 5')).toEqual([])
  })

  it('drops decimal weights and keeps the sets around them', () => {
    expect(parseSets('Set 1 : 70.5x5 Set 2 : 70x5')).toEqual([{ set_number: 2, weight: 70, reps: 5 }])
  })

  it('reads tokens that run together or span lines', () => {
    expect(parseSets('Set 10 : 100x12Set 11 : 95x10\nSet 12 : 90x8')).toEqual([
      { set_number: 10, weight: 100, reps: 12 },
      { set_number: 11, weight: 95, reps: 10 },
      { set_number: 12, weight: 90, reps: 8 },
    ])
  })

  it('accepts zero weight and zero reps', () => {
    expect(parseSets('Set 1 : 0x0')).toEqual([{ set_number: 1, weight: 0, reps: 0 }])
  })

  it('skips a set numbered zero', () => {
    expect(parseSets('Set 0 : 50x5 Set 1 : 50x5')).toEqual([{ set_number: 1, weight: 50, reps: 5 }])
  })

  it('skips tokens whose numbers do not fit a safe integer', () => {
    expect(parseSets('Set 9007199254740993 : 1x1 Set 2 : 1x1')).toEqual([{ set_number: 2, weight: 1, reps: 1 }])
    expect(parseSets('Set 1 : 9007199254740993x1')).toEqual([])
    expect(parseSets('Set 1 : 1x9007199254740993')).toEqual([])
  })

  it('returns frozen records and gives the same result on repeat calls', () => {
    const text = 'Set 1 : 135x10 Set 2 : 155x8'
    const first = parseSets(text)
    expect(Object.isFrozen(first[0])).toBe(true)
    expect(parseSets(text)).toEqual(first)
  })
})
