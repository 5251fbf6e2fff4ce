import { describe, it, expect } from 'vitest'
import { simulateFeedback, feedbackTrits, feedbackCode } from '@/solver/feedback'
import { InvalidInputError } from '@/solver/errors'

describe('simulateFeedback basic cases', () => {
  it('all correct when guess == answer', () => {
    expect(simulateFeedback('CRANE', 'CRANE')).toBe('+++++')
  })

  it('all absent when no letter is shared', () => {
    expect(simulateFeedback('BUMPY', 'CRANE')).toBe('-----')
  })

  it('is case-insensitive', () => {
    expect(simulateFeedback('crane', 'Crate')).toBe('+++-+')
  })

  it('rejects words that are not exactly 5 letters', () => {
    expect(() => simulateFeedback('CRANES', 'CRANE')).toThrow(InvalidInputError)
    expect(() => simulateFeedback('CRANE', 'CRAN')).toThrow(InvalidInputError)
    expect(() => simulateFeedback('CR4NE', 'CRANE')).toThrow(InvalidInputError)
  })
})

describe('duplicate letter handling', () => {
  it('speed vs crane: the single E of the answer is spent once', () => {
    // E at pos2 takes the only E; pos3 E and pos4 D get nothing
    expect(simulateFeedback('SPEED', 'CRANE')).toBe('--o--')
  })

  it('geese vs crane: the exact E match consumes the only E first', () => {
    // pass 1 marks pos4 correct, leaving no E for pos1/pos2
    expect(simulateFeedback('GEESE', 'CRANE')).toBe('----+')
  })

  it('geese vs eight: only one of three Es is marked present', () => {
    expect(simulateFeedback('GEESE', 'EIGHT')).toBe('oo---')
  })

  it('civic vs cigar: repeated C and I beyond the answer counts stay absent', () => {
    expect(simulateFeedback('CIVIC', 'CIGAR')).toBe('++---')
  })

  it('eagle vs allee', () => {
    // greens first: pos4 E; then E,A,L each take one remaining copy
    expect(feedbackTrits('EAGLE', 'ALLEE')).toEqual([1, 1, 0, 1, 2])
  })

  it('cabal vs abbey', () => {
    expect(feedbackTrits('CABAL', 'ABBEY')).toEqual([0, 1, 2, 0, 0])
  })
})

describe('feedbackCode', () => {
  it('packs trits little-endian in base 3', () => {
    expect(feedbackCode('CRANE', 'CRANE')).toBe(242)
    expect(feedbackCode('BUMPY', 'CRANE')).toBe(0)
    // [0,0,1,0,0] -> 1 * 3^2
    expect(feedbackCode('SPEED', 'CRANE')).toBe(9)
  })
})
