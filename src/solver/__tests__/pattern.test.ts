import { describe, it, expect } from 'vitest'
import {
  ALL_CORRECT,
  Feedback,
  decodeCode,
  encodeTrits,
  formatPattern,
  isSolvedPattern,
  normalizePattern,
  parsePattern,
  patternFromCode,
} from '@/solver/pattern'
import { InvalidInputError } from '@/solver/errors'

describe('pattern string form', () => {
  it('formats trits as + o -', () => {
    expect(formatPattern([Feedback.Correct, Feedback.Present, Feedback.Absent, Feedback.Absent, Feedback.Correct])).toBe(
      '+o--+',
    )
  })

  it('parses x as an alias for absent, case-insensitively', () => {
    expect(parsePattern('+Ox-X')).toEqual([2, 1, 0, 0, 0])
    expect(normalizePattern('xxoxx')).toBe('--o--')
  })

  it('rejects wrong lengths and unknown symbols', () => {
    expect(() => parsePattern('++++')).toThrow(InvalidInputError)
    expect(() => parsePattern('++?++')).toThrow(InvalidInputError)
  })

  it('recognises the solved pattern', () => {
    expect(ALL_CORRECT).toBe('+++++')
    expect(isSolvedPattern('+++++')).toBe(true)
    expect(isSolvedPattern('++++o')).toBe(false)
  })
})

describe('pattern codes', () => {
  it('maps the extremes of the code space', () => {
    expect(encodeTrits([2, 2, 2, 2, 2])).toBe(242)
    expect(patternFromCode(0)).toBe('-----')
    expect(patternFromCode(242)).toBe('+++++')
  })

  it('position 0 is the least significant trit', () => {
    expect(encodeTrits([1, 0, 0, 0, 0])).toBe(1)
    expect(encodeTrits([0, 0, 0, 0, 1])).toBe(81)
    expect(decodeCode(81)).toEqual([0, 0, 0, 0, 1])
  })
})
