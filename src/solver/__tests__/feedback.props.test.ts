import { describe, it, expect } from 'vitest'
import fc from 'fast-check'
import { simulateFeedback } from '@/solver/feedback'

// A small alphabet makes repeated letters common.
const word = fc
  .array(fc.constantFrom('A', 'B', 'C', 'D', 'E'), { minLength: 5, maxLength: 5 })
  .map((a) => a.join(''))

function countOf(s: string, ch: string): number {
  let n = 0
  for (const c of s) if (c === ch) n++
  return n
}

describe('feedback invariants', () => {
  it('a word scored against itself is all correct', () => {
    fc.assert(
      fc.property(word, (w) => {
        expect(simulateFeedback(w, w)).toBe('+++++')
      }),
    )
  })

  it('greens equal positional matches', () => {
    fc.assert(
      fc.property(word, word, (g, a) => {
        const pat = simulateFeedback(g, a)
        let matches = 0
        for (let i = 0; i < 5; i++) if (g[i] === a[i]) matches++
        expect(countOf(pat, '+')).toBe(matches)
      }),
    )
  })

  it('non-absent marks for a letter never exceed its count in the answer', () => {
    fc.assert(
      fc.property(word, word, (g, a) => {
        const pat = simulateFeedback(g, a)
        const marked: Record<string, number> = {}
        for (let i = 0; i < 5; i++) {
          const letter = g.charAt(i)
          if (pat[i] !== '-') marked[letter] = (marked[letter] ?? 0) + 1
        }
        for (const [letter, n] of Object.entries(marked)) {
          expect(n).toBeLessThanOrEqual(countOf(a, letter))
        }
      }),
    )
  })
})
