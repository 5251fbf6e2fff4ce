import { feedbackCode } from './feedback'
import { PATTERN_SPACE, patternFromCode, type FeedbackPattern } from './pattern'
import { normalizeWord, normalizeWords } from './words'

export interface EntropyResult {
  word: string
  bits: number
  histogram: Map<FeedbackPattern, number>
  patternCount: number // non-empty buckets
}

// Reused per call; each thread has its own module instance.
const counts = new Int32Array(PATTERN_SPACE)

function fillCounts(guess: string, candidates: readonly string[]): void {
  counts.fill(0)
  for (const answer of candidates) {
    const code = feedbackCode(guess, answer)
    counts[code] = counts[code]! + 1
  }
}

function shannon(total: number): number {
  let h = 0
  for (let code = 0; code < PATTERN_SPACE; code++) {
    const n = counts[code]!
    if (n === 0) continue
    const p = n / total
    h -= p * Math.log2(p)
  }
  return h
}

/**
 * Entropy in bits of the feedback distribution `guess` induces over `candidates`.
 * Hot path: both arguments must already be normalized.
 */
export function entropyBits(guess: string, candidates: readonly string[]): number {
  const total = candidates.length
  if (total <= 1) return 0
  fillCounts(guess, candidates)
  return shannon(total)
}

export function evaluateEntropy(word: string, candidates: readonly string[]): EntropyResult {
  const guess = normalizeWord(word)
  const words = normalizeWords(candidates)
  const histogram = new Map<FeedbackPattern, number>()
  if (words.length <= 1) {
    return { word: guess, bits: 0, histogram, patternCount: 0 }
  }
  fillCounts(guess, words)
  for (let code = 0; code < PATTERN_SPACE; code++) {
    const n = counts[code]!
    if (n > 0) histogram.set(patternFromCode(code), n)
  }
  return { word: guess, bits: shannon(words.length), histogram, patternCount: histogram.size }
}
