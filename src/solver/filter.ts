import { FilterContradictionError, InvalidInputError } from './errors'
import { feedbackTrits } from './feedback'
import { Feedback, formatPattern, parsePattern, type FeedbackPattern, type FeedbackSymbol } from './pattern'
import { normalizeWord, WORD_LENGTH } from './words'

export type FilterPolicy = 'strict' | 'permissive'

export interface CandidateFilter {
  readonly policy: FilterPolicy
  /** `guess` and `candidate` are normalized; `trits` is the observed feedback. */
  matches(candidate: string, guess: string, trits: readonly FeedbackSymbol[]): boolean
}

/** Exact two-pass semantics: the candidate must reproduce the observed feedback. */
export const strictFilter: CandidateFilter = {
  policy: 'strict',
  matches(candidate, guess, trits) {
    const simulated = feedbackTrits(guess, candidate)
    for (let i = 0; i < WORD_LENGTH; i++) {
      if (simulated[i] !== trits[i]) return false
    }
    return true
  },
}

/**
 * Tolerates sources that mark one occurrence of a repeated letter absent while
 * marking another occurrence correct or present in the same response.
 * An absent letter seen elsewhere as correct/present is banned only at its own
 * position; otherwise it is banned from the whole word.
 */
export const permissiveFilter: CandidateFilter = {
  policy: 'permissive',
  matches(candidate, guess, trits) {
    for (let i = 0; i < WORD_LENGTH; i++) {
      if (trits[i] === Feedback.Correct && candidate[i] !== guess[i]) return false
    }
    for (let i = 0; i < WORD_LENGTH; i++) {
      const letter = guess.charAt(i)
      const t = trits[i]
      if (t === Feedback.Present) {
        if (candidate[i] === letter || !candidate.includes(letter)) return false
      } else if (t === Feedback.Absent) {
        if (seenElsewhere(guess, trits, letter)) {
          if (candidate[i] === letter) return false
        } else if (candidate.includes(letter)) {
          return false
        }
      }
    }
    return true
  },
}

function seenElsewhere(guess: string, trits: readonly FeedbackSymbol[], letter: string): boolean {
  for (let j = 0; j < WORD_LENGTH; j++) {
    if (guess[j] === letter && trits[j] !== Feedback.Absent) return true
  }
  return false
}

export function filterFor(policy: FilterPolicy): CandidateFilter {
  return policy === 'permissive' ? permissiveFilter : strictFilter
}

/**
 * Keep the candidates consistent with one observation, in input order.
 * Raises FilterContradictionError rather than returning an empty list.
 */
export function filterCandidates(
  candidates: readonly string[],
  guess: string,
  pattern: FeedbackPattern,
  policy: FilterPolicy = 'strict',
): string[] {
  if (candidates.length === 0) {
    throw new InvalidInputError('Cannot filter an empty candidate set')
  }
  const g = normalizeWord(guess)
  const trits = parsePattern(pattern)
  const filter = filterFor(policy)
  const out: string[] = []
  for (const w of candidates) {
    const c = normalizeWord(w)
    if (filter.matches(c, g, trits)) out.push(c)
  }
  if (out.length === 0) {
    throw new FilterContradictionError(g, formatPattern(trits), policy, candidates.length)
  }
  return out
}
