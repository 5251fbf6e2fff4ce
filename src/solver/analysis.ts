import type { Lexicon } from './data/loader'
import { evaluateEntropy } from './entropy'
import { InvalidInputError } from './errors'
import type { FeedbackPattern } from './pattern'
import { DEFAULT_FIRST_GUESS } from './selector'
import { isWord } from './words'

export interface GuessAnalysis {
  word: string
  bits: number
  patternCount: number
  candidateCount: number
  elapsedMs: number
  isOptimalFirstGuess: boolean
  histogram: Map<FeedbackPattern, number>
}

export interface AnalyzeOptions {
  /** Defaults to every answer in the lexicon. */
  candidates?: readonly string[]
  firstGuess?: string
  clock?: () => number
}

/** True when `word` is a well-formed word the lexicon accepts as a guess. */
export function validateGuess(lexicon: Lexicon, word: string): boolean {
  const upper = word.trim().toUpperCase()
  return isWord(upper) && lexicon.isAllowed(upper)
}

/** Score a single guess against the remaining answers. */
export function analyzeGuess(lexicon: Lexicon, word: string, opts: AnalyzeOptions = {}): GuessAnalysis {
  if (!validateGuess(lexicon, word)) {
    throw new InvalidInputError(`"${word}" is not an allowed guess`)
  }
  const clock = opts.clock ?? (() => performance.now())
  const candidates = opts.candidates ?? lexicon.answers
  const firstGuess = (opts.firstGuess ?? DEFAULT_FIRST_GUESS).toUpperCase()

  const start = clock()
  const { word: guess, bits, histogram, patternCount } = evaluateEntropy(word.trim(), candidates)
  return {
    word: guess,
    bits,
    patternCount,
    candidateCount: candidates.length,
    elapsedMs: clock() - start,
    isOptimalFirstGuess: guess === firstGuess,
    histogram,
  }
}
