import type { FilterPolicy } from './filter'
import type { FeedbackPattern } from './pattern'

/** Malformed word, pattern, turn or candidate set supplied by the caller. */
export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidInputError'
  }
}

/**
 * Raised when an observation leaves no candidate standing: the feedback is
 * inconsistent with every word still in play.
 */
export class FilterContradictionError extends Error {
  readonly guess: string
  readonly pattern: FeedbackPattern
  readonly policy: FilterPolicy
  readonly previousCount: number

  constructor(guess: string, pattern: FeedbackPattern, policy: FilterPolicy, previousCount: number) {
    super(`No candidate is consistent with ${guess} -> ${pattern} (${policy}, ${previousCount} before)`)
    this.name = 'FilterContradictionError'
    this.guess = guess
    this.pattern = pattern
    this.policy = policy
    this.previousCount = previousCount
  }
}

/** The evaluation pool as a whole is unusable (worker crash, spawn failure, closed pool). */
export class PoolFailureError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'PoolFailureError'
  }
}

export class LexiconError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'LexiconError'
  }
}
