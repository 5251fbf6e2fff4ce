import type { Logger } from 'pino'
import { FilterContradictionError } from '../../src/solver/errors'
import { simulateFeedback } from '../../src/solver/feedback'
import type { FilterPolicy } from '../../src/solver/filter'
import { createGameState, isGameOver, recordGuess, type GameState } from '../../src/solver/game'
import type { FeedbackPattern } from '../../src/solver/pattern'
import type { GuessSelector, SelectionReason } from '../../src/solver/selector'

/** Anything that can score a submitted guess: a remote service or the local simulator. */
export interface FeedbackSource {
  feedbackFor(guess: string): FeedbackPattern | Promise<FeedbackPattern>
}

export function localFeedback(answer: string): FeedbackSource {
  return { feedbackFor: (guess) => simulateFeedback(guess, answer) }
}

export type GameOutcome = 'solved' | 'failed' | 'contradiction'

export interface TurnRecord {
  guess: string
  pattern: FeedbackPattern
  remaining: number // candidates after filtering
  reason: SelectionReason
  elapsedMs: number
}

export interface PlayResult {
  state: GameState
  outcome: GameOutcome
  turns: TurnRecord[]
  elapsedMs: number
}

export interface PlayOptions {
  source: FeedbackSource
  selector: GuessSelector
  candidates: readonly string[]
  policy?: FilterPolicy
  logger: Logger
}

export async function playOffline(opts: PlayOptions): Promise<PlayResult> {
  const { source, selector, logger } = opts
  const policy = opts.policy ?? 'strict'
  const start = performance.now()
  const turns: TurnRecord[] = []
  let state = createGameState(opts.candidates)

  while (!isGameOver(state)) {
    const selection = await selector.selectGuessDetailed(state.candidates, state.turn)
    const pattern = await source.feedbackFor(selection.guess)
    try {
      state = recordGuess(state, selection.guess, pattern, { policy })
    } catch (err) {
      if (!(err instanceof FilterContradictionError)) throw err
      logger.warn({ guess: err.guess, pattern: err.pattern, policy, before: err.previousCount }, 'feedback contradicts every candidate; aborting game')
      return { state, outcome: 'contradiction', turns, elapsedMs: performance.now() - start }
    }
    turns.push({
      guess: selection.guess,
      pattern,
      remaining: state.candidates.length,
      reason: selection.reason,
      elapsedMs: selection.elapsedMs,
    })
    logger.info({ turn: state.turn - 1, guess: selection.guess, pattern, remaining: state.candidates.length }, 'turn played')
  }

  return {
    state,
    outcome: state.solved ? 'solved' : 'failed',
    turns,
    elapsedMs: performance.now() - start,
  }
}

export interface RunSummary {
  games: number
  solved: number
  failed: number
  contradictions: number
  meanGuesses: number // over solved games
  medianGuesses: number
  distribution: Record<string, number> // guesses used -> games; 'X' for unsolved
  meanGameMs: number
}

function median(sorted: number[]): number {
  if (sorted.length === 0) return 0
  const mid = sorted.length >> 1
  const upper = sorted[mid] ?? 0
  return sorted.length % 2 ? upper : ((sorted[mid - 1] ?? 0) + upper) / 2
}

export function summarizeRuns(results: readonly PlayResult[]): RunSummary {
  const guessCounts: number[] = []
  const distribution: Record<string, number> = {}
  let failed = 0
  let contradictions = 0
  let totalMs = 0
  for (const r of results) {
    totalMs += r.elapsedMs
    if (r.outcome === 'solved') {
      const n = r.state.history.length
      guessCounts.push(n)
      distribution[String(n)] = (distribution[String(n)] ?? 0) + 1
    } else {
      if (r.outcome === 'failed') failed++
      else contradictions++
      distribution.X = (distribution.X ?? 0) + 1
    }
  }
  guessCounts.sort((a, b) => a - b)
  const solved = guessCounts.length
  return {
    games: results.length,
    solved,
    failed,
    contradictions,
    meanGuesses: solved ? guessCounts.reduce((a, b) => a + b, 0) / solved : 0,
    medianGuesses: median(guessCounts),
    distribution,
    meanGameMs: results.length ? totalMs / results.length : 0,
  }
}
