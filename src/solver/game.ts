import { InvalidInputError } from './errors'
import { filterCandidates, type FilterPolicy } from './filter'
import { isSolvedPattern, normalizePattern, type FeedbackPattern } from './pattern'
import { MAX_TURNS, normalizeWord, normalizeWords } from './words'

export interface GuessRecord {
  readonly word: string
  readonly pattern: FeedbackPattern
}

export interface GameState {
  readonly turn: number // 1..MAX_TURNS+1
  readonly history: readonly GuessRecord[]
  readonly candidates: readonly string[]
  readonly solved: boolean
  readonly failed: boolean
}

export interface RecordOptions {
  /** Chosen by the caller according to how far the feedback source is trusted. */
  policy?: FilterPolicy
}

export function createGameState(candidates: readonly string[]): GameState {
  if (candidates.length === 0) throw new InvalidInputError('A game needs at least one candidate')
  return { turn: 1, history: [], candidates: normalizeWords(candidates), solved: false, failed: false }
}

export function isGameOver(state: GameState): boolean {
  return state.solved || state.failed
}

export function remainingTurns(state: GameState): number {
  return Math.max(0, MAX_TURNS - state.history.length)
}

export function lastGuess(state: GameState): GuessRecord | undefined {
  return state.history[state.history.length - 1]
}

/**
 * Advance the game by one observation. Returns a new state; the input is never
 * mutated, so a FilterContradictionError leaves the caller's state intact.
 */
export function recordGuess(
  state: GameState,
  word: string,
  pattern: FeedbackPattern,
  opts: RecordOptions = {},
): GameState {
  if (isGameOver(state)) {
    throw new InvalidInputError(`Game is already ${state.solved ? 'solved' : 'failed'}; no further guesses`)
  }
  const guess = normalizeWord(word)
  const observed = normalizePattern(pattern)
  const history = [...state.history, { word: guess, pattern: observed }]
  const turn = state.turn + 1

  if (isSolvedPattern(observed)) {
    // A winning word from outside the set never grows it.
    const candidates = state.candidates.includes(guess) ? [guess] : state.candidates
    return { turn, history, candidates, solved: true, failed: false }
  }
  // The last miss ends the game whatever the feedback says, so it is not filtered.
  if (turn > MAX_TURNS) {
    return { turn, history, candidates: state.candidates, solved: false, failed: true }
  }
  const candidates = filterCandidates(state.candidates, guess, observed, opts.policy ?? 'strict')
  return { turn, history, candidates, solved: false, failed: false }
}

export interface GameSummary {
  turn: number
  totalGuesses: number
  remainingCandidates: number
  remainingTurns: number
  solved: boolean
  failed: boolean
  guesses: Array<{ word: string; pattern: FeedbackPattern; correct: boolean }>
}

export function summarizeGame(state: GameState): GameSummary {
  return {
    turn: state.turn,
    totalGuesses: state.history.length,
    remainingCandidates: state.candidates.length,
    remainingTurns: remainingTurns(state),
    solved: state.solved,
    failed: state.failed,
    guesses: state.history.map((g) => ({ word: g.word, pattern: g.pattern, correct: isSolvedPattern(g.pattern) })),
  }
}
