import { describe, it, expect } from 'vitest'
import { createGameState, recordGuess, type GameState } from '@/solver/game'
import { GuessSelector } from '@/solver/selector'
import { silentLogger } from '@/logger'
import { InlinePool } from '@/worker/pool'
import { localFeedback, playOffline, summarizeRuns, type GameOutcome, type PlayResult } from '../play'

const CANDIDATES = ['CRANE', 'CRATE', 'CRAZE']

function makeSelector() {
  return new GuessSelector({
    guessPool: ['CRANE', 'CRATE', 'CRAZE', 'TONZY'],
    pool: new InlinePool(),
    logger: silentLogger(),
    firstGuess: 'BUMPY',
    timeBudgetMs: 5000,
  })
}

describe('playOffline', () => {
  it('plays a game to the answer', async () => {
    const result = await playOffline({
      source: localFeedback('CRAZE'),
      selector: makeSelector(),
      candidates: CANDIDATES,
      logger: silentLogger(),
    })
    expect(result.outcome).toBe('solved')
    expect(result.turns.map((t) => [t.guess, t.pattern, t.remaining, t.reason])).toEqual([
      ['BUMPY', '-----', 3, 'opening'],
      ['TONZY', '---+-', 1, 'search'],
      ['CRAZE', '+++++', 1, 'endgame'],
    ])
    expect(result.state.solved).toBe(true)
  })

  it('stops on feedback no candidate can produce', async () => {
    const result = await playOffline({
      source: localFeedback('GHOST'),
      selector: makeSelector(),
      candidates: CANDIDATES,
      logger: silentLogger(),
    })
    expect(result.outcome).toBe('contradiction')
    expect(result.turns.map((t) => t.guess)).toEqual(['BUMPY'])
    expect(result.state.history).toHaveLength(1)
  })

  it('accepts an asynchronous feedback source', async () => {
    const result = await playOffline({
      source: { feedbackFor: async (g) => localFeedback('CRATE').feedbackFor(g) },
      selector: makeSelector(),
      candidates: CANDIDATES,
      policy: 'permissive',
      logger: silentLogger(),
    })
    expect(result.outcome).toBe('solved')
    expect(result.state.history.map((h) => h.word)).toEqual(['BUMPY', 'TONZY', 'CRATE'])
  })
})

describe('summarizeRuns', () => {
  function result(guesses: number, outcome: GameOutcome, elapsedMs: number): PlayResult {
    let state: GameState = createGameState(['CRANE'])
    for (let i = 0; i < guesses; i++) state = recordGuess(state, 'SLOTH', '-----')
    return { state, outcome, turns: [], elapsedMs }
  }

  it('aggregates outcomes and the guess distribution', () => {
    const summary = summarizeRuns([
      result(3, 'solved', 10),
      result(4, 'solved', 20),
      result(6, 'failed', 30),
      result(1, 'contradiction', 40),
    ])
    expect(summary).toEqual({
      games: 4,
      solved: 2,
      failed: 1,
      contradictions: 1,
      meanGuesses: 3.5,
      medianGuesses: 3.5,
      distribution: { '3': 1, '4': 1, X: 2 },
      meanGameMs: 25,
    })
  })

  it('handles an empty run', () => {
    expect(summarizeRuns([])).toMatchObject({ games: 0, solved: 0, meanGuesses: 0, medianGuesses: 0, meanGameMs: 0 })
  })
})
