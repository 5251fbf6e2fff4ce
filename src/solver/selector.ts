import type { Logger } from 'pino'
import type { EvaluationPool } from '../worker/pool'
import type { EntropyUnit, EntropyUnitResult } from '../worker/protocol'
import { InvalidInputError } from './errors'
import { MAX_TURNS, normalizeWord, normalizeWords } from './words'

export const DEFAULT_FIRST_GUESS = 'SALET'
export const DEFAULT_TIME_BUDGET_MS = 5000
export const DEFAULT_CHUNK_SIZE = 64
/** Fraction of the budget after which no new units are submitted. */
export const SUBMIT_CUTOFF = 0.9

export type SelectionReason = 'opening' | 'endgame' | 'search' | 'fallback'

export interface Selection {
  guess: string
  reason: SelectionReason
  bits: number | null // entropy of the chosen word when it came from the search
  evaluated: number
  failed: number
  timedOut: boolean
  elapsedMs: number
}

export interface GuessSelectorOptions {
  /** Words that may be guessed, in the order ties are broken. */
  guessPool: readonly string[]
  pool: EvaluationPool
  logger: Logger
  firstGuess?: string
  timeBudgetMs?: number
  chunkSize?: number
  clock?: () => number
}

interface Best {
  index: number
  word: string
  bits: number
}

interface Tally {
  best: Best | null
  evaluated: number
  failed: number
  poolError: { err: unknown } | null
}

const TIMEOUT = Symbol('timeout')

export class GuessSelector {
  private readonly guessPool: readonly string[]
  private readonly pool: EvaluationPool
  private readonly logger: Logger
  private readonly firstGuess: string
  private readonly timeBudgetMs: number
  private readonly chunkSize: number
  private readonly clock: () => number

  constructor(opts: GuessSelectorOptions) {
    if (opts.guessPool.length === 0) throw new InvalidInputError('Guess pool is empty')
    this.guessPool = opts.guessPool.map((w) => w.toUpperCase())
    this.pool = opts.pool
    this.logger = opts.logger
    this.firstGuess = normalizeWord(opts.firstGuess ?? DEFAULT_FIRST_GUESS)
    this.timeBudgetMs = opts.timeBudgetMs ?? DEFAULT_TIME_BUDGET_MS
    this.chunkSize = Math.max(1, Math.floor(opts.chunkSize ?? DEFAULT_CHUNK_SIZE))
    this.clock = opts.clock ?? (() => performance.now())
  }

  async selectGuess(
    candidates: readonly string[],
    turn: number,
    timeBudgetMs = this.timeBudgetMs,
  ): Promise<string> {
    const selection = await this.selectGuessDetailed(candidates, turn, timeBudgetMs)
    return selection.guess
  }

  async selectGuessDetailed(
    candidates: readonly string[],
    turn: number,
    timeBudgetMs = this.timeBudgetMs,
  ): Promise<Selection> {
    if (!Number.isInteger(turn) || turn < 1 || turn > MAX_TURNS) {
      throw new InvalidInputError(`Turn must be an integer in 1..${MAX_TURNS}, got ${turn}`)
    }
    // The exhaustive opening search is identical every game.
    if (turn === 1) return this.immediate(this.firstGuess, 'opening')

    const words = normalizeWords(candidates)
    const first = words[0]
    if (first === undefined) throw new InvalidInputError('Candidate set is empty')
    if (words.length <= 2) return this.immediate(first, 'endgame')

    return this.search(words, first, turn, Math.max(0, timeBudgetMs))
  }

  private immediate(guess: string, reason: SelectionReason): Selection {
    return { guess, reason, bits: null, evaluated: 0, failed: 0, timedOut: false, elapsedMs: 0 }
  }

  private async search(candidates: string[], fallback: string, turn: number, budgetMs: number): Promise<Selection> {
    const start = this.clock()
    const elapsed = () => this.clock() - start
    const units = this.buildUnits(candidates)
    const maxInFlight = this.pool.size * 2
    const inFlight = new Set<Promise<void>>()
    // Mutated from completion callbacks.
    const tally: Tally = { best: null, evaluated: 0, failed: 0, poolError: null }
    // Aborted when this search ends so its queued units do not delay the next one.
    const discard = new AbortController()

    let next = 0
    let accepting = true
    let timedOut = false

    const merge = (result: EntropyUnitResult) => {
      for (const f of result.failures) {
        tally.failed++
        this.logger.warn({ word: f.word, index: f.index, err: f.message }, 'entropy evaluation failed; skipping word')
      }
      for (const s of result.scores) {
        tally.evaluated++
        const best = tally.best
        if (!best || s.bits > best.bits || (s.bits === best.bits && s.index < best.index)) {
          tally.best = { index: s.index, word: s.word, bits: s.bits }
        }
      }
    }

    const submit = () => {
      while (inFlight.size < maxInFlight && next < units.length && !tally.poolError) {
        if (elapsed() >= budgetMs * SUBMIT_CUTOFF) return
        const unit = units[next++]
        if (!unit) return
        const task: Promise<void> = this.pool
          .evaluate(unit, discard.signal)
          .then(
            (result) => {
              // Results landing after the deadline are discarded.
              if (accepting && elapsed() < budgetMs) merge(result)
            },
            (err: unknown) => {
              if (accepting) tally.poolError ??= { err }
            },
          )
          .finally(() => inFlight.delete(task))
        inFlight.add(task)
      }
    }

    let timer: NodeJS.Timeout | undefined
    const deadline = new Promise<typeof TIMEOUT>((resolve) => {
      timer = setTimeout(() => resolve(TIMEOUT), budgetMs)
    })

    try {
      for (;;) {
        submit()
        if (inFlight.size === 0 || tally.poolError) break
        const winner = await Promise.race([...inFlight, deadline])
        if (winner === TIMEOUT || elapsed() >= budgetMs) {
          timedOut = inFlight.size > 0
          break
        }
      }
    } finally {
      accepting = false
      clearTimeout(timer)
      discard.abort()
    }
    if (next < units.length) timedOut = true

    const { best, evaluated, failed, poolError } = tally
    const elapsedMs = elapsed()
    if (poolError) {
      this.logger.error({ err: poolError.err, turn }, 'evaluation pool failed; falling back to first candidate')
      return { guess: fallback, reason: 'fallback', bits: null, evaluated, failed, timedOut, elapsedMs }
    }
    if (!best) {
      this.logger.warn({ turn, budgetMs, elapsedMs }, 'no entropy evaluation completed in budget; using first candidate')
      return { guess: fallback, reason: 'fallback', bits: null, evaluated, failed, timedOut, elapsedMs }
    }
    this.logger.debug(
      { turn, candidates: candidates.length, evaluated, failed, timedOut, elapsedMs, guess: best.word, bits: best.bits },
      'guess selected',
    )
    return { guess: best.word, reason: 'search', bits: best.bits, evaluated, failed, timedOut, elapsedMs }
  }

  private buildUnits(candidates: readonly string[]): EntropyUnit[] {
    const units: EntropyUnit[] = []
    for (let offset = 0; offset < this.guessPool.length; offset += this.chunkSize) {
      units.push({ offset, words: this.guessPool.slice(offset, offset + this.chunkSize), candidates })
    }
    return units
  }
}
