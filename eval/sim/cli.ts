#!/usr/bin/env tsx
/* eslint-disable no-console */
/**
 * Offline simulator CLI
 * Plays full games against known answers with the local feedback simulator and
 * reports solve statistics. Guess search runs on the worker-thread pool.
 */

import { Command, InvalidArgumentError } from 'commander'
import { loadSettings, type SettingsInput } from '../../src/config'
import { createLogger } from '../../src/logger'
import { loadLexicon } from '../../src/solver/data/loader'
import type { FilterPolicy } from '../../src/solver/filter'
import { sampleWords } from '../../src/solver/random'
import { GuessSelector } from '../../src/solver/selector'
import { normalizeWord } from '../../src/solver/words'
import { createEvaluationPool } from '../../src/worker/pool'
import { localFeedback, playOffline, summarizeRuns, type PlayResult, type RunSummary } from './play'

interface CliOptions {
  answers?: string
  games: number
  seed?: number
  policy: FilterPolicy
  budget?: number
  workers?: number
  lexicon?: string
  json: boolean
}

function parseCount(v: string): number {
  const n = Number(v)
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError('Expected a non-negative integer')
  return n
}

function parseSeconds(v: string): number {
  const n = Number(v)
  if (!Number.isFinite(n) || n < 0) throw new InvalidArgumentError('Expected a non-negative number')
  return n
}

function parsePolicy(v: string): FilterPolicy {
  if (v === 'strict' || v === 'permissive') return v
  throw new InvalidArgumentError('Expected "strict" or "permissive"')
}

function parseAnswers(csv: string): string[] {
  return csv
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean)
    .map(normalizeWord)
}

function printTable(rows: Array<{ answer: string; result: PlayResult }>, summary: RunSummary): void {
  const pad = (s: string, w: number) => s.padEnd(w)
  const out: string[] = []
  out.push([pad('ANSWER', 8), pad('OUTCOME', 14), pad('GUESSES', 8), 'PATH'].join(' '))
  for (const { answer, result } of rows) {
    out.push(
      [
        pad(answer, 8),
        pad(result.outcome, 14),
        pad(String(result.state.history.length), 8),
        result.turns.map((t) => `${t.guess}(${t.pattern})`).join(' '),
      ].join(' '),
    )
  }
  const dist = Object.entries(summary.distribution)
    .map(([k, v]) => `${k}:${v}`)
    .join(' ')
  out.push('')
  out.push(
    `games=${summary.games} solved=${summary.solved} failed=${summary.failed} contradictions=${summary.contradictions}`,
  )
  out.push(
    `mean=${summary.meanGuesses.toFixed(3)} median=${summary.medianGuesses} avgMs=${summary.meanGameMs.toFixed(1)} dist=[${dist}]`,
  )
  console.log('\n' + out.join('\n') + '\n')
}

async function main() {
  const program = new Command()
  program
    .name('sim')
    .description('Simulate entropy-guided games against known answers')
    .option('--answers <csv>', 'Comma-separated answers to play')
    .option('--games <n>', 'Random answers to draw when --answers is absent', parseCount, 20)
    .option('--seed <n>', 'RNG seed for drawing answers (default: timestamp)', parseCount)
    .option('--policy <name>', 'Candidate filter policy: strict | permissive', parsePolicy, 'strict')
    .option('--budget <seconds>', 'Per-turn time budget (overrides SOLVER_TIME_BUDGET_SECONDS)', parseSeconds)
    .option('--workers <n>', 'Worker threads; 0 evaluates inline (overrides SOLVER_MAX_WORKERS)', parseCount)
    .option('--lexicon <dir>', 'Directory holding answers.txt and allowed.txt (overrides LEXICON_DIR)')
    .option('--json', 'Print a JSON summary instead of a table', false)
  program.parse(process.argv)
  const opts = program.opts<CliOptions>()

  const overrides: Partial<SettingsInput> = {}
  if (opts.budget !== undefined) overrides.SOLVER_TIME_BUDGET_SECONDS = opts.budget
  if (opts.workers !== undefined) overrides.SOLVER_MAX_WORKERS = opts.workers
  if (opts.lexicon !== undefined) overrides.LEXICON_DIR = opts.lexicon
  const settings = loadSettings(process.env, overrides)
  const logger = createLogger({ level: settings.logLevel, name: 'sim' })

  const lexicon = await loadLexicon(settings.lexiconDir)
  const seed = opts.seed ?? Date.now()
  const answers = opts.answers ? parseAnswers(opts.answers) : sampleWords(lexicon.answers, opts.games, seed)
  for (const a of answers) {
    if (!lexicon.isAnswer(a)) logger.warn({ answer: a }, 'answer is not in the lexicon; the game may end in contradiction')
  }
  logger.info({ games: answers.length, policy: opts.policy, seed, ...lexicon.stats() }, 'starting simulation')

  const pool = createEvaluationPool(settings.maxWorkers)
  const selector = new GuessSelector({
    guessPool: lexicon.allowed,
    pool,
    logger,
    firstGuess: settings.firstGuess,
    timeBudgetMs: settings.timeBudgetMs,
    chunkSize: settings.chunkSize,
  })

  const rows: Array<{ answer: string; result: PlayResult }> = []
  try {
    for (const answer of answers) {
      const result = await playOffline({
        source: localFeedback(answer),
        selector,
        candidates: lexicon.answers,
        policy: opts.policy,
        logger: logger.child({ answer }),
      })
      rows.push({ answer, result })
    }
  } finally {
    await pool.close()
  }

  const summary = summarizeRuns(rows.map((r) => r.result))
  if (opts.json) {
    const games = rows.map(({ answer, result }) => ({ answer, outcome: result.outcome, turns: result.turns }))
    console.log(JSON.stringify({ meta: { seed, policy: opts.policy }, summary, games }, null, 2))
  } else {
    printTable(rows, summary)
  }
}

main().catch((err: unknown) => {
  console.error('[fatal]', err)
  process.exit(1)
})
