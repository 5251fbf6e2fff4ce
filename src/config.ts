import { z } from 'zod'
import { normalizeWord } from './solver/words'

export class ConfigError extends Error {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`)
    this.name = 'ConfigError'
    this.issues = issues
  }
}

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

const SettingsSchema = z.object({
  SOLVER_TIME_BUDGET_SECONDS: z.coerce.number().nonnegative().default(5),
  SOLVER_MAX_WORKERS: z.coerce.number().int().nonnegative().optional(),
  SOLVER_CHUNK_SIZE: z.coerce.number().int().positive().default(64),
  OPTIMAL_FIRST_GUESS: z
    .string()
    .default('SALET')
    .refine((w) => /^[A-Za-z]{5}$/.test(w), 'must be a 5-letter word'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  LEXICON_DIR: z.string().min(1).optional(),
})

export type SettingsInput = z.input<typeof SettingsSchema>

export interface Settings {
  timeBudgetMs: number
  maxWorkers: number | undefined // undefined: derive from hardware
  chunkSize: number
  firstGuess: string
  logLevel: (typeof LOG_LEVELS)[number]
  lexiconDir: string | undefined
}

// Empty strings in the environment mean "unset".
function pickEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {}
  for (const key of Object.keys(SettingsSchema.shape)) {
    const v = env[key]
    if (v !== undefined && v !== '') out[key] = v
  }
  return out
}

/** Read settings from the environment; `overrides` (e.g. CLI flags) take precedence. */
export function loadSettings(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<SettingsInput> = {},
): Settings {
  const parsed = SettingsSchema.safeParse({ ...pickEnv(env), ...overrides })
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`))
  }
  const s = parsed.data
  return {
    timeBudgetMs: Math.round(s.SOLVER_TIME_BUDGET_SECONDS * 1000),
    maxWorkers: s.SOLVER_MAX_WORKERS,
    chunkSize: s.SOLVER_CHUNK_SIZE,
    firstGuess: normalizeWord(s.OPTIMAL_FIRST_GUESS),
    logLevel: s.LOG_LEVEL,
    lexiconDir: s.LEXICON_DIR,
  }
}
