import pino, { type DestinationStream, type Logger, type LevelWithSilent } from 'pino'

export type { Logger }

export interface LoggerOptions {
  level?: LevelWithSilent
  name?: string
  /** Defaults to stderr so stdout stays free for results. */
  destination?: DestinationStream
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  return pino(
    { name: opts.name ?? 'entropy-solver', level: opts.level ?? 'info' },
    opts.destination ?? pino.destination(2),
  )
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' })
}
