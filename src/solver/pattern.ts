import { InvalidInputError } from './errors'
import { WORD_LENGTH } from './words'

// Trit meanings: 0=absent, 1=present, 2=correct
export const Feedback = {
  Absent: 0,
  Present: 1,
  Correct: 2,
} as const

export type FeedbackSymbol = (typeof Feedback)[keyof typeof Feedback]

/** Compact 5-character form: '+' correct, 'o' present, '-' absent. */
export type FeedbackPattern = string

export const PATTERN_SPACE = 3 ** WORD_LENGTH // 243 distinct codes
export const ALL_CORRECT: FeedbackPattern = '+'.repeat(WORD_LENGTH)

const SYMBOL_CHARS = ['-', 'o', '+'] as const

function symbolFor(ch: string): FeedbackSymbol | null {
  switch (ch) {
    case '+':
      return Feedback.Correct
    case 'o':
    case 'O':
      return Feedback.Present
    case '-':
    case 'x':
    case 'X':
      return Feedback.Absent
    default:
      return null
  }
}

export function formatPattern(trits: readonly FeedbackSymbol[]): FeedbackPattern {
  let out = ''
  for (const t of trits) out += SYMBOL_CHARS[t]
  return out
}

/** Parse a pattern string; 'x' is accepted as an alias for absent. */
export function parsePattern(pattern: string): FeedbackSymbol[] {
  if (pattern.length !== WORD_LENGTH) {
    throw new InvalidInputError(`Pattern must have ${WORD_LENGTH} symbols, got "${pattern}"`)
  }
  const out: FeedbackSymbol[] = []
  for (const ch of pattern) {
    const sym = symbolFor(ch)
    if (sym === null) throw new InvalidInputError(`Invalid feedback symbol "${ch}" in "${pattern}"`)
    out.push(sym)
  }
  return out
}

export function normalizePattern(pattern: string): FeedbackPattern {
  return formatPattern(parsePattern(pattern))
}

/**
 * Little-endian base-3 code: position 0 is the least-significant trit.
 * Used as a dense histogram index.
 */
export function encodeTrits(trits: readonly FeedbackSymbol[]): number {
  let value = 0
  let mul = 1
  for (const t of trits) {
    value += t * mul
    mul *= 3
  }
  return value
}

export function decodeCode(code: number): FeedbackSymbol[] {
  const out: FeedbackSymbol[] = []
  let v = code
  for (let i = 0; i < WORD_LENGTH; i++) {
    const t = v % 3
    out.push(t === 2 ? Feedback.Correct : t === 1 ? Feedback.Present : Feedback.Absent)
    v = Math.trunc(v / 3)
  }
  return out
}

export function patternFromCode(code: number): FeedbackPattern {
  return formatPattern(decodeCode(code))
}

export function isSolvedPattern(pattern: FeedbackPattern): boolean {
  return pattern === ALL_CORRECT
}
