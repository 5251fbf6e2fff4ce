import { InvalidInputError } from './errors'

export const WORD_LENGTH = 5
export const MAX_TURNS = 6

const WORD_RE = /^[A-Z]{5}$/

export function isWord(value: string): boolean {
  return WORD_RE.test(value)
}

/** Upper-case and validate a single word. */
export function normalizeWord(word: string): string {
  const upper = word.toUpperCase()
  if (!WORD_RE.test(upper)) {
    throw new InvalidInputError(`Expected a ${WORD_LENGTH}-letter word, got "${word}"`)
  }
  return upper
}

export function normalizeWords(words: readonly string[]): string[] {
  return words.map(normalizeWord)
}
