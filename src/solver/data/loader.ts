// Lexicon loader: the answer list and the broader allowed-guess list.
// Built once at startup and passed to whatever needs it; never mutated.
import { readFile } from 'node:fs/promises'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { LexiconError } from '../errors'
import { isWord } from '../words'

export const DEFAULT_LEXICON_DIR = fileURLToPath(new URL('../../../wordlists/en/', import.meta.url))
export const ANSWERS_FILE = 'answers.txt'
export const ALLOWED_FILE = 'allowed.txt'

export interface LexiconStats {
  totalAnswers: number
  totalAllowed: number
  answersInAllowed: number
}

export interface Lexicon {
  readonly answers: readonly string[]
  readonly allowed: readonly string[] // superset of answers
  isAnswer(word: string): boolean
  isAllowed(word: string): boolean
  stats(): LexiconStats
}

export interface LexiconOptions {
  minAnswers?: number
}

// Trim, upper-case, drop blanks and malformed rows, dedupe keeping first-seen order.
function cleanList(raw: Iterable<string>): string[] {
  const seen = new Set<string>()
  const out: string[] = []
  for (const line of raw) {
    const w = line.trim().toUpperCase()
    if (!isWord(w) || seen.has(w)) continue
    seen.add(w)
    out.push(w)
  }
  return out
}

export function createLexicon(
  answersRaw: Iterable<string>,
  allowedRaw: Iterable<string>,
  opts: LexiconOptions = {},
): Lexicon {
  const minAnswers = opts.minAnswers ?? 1
  const answers = cleanList(answersRaw)
  const listed = cleanList(allowedRaw)
  if (answers.length === 0) throw new LexiconError('No answers loaded')
  if (listed.length === 0) throw new LexiconError('No allowed guesses loaded')
  if (answers.length < minAnswers) {
    throw new LexiconError(`Too few answers loaded: ${answers.length} < ${minAnswers}`)
  }

  const listedSet = new Set(listed)
  const answersInAllowed = answers.filter((w) => listedSet.has(w)).length
  // Every answer must be guessable.
  const allowed = [...listed, ...answers.filter((w) => !listedSet.has(w))]
  const answerSet = new Set(answers)
  const allowedSet = new Set(allowed)

  return Object.freeze({
    answers: Object.freeze(answers),
    allowed: Object.freeze(allowed),
    isAnswer: (word: string) => answerSet.has(word.toUpperCase()),
    isAllowed: (word: string) => allowedSet.has(word.toUpperCase()),
    stats: () => ({ totalAnswers: answers.length, totalAllowed: allowed.length, answersInAllowed }),
  })
}

async function readWordsFile(file: string): Promise<string[]> {
  try {
    const text = await readFile(file, 'utf8')
    return text.split(/\r?\n/)
  } catch (err) {
    throw new LexiconError(`Failed to read word list ${file}`, { cause: err })
  }
}

export async function loadLexicon(dir: string = DEFAULT_LEXICON_DIR, opts?: LexiconOptions): Promise<Lexicon> {
  const [answers, allowed] = await Promise.all([
    readWordsFile(path.join(dir, ANSWERS_FILE)),
    readWordsFile(path.join(dir, ALLOWED_FILE)),
  ])
  return createLexicon(answers, allowed, opts)
}
