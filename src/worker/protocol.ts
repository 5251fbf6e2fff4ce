import { entropyBits } from '../solver/entropy'
import { normalizeWord } from '../solver/words'

/** A contiguous slice of the guess pool, scored against one candidate set. */
export interface EntropyUnit {
  offset: number // pool index of words[0]
  words: readonly string[]
  candidates: readonly string[]
}

export interface EntropyScore {
  index: number
  word: string
  bits: number
}

export interface EntropyFailure {
  index: number
  word: string
  message: string
}

export interface EntropyUnitResult {
  scores: EntropyScore[]
  failures: EntropyFailure[]
}

// Incoming (main -> worker)
export type Msg = {
  id: number
  type: 'evaluate'
  payload: { offset: number; words: string[]; candidates: string }
}

// Outgoing (worker -> main)
export type OutMsg =
  | { id: number; type: 'result'; result: EntropyUnitResult }
  | { id: number; type: 'error'; error: { message: string; stack?: string } }

// Candidates travel as one concatenated string; every word is exactly 5 letters.
export function packCandidates(candidates: readonly string[]): string {
  return candidates.join('')
}

export function unpackCandidates(packed: string): string[] {
  const out: string[] = []
  for (let i = 0; i + 5 <= packed.length; i += 5) out.push(packed.slice(i, i + 5))
  return out
}

/** Score every word of a unit; a word that fails is reported, not thrown. */
export function evaluateUnit(unit: EntropyUnit): EntropyUnitResult {
  const scores: EntropyScore[] = []
  const failures: EntropyFailure[] = []
  unit.words.forEach((raw, i) => {
    const index = unit.offset + i
    try {
      const word = normalizeWord(raw)
      scores.push({ index, word, bits: entropyBits(word, unit.candidates) })
    } catch (err) {
      failures.push({ index, word: raw, message: err instanceof Error ? err.message : String(err) })
    }
  })
  return { scores, failures }
}

export function handleMessage(msg: Msg): OutMsg {
  try {
    const { offset, words, candidates } = msg.payload
    const result = evaluateUnit({ offset, words, candidates: unpackCandidates(candidates) })
    return { id: msg.id, type: 'result', result }
  } catch (err) {
    const e = err instanceof Error ? err : new Error(String(err))
    return { id: msg.id, type: 'error', error: { message: e.message, stack: e.stack } }
  }
}
