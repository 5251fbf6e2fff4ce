import { Feedback, formatPattern, type FeedbackPattern, type FeedbackSymbol } from './pattern'
import { normalizeWord, WORD_LENGTH } from './words'

const A = 65 // 'A'

// Scratch buffers for the hot path. Every worker thread loads its own copy of
// this module, so they are never shared.
const remaining = new Int8Array(26)
const marks = new Uint8Array(WORD_LENGTH)

// Two passes: greens consume their letter first, then yellows draw from what is left.
function score(guess: string, answer: string): void {
  remaining.fill(0)
  for (let i = 0; i < WORD_LENGTH; i++) {
    const k = answer.charCodeAt(i) - A
    remaining[k] = remaining[k]! + 1
  }

  for (let i = 0; i < WORD_LENGTH; i++) {
    if (guess.charCodeAt(i) === answer.charCodeAt(i)) {
      marks[i] = Feedback.Correct
      const k = guess.charCodeAt(i) - A
      remaining[k] = remaining[k]! - 1
    } else {
      marks[i] = Feedback.Absent // provisional
    }
  }

  for (let i = 0; i < WORD_LENGTH; i++) {
    if (marks[i] === Feedback.Correct) continue
    const c = guess.charCodeAt(i) - A
    if (remaining[c]! > 0) {
      marks[i] = Feedback.Present
      remaining[c] = remaining[c]! - 1
    }
  }
}

function toSymbol(mark: number): FeedbackSymbol {
  return mark === Feedback.Correct ? Feedback.Correct : mark === Feedback.Present ? Feedback.Present : Feedback.Absent
}

/** Feedback trits for already-normalized words. */
export function feedbackTrits(guess: string, answer: string): FeedbackSymbol[] {
  score(guess, answer)
  return Array.from(marks, toSymbol)
}

/** Base-3 pattern code for already-normalized words; allocation-free. */
export function feedbackCode(guess: string, answer: string): number {
  score(guess, answer)
  let value = 0
  let mul = 1
  for (let i = 0; i < WORD_LENGTH; i++) {
    value += marks[i]! * mul
    mul *= 3
  }
  return value
}

export function simulateFeedback(guess: string, answer: string): FeedbackPattern {
  return formatPattern(feedbackTrits(normalizeWord(guess), normalizeWord(answer)))
}
