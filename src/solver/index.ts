export { simulateFeedback, feedbackTrits, feedbackCode } from './feedback'
export {
  Feedback,
  ALL_CORRECT,
  PATTERN_SPACE,
  formatPattern,
  parsePattern,
  normalizePattern,
  encodeTrits,
  decodeCode,
  patternFromCode,
  isSolvedPattern,
  type FeedbackPattern,
  type FeedbackSymbol,
} from './pattern'
export { evaluateEntropy, entropyBits, type EntropyResult } from './entropy'
export {
  filterCandidates,
  filterFor,
  strictFilter,
  permissiveFilter,
  type CandidateFilter,
  type FilterPolicy,
} from './filter'
export {
  GuessSelector,
  DEFAULT_FIRST_GUESS,
  type GuessSelectorOptions,
  type Selection,
  type SelectionReason,
} from './selector'
export {
  createGameState,
  recordGuess,
  isGameOver,
  remainingTurns,
  lastGuess,
  summarizeGame,
  type GameState,
  type GuessRecord,
  type GameSummary,
  type RecordOptions,
} from './game'
export { analyzeGuess, validateGuess, type GuessAnalysis, type AnalyzeOptions } from './analysis'
export { createLexicon, loadLexicon, DEFAULT_LEXICON_DIR, type Lexicon, type LexiconStats } from './data/loader'
export { InvalidInputError, FilterContradictionError, PoolFailureError, LexiconError } from './errors'
export { WORD_LENGTH, MAX_TURNS, normalizeWord } from './words'
export { mulberry32, sampleWords } from './random'
export { createEvaluationPool, InlinePool, WorkerThreadPool, type EvaluationPool } from '../worker/pool'
