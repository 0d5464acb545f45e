export { feedbackPattern, feedbackTrits } from './feedback'
export {
  ABSENT,
  PRESENT,
  EXACT,
  MAX_NUMERIC_TRITS,
  encodeTrits,
  decodePattern,
  allExact,
  isSolved,
  patternToString,
  parsePattern,
  toPattern,
  type Pattern,
  type Trit,
} from './pattern'
export { Dictionary, assertWord, DEFAULT_WORD_LENGTH } from './dictionary'
export { CandidateSet, filterCandidates, filterWords } from './filter'
export {
  scoreGuess,
  partitionByPattern,
  compareScored,
  SCORE_EPSILON,
  SCORE_METRICS,
  isScoreMetric,
  type ScoreMetric,
  type ScoredGuess,
} from './scoring'
export {
  bestGuess,
  rankGuesses,
  topScored,
  StrategySearch,
  InlineRunner,
  DEFAULT_CHUNK_SIZE,
  type ScanRunner,
  type StrategyResult,
  type Suggestion,
} from './search'
export {
  OpeningBook,
  openingKey,
  preferredKey,
  savePreferred,
  loadPreferredMetric,
  type OpeningStore,
  type OpeningRecord,
} from './opening'
export { SolverSession, DEFAULT_MAX_GUESSES, type SessionState, type GuessRecord } from './session'
export { Referee, type GameStatus } from './referee'
export {
  InvalidStateError,
  MalformedWordError,
  DuplicateWordError,
  MalformedPatternError,
  SearchFaultError,
} from './errors'
export { mulberry32 } from './random'
