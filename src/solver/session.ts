// Solver session: a strict state machine for one game, driven by the caller.
// It owns its candidate set and history; nothing here is shared across sessions.

import { assertWord, type Dictionary } from './dictionary'
import { InvalidStateError } from './errors'
import { CandidateSet } from './filter'
import type { OpeningBook } from './opening'
import { isSolved, toPattern, type Pattern } from './pattern'
import type { ScoreMetric } from './scoring'
import { bestGuess, rankGuesses, type Suggestion } from './search'

export type SessionState = 'active' | 'solved' | 'exhausted' | 'contradiction'

export const DEFAULT_MAX_GUESSES = 6

export interface GuessRecord {
  guess: string
  pattern: Pattern
}

export interface SessionOptions {
  maxGuesses?: number
  chunkSize?: number
}

export class SolverSession {
  readonly dictionary: Dictionary
  readonly maxGuesses: number
  private readonly book: OpeningBook
  private readonly chunkSize: number | undefined
  private readonly live: CandidateSet
  private readonly records: GuessRecord[] = []
  private current: SessionState = 'active'

  constructor(dictionary: Dictionary, book: OpeningBook, opts: SessionOptions = {}) {
    if (book.dictionary !== dictionary) {
      throw new InvalidStateError('opening book was built for a different dictionary')
    }
    const maxGuesses = opts.maxGuesses ?? DEFAULT_MAX_GUESSES
    if (!Number.isInteger(maxGuesses) || maxGuesses < 1) {
      throw new RangeError(`maxGuesses must be a positive integer, got ${maxGuesses}`)
    }
    this.dictionary = dictionary
    this.book = book
    this.maxGuesses = maxGuesses
    this.chunkSize = opts.chunkSize
    this.live = CandidateSet.all(dictionary)
  }

  get state(): SessionState {
    return this.current
  }

  /** Scoring metric, inherited from the opening book so every turn ranks alike */
  get metric(): ScoreMetric {
    return this.book.metric
  }

  get remaining(): number {
    return this.live.size
  }

  get attemptsLeft(): number {
    return this.maxGuesses - this.records.length
  }

  get history(): readonly GuessRecord[] {
    return this.records.map((r) => ({ ...r }))
  }

  isTerminal(): boolean {
    return this.current !== 'active'
  }

  candidates(): string[] {
    return this.live.words()
  }

  private assertActive(op: string): void {
    if (this.current !== 'active') {
      throw new InvalidStateError(`cannot ${op}: session is ${this.current}`)
    }
  }

  /** Next word to play */
  suggest(): string {
    this.assertActive('suggest')
    if (this.records.length === 0) return this.book.bestOpeningGuess()
    return bestGuess(this.live, { metric: this.metric, chunkSize: this.chunkSize }).guess
  }

  /**
   * Ranked alternatives for display; empty once the session is over. Before
   * the first guess only the book's opening is listed, so no full ranking
   * scan runs on the first turn.
   */
  suggestions(topK = 5): Suggestion[] {
    if (this.isTerminal() || topK <= 0) return []
    if (this.records.length === 0) return [this.book.openingSuggestion()]
    return rankGuesses(this.live, { topK, metric: this.metric })
  }

  /**
   * Record the feedback the game gave for `guess` and narrow the candidates.
   * Irreversible.
   */
  record(guess: string, pattern: Pattern | string): SessionState {
    this.assertActive('record')
    const L = this.dictionary.length
    assertWord(guess, L)
    const code = toPattern(pattern, L)
    this.records.push({ guess, pattern: code })
    this.live.applyFeedback(guess, code)
    if (isSolved(code, L)) this.current = 'solved'
    else if (this.live.isEmpty()) this.current = 'contradiction'
    else if (this.records.length >= this.maxGuesses) this.current = 'exhausted'
    return this.current
  }
}
