import { assertWord, type Dictionary } from './dictionary'
import { InvalidStateError, MalformedWordError } from './errors'
import { feedbackPattern } from './feedback'
import { isSolved, type Pattern } from './pattern'
import { pickOne, type Rng } from './random'
import { DEFAULT_MAX_GUESSES } from './session'

export type GameStatus = 'playing' | 'won' | 'lost'

export interface RefereeOptions {
  maxGuesses?: number
  /** When given, guesses must be dictionary words */
  dictionary?: Dictionary
}

/** Holds the secret and answers guesses with feedback; no I/O. */
export class Referee {
  readonly maxGuesses: number
  private readonly secret: string
  private readonly dictionary: Dictionary | undefined
  private used = 0
  private current: GameStatus = 'playing'

  constructor(secret: string, opts: RefereeOptions = {}) {
    assertWord(secret, opts.dictionary?.length ?? secret.length)
    this.secret = secret
    this.dictionary = opts.dictionary
    this.maxGuesses = opts.maxGuesses ?? DEFAULT_MAX_GUESSES
  }

  static random(dictionary: Dictionary, rng: Rng, opts: Omit<RefereeOptions, 'dictionary'> = {}): Referee {
    return new Referee(pickOne(dictionary.words, rng), { ...opts, dictionary })
  }

  get status(): GameStatus {
    return this.current
  }

  get attempts(): number {
    return this.used
  }

  get attemptsLeft(): number {
    return this.maxGuesses - this.used
  }

  /** Only available once the game is over */
  reveal(): string {
    if (this.current === 'playing') throw new InvalidStateError('the game is still in progress')
    return this.secret
  }

  play(guess: string): Pattern {
    if (this.current !== 'playing') throw new InvalidStateError(`the game is already ${this.current}`)
    assertWord(guess, this.secret.length)
    if (this.dictionary && !this.dictionary.has(guess)) {
      throw new MalformedWordError(guess, 'not in the word list')
    }
    const p = feedbackPattern(guess, this.secret)
    this.used++
    if (isSolved(p, this.secret.length)) this.current = 'won'
    else if (this.used >= this.maxGuesses) this.current = 'lost'
    return p
  }
}
