// Error types surfaced by the solver core. Callers distinguish them by class
// (or by `name` when an error crossed a worker boundary).

export class InvalidStateError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidStateError'
  }
}

export class MalformedWordError extends Error {
  readonly word: string

  constructor(word: string, reason: string) {
    super(`Malformed word "${word}": ${reason}`)
    this.name = 'MalformedWordError'
    this.word = word
  }
}

/** Raised by the Dictionary when the same word appears twice */
export class DuplicateWordError extends MalformedWordError {
  constructor(word: string) {
    super(word, 'duplicate entry')
    this.name = 'DuplicateWordError'
  }
}

export class MalformedPatternError extends Error {
  readonly input: string

  constructor(input: string, reason: string) {
    super(`Malformed pattern "${input}": ${reason}`)
    this.name = 'MalformedPatternError'
    this.input = input
  }
}

/** A chunk of the dictionary scan failed; the whole search is abandoned. */
export class SearchFaultError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'SearchFaultError'
  }
}
