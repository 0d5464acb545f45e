import { feedbackPattern } from './feedback'
import type { Pattern } from './pattern'
import { Bitset } from './bitset'
import type { Dictionary } from './dictionary'

/** Keep the words that would have produced `observed` for `guess`, in order. */
export function filterWords(words: readonly string[], guess: string, observed: Pattern): string[] {
  const L = guess.length
  const out: string[] = []
  for (const w of words) {
    if (w.length !== L) continue // length mismatch can't match pattern
    if (feedbackPattern(guess, w) === observed) out.push(w)
  }
  return out
}

/**
 * Subset of a shared Dictionary, stored as a bitset of dictionary indices so
 * iteration always follows dictionary order.
 */
export class CandidateSet {
  readonly dictionary: Dictionary
  private alive: Bitset

  private constructor(dictionary: Dictionary, alive: Bitset) {
    this.dictionary = dictionary
    this.alive = alive
  }

  /** Every dictionary word */
  static all(dictionary: Dictionary): CandidateSet {
    return new CandidateSet(dictionary, Bitset.full(dictionary.size))
  }

  /** Rebuild from dictionary indices (e.g. after crossing a worker boundary) */
  static fromIndices(dictionary: Dictionary, indices: Iterable<number>): CandidateSet {
    const alive = new Bitset(dictionary.size)
    for (const i of indices) alive.add(i)
    return new CandidateSet(dictionary, alive)
  }

  /** Words must belong to the dictionary */
  static fromWords(dictionary: Dictionary, words: Iterable<string>): CandidateSet {
    const alive = new Bitset(dictionary.size)
    for (const w of words) {
      const i = dictionary.indexOf(w)
      if (i < 0) throw new RangeError(`"${w}" is not in the dictionary`)
      alive.add(i)
    }
    return new CandidateSet(dictionary, alive)
  }

  get size(): number {
    return this.alive.count()
  }

  isEmpty(): boolean {
    return this.alive.count() === 0
  }

  hasIndex(i: number): boolean {
    return i >= 0 && i < this.alive.size && this.alive.has(i)
  }

  has(word: string): boolean {
    return this.hasIndex(this.dictionary.indexOf(word))
  }

  indices(): IterableIterator<number> {
    return this.alive.indices()
  }

  indexArray(): number[] {
    return [...this.alive.indices()]
  }

  words(): string[] {
    const out: string[] = []
    for (const i of this.alive.indices()) out.push(this.dictionary.words[i]!)
    return out
  }

  /** New set narrowed to the words consistent with (guess, observed). May be empty. */
  filter(guess: string, observed: Pattern): CandidateSet {
    const next = this.alive.clone()
    this.narrow(next, guess, observed)
    return new CandidateSet(this.dictionary, next)
  }

  /** In-place narrowing; only the owner of the set should call this. */
  applyFeedback(guess: string, observed: Pattern): void {
    this.narrow(this.alive, guess, observed)
  }

  private narrow(bits: Bitset, guess: string, observed: Pattern): void {
    const words = this.dictionary.words
    if (guess.length !== this.dictionary.length) {
      for (const i of bits.indices()) bits.delete(i)
      return
    }
    for (const i of bits.indices()) {
      if (feedbackPattern(guess, words[i]!) !== observed) bits.delete(i)
    }
  }
}

export function filterCandidates(
  candidates: CandidateSet,
  guess: string,
  observed: Pattern,
): CandidateSet {
  return candidates.filter(guess, observed)
}
