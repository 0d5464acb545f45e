import { DuplicateWordError, MalformedWordError } from './errors'
import { fnv1a32 } from './hash'
import { MAX_NUMERIC_TRITS } from './pattern'

export const DEFAULT_WORD_LENGTH = 5

const LOWER_ALPHA = /^[a-z]+$/

/** Throw MalformedWordError unless `word` is `length` lowercase a-z letters */
export function assertWord(word: string, length: number): void {
  if (word.length !== length) {
    throw new MalformedWordError(word, `expected ${length} letters, got ${word.length}`)
  }
  if (!LOWER_ALPHA.test(word)) {
    throw new MalformedWordError(word, 'only lowercase a-z letters are allowed')
  }
}

export interface DictionaryOptions {
  /** Word length; inferred from the first word when omitted */
  length?: number
}

/**
 * Ordered, de-duplicated, immutable word list shared read-only by every
 * component. Words are validated once here; nothing downstream re-checks.
 */
export class Dictionary {
  readonly words: readonly string[]
  readonly length: number
  /** FNV-1a of the words joined by '\n'; identifies the list in caches */
  readonly hash: number
  private readonly index: Map<string, number>

  constructor(words: Iterable<string>, opts: DictionaryOptions = {}) {
    const list = [...words]
    const length = opts.length ?? list[0]?.length ?? DEFAULT_WORD_LENGTH
    if (!Number.isInteger(length) || length < 1 || length > MAX_NUMERIC_TRITS) {
      throw new RangeError(`word length must be 1..${MAX_NUMERIC_TRITS}, got ${length}`)
    }
    if (list.length === 0) throw new RangeError('dictionary must contain at least one word')
    const index = new Map<string, number>()
    for (let i = 0; i < list.length; i++) {
      const w = list[i]!
      assertWord(w, length)
      if (index.has(w)) throw new DuplicateWordError(w)
      index.set(w, i)
    }
    this.words = Object.freeze(list)
    this.length = length
    this.index = index
    this.hash = fnv1a32(list.join('\n'))
  }

  get size(): number {
    return this.words.length
  }

  has(word: string): boolean {
    return this.index.has(word)
  }

  /** Dictionary position of `word`, or -1 */
  indexOf(word: string): number {
    return this.index.get(word) ?? -1
  }

  wordAt(i: number): string {
    const w = this.words[i]
    if (w === undefined) throw new RangeError(`index ${i} out of range 0..${this.size - 1}`)
    return w
  }
}
