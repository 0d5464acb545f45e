import type { Dictionary } from './dictionary'
import { InvalidStateError } from './errors'
import { CandidateSet } from './filter'
import { hex32 } from './hash'
import { guessStats, type ScoreMetric } from './scoring'
import {
  InlineRunner,
  StrategySearch,
  type ScanRunner,
  type StrategyResult,
  type Suggestion,
} from './search'

export interface OpeningRecord {
  key: string
  guess: string
  score: number
  metric: ScoreMetric
  size: number
  createdAt: string
}

/** Persistence for computed openings, keyed by dictionary content + metric */
export interface OpeningStore {
  get(key: string): Promise<OpeningRecord | null>
  put(record: OpeningRecord): Promise<void>
}

export function openingKey(dictionary: Dictionary, metric: ScoreMetric): string {
  return `${hex32(dictionary.hash)}-${dictionary.length}x${dictionary.size}-${metric}`
}

/** Record naming the metric whose opening solved the most secrets in simulation */
export function preferredKey(dictionary: Dictionary): string {
  return `${hex32(dictionary.hash)}-${dictionary.length}x${dictionary.size}-preferred`
}

export async function savePreferred(
  store: OpeningStore,
  dictionary: Dictionary,
  opening: { guess: string; score: number; metric: ScoreMetric },
): Promise<OpeningRecord> {
  const record: OpeningRecord = {
    key: preferredKey(dictionary),
    guess: opening.guess,
    score: opening.score,
    metric: opening.metric,
    size: dictionary.size,
    createdAt: new Date().toISOString(),
  }
  await store.put(record)
  return record
}

/** Preferred metric for this dictionary, or null when none was recorded */
export async function loadPreferredMetric(
  store: OpeningStore,
  dictionary: Dictionary,
): Promise<ScoreMetric | null> {
  const rec = await store.get(preferredKey(dictionary))
  if (!rec || rec.size !== dictionary.size) return null
  return rec.metric
}

export interface OpeningBookOptions {
  runner?: ScanRunner
  store?: OpeningStore
  metric?: ScoreMetric
  chunkSize?: number
  onProgress?: (fraction: number) => void
}

export type OpeningSource = 'computed' | 'store'

/**
 * Best opening guess for one dictionary, computed once by a full parallel scan
 * and then served from memory. Construct one per dictionary and pass it to
 * every session that needs it.
 */
export class OpeningBook {
  readonly dictionary: Dictionary
  readonly metric: ScoreMetric
  private readonly search: StrategySearch
  private readonly store: OpeningStore | undefined
  private readonly onProgress: ((fraction: number) => void) | undefined
  private pending: Promise<StrategyResult> | null = null
  private cached: StrategyResult | null = null
  private row: Suggestion | null = null
  private origin: OpeningSource | null = null

  constructor(dictionary: Dictionary, opts: OpeningBookOptions = {}) {
    this.dictionary = dictionary
    this.metric = opts.metric ?? 'entropy'
    this.search = new StrategySearch(dictionary, opts.runner ?? new InlineRunner(), {
      metric: this.metric,
      chunkSize: opts.chunkSize,
    })
    this.store = opts.store
    this.onProgress = opts.onProgress
  }

  get key(): string {
    return openingKey(this.dictionary, this.metric)
  }

  /** Where the cached opening came from, or null before initialization */
  get source(): OpeningSource | null {
    return this.origin
  }

  /**
   * Populate the cache. Concurrent callers share one computation; a failed
   * run leaves the book empty so a later call can try again.
   */
  initialize(): Promise<StrategyResult> {
    if (this.cached) return Promise.resolve(this.cached)
    if (!this.pending) {
      this.pending = this.load().then(
        (result) => {
          this.cached = result
          return result
        },
        (err: unknown) => {
          this.pending = null
          throw err
        },
      )
    }
    return this.pending
  }

  private async load(): Promise<StrategyResult> {
    const fromStore = await this.readStore()
    if (fromStore) {
      this.origin = 'store'
      return fromStore
    }
    const result = await this.search.bestGuess(CandidateSet.all(this.dictionary), this.onProgress)
    this.origin = 'computed'
    if (this.store) {
      await this.store.put({
        key: this.key,
        guess: result.guess,
        score: result.score,
        metric: this.metric,
        size: this.dictionary.size,
        createdAt: new Date().toISOString(),
      })
    }
    return result
  }

  private async readStore(): Promise<StrategyResult | null> {
    if (!this.store) return null
    const rec = await this.store.get(this.key)
    if (!rec || rec.metric !== this.metric) return null
    const index = this.dictionary.indexOf(rec.guess)
    // stale record: the word is gone, recompute
    if (index < 0) return null
    return { guess: rec.guess, index, score: rec.score, isCandidate: true }
  }

  result(): StrategyResult | null {
    return this.cached
  }

  bestOpeningGuess(): string {
    if (!this.cached) throw new InvalidStateError('opening book has not been initialized')
    return this.cached.guess
  }

  /**
   * The opening with its partition statistics against the whole dictionary.
   * One pass over the words; the dictionary is never rescanned for it.
   */
  openingSuggestion(): Suggestion {
    if (!this.cached) throw new InvalidStateError('opening book has not been initialized')
    if (!this.row) {
      const stats = guessStats(this.dictionary.words, this.cached.guess, this.metric)
      this.row = {
        guess: this.cached.guess,
        score: this.cached.score,
        isCandidate: true,
        expectedRemaining: stats.expectedRemaining,
        worstCase: stats.worstCase,
        buckets: stats.buckets,
      }
    }
    return { ...this.row }
  }
}
