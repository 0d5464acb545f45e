import type { Dictionary } from './dictionary'
import { InvalidStateError, SearchFaultError } from './errors'
import type { CandidateSet } from './filter'
import {
  compareScored,
  guessStats,
  partitionSizes,
  pickBetter,
  scoreFromSizes,
  type ScoreMetric,
  type ScoredGuess,
} from './scoring'

export const DEFAULT_CHUNK_SIZE = 512

/** Half-open range [start, end) of dictionary indices */
export interface ChunkTask {
  start: number
  end: number
}

export interface StrategyResult {
  guess: string
  index: number
  score: number
  isCandidate: boolean
}

export interface Suggestion {
  guess: string
  score: number
  isCandidate: boolean
  expectedRemaining: number
  worstCase: number
  buckets: number
}

export interface ScanRequest {
  dictionary: Dictionary
  candidates: CandidateSet
  chunks: readonly ChunkTask[]
  metric: ScoreMetric
  onChunkDone?: () => void
}

/**
 * Executes a dictionary scan: one local winner per chunk, in chunk order.
 * Any chunk failure must reject the whole scan.
 */
export interface ScanRunner {
  scan(request: ScanRequest): Promise<Array<ScoredGuess | null>>
}

export interface SearchOptions {
  metric?: ScoreMetric
  chunkSize?: number
  onProgress?: (fraction: number) => void
}

export function planChunks(size: number, chunkSize: number = DEFAULT_CHUNK_SIZE): ChunkTask[] {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`)
  }
  const chunks: ChunkTask[] = []
  for (let start = 0; start < size; start += chunkSize) {
    chunks.push({ start, end: Math.min(size, start + chunkSize) })
  }
  return chunks
}

/** Best guess among dictionary[start..end) against the candidate secrets */
export function scanChunk(
  candidates: CandidateSet,
  secrets: readonly string[],
  chunk: ChunkTask,
  metric: ScoreMetric,
): ScoredGuess | null {
  const words = candidates.dictionary.words
  const { start, end } = chunk
  if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0 || end > words.length || start > end) {
    throw new RangeError(`chunk ${start}..${end} outside dictionary of ${words.length}`)
  }
  let best: ScoredGuess | null = null
  for (let i = start; i < end; i++) {
    const score = scoreFromSizes(partitionSizes(secrets, words[i]!), secrets.length, metric)
    best = pickBetter(best, { index: i, score, isCandidate: candidates.hasIndex(i) })
  }
  return best
}

/** Sequential fold of chunk winners under the guess ordering */
export function reduceWinners(winners: Iterable<ScoredGuess | null>): ScoredGuess | null {
  let best: ScoredGuess | null = null
  for (const w of winners) best = pickBetter(best, w)
  return best
}

/** Runs every chunk on the calling thread */
export class InlineRunner implements ScanRunner {
  async scan(request: ScanRequest): Promise<Array<ScoredGuess | null>> {
    const secrets = request.candidates.words()
    const out: Array<ScoredGuess | null> = []
    for (const chunk of request.chunks) {
      try {
        out.push(scanChunk(request.candidates, secrets, chunk, request.metric))
      } catch (err) {
        throw new SearchFaultError(`chunk ${chunk.start}..${chunk.end} failed`, { cause: err })
      }
      request.onChunkDone?.()
    }
    return out
  }
}

function toResult(dictionary: Dictionary, w: ScoredGuess): StrategyResult {
  return { guess: dictionary.wordAt(w.index), index: w.index, score: w.score, isCandidate: w.isCandidate }
}

// Zero or one candidate needs no scan.
function trivialResult(candidates: CandidateSet, metric: ScoreMetric): StrategyResult | null {
  if (candidates.isEmpty()) throw new InvalidStateError('no candidates left to search')
  if (candidates.size > 1) return null
  const [index] = candidates.indexArray()
  if (index === undefined) return null
  return toResult(candidates.dictionary, {
    index,
    score: scoreFromSizes([1], 1, metric),
    isCandidate: true,
  })
}

/** Argmax over the whole dictionary, on the calling thread. */
export function bestGuess(candidates: CandidateSet, opts: SearchOptions = {}): StrategyResult {
  const metric = opts.metric ?? 'entropy'
  const trivial = trivialResult(candidates, metric)
  if (trivial) return trivial
  const chunks = planChunks(candidates.dictionary.size, opts.chunkSize)
  const secrets = candidates.words()
  let best: ScoredGuess | null = null
  for (let k = 0; k < chunks.length; k++) {
    best = pickBetter(best, scanChunk(candidates, secrets, chunks[k]!, metric))
    opts.onProgress?.((k + 1) / chunks.length)
  }
  if (!best) throw new SearchFaultError('scan produced no winner')
  return toResult(candidates.dictionary, best)
}

/**
 * Fork/join search over a ScanRunner. The dictionary is split into
 * contiguous chunks, each runner task returns its local winner, and the
 * winners are folded here in chunk order.
 */
export class StrategySearch {
  readonly dictionary: Dictionary
  readonly metric: ScoreMetric
  private readonly runner: ScanRunner
  private readonly chunkSize: number

  constructor(
    dictionary: Dictionary,
    runner: ScanRunner = new InlineRunner(),
    opts: { metric?: ScoreMetric; chunkSize?: number } = {},
  ) {
    this.dictionary = dictionary
    this.runner = runner
    this.metric = opts.metric ?? 'entropy'
    this.chunkSize = opts.chunkSize ?? DEFAULT_CHUNK_SIZE
  }

  async bestGuess(
    candidates: CandidateSet,
    onProgress?: (fraction: number) => void,
  ): Promise<StrategyResult> {
    if (candidates.dictionary !== this.dictionary) {
      throw new InvalidStateError('candidate set belongs to a different dictionary')
    }
    const trivial = trivialResult(candidates, this.metric)
    if (trivial) return trivial
    const chunks = planChunks(this.dictionary.size, this.chunkSize)
    let done = 0
    const winners = await this.runner.scan({
      dictionary: this.dictionary,
      candidates,
      chunks,
      metric: this.metric,
      onChunkDone: () => {
        done++
        onProgress?.(done / chunks.length)
      },
    })
    if (winners.length !== chunks.length) {
      throw new SearchFaultError(`runner returned ${winners.length} results for ${chunks.length} chunks`)
    }
    const best = reduceWinners(winners)
    if (!best) throw new SearchFaultError('scan produced no winner')
    return toResult(this.dictionary, best)
  }
}

/**
 * The `k` best rows, each picked by the sequential fold `bestGuess` uses.
 * compareScored is not transitive across near-ties, so rows are never sorted.
 */
export function topScored<T extends ScoredGuess>(rows: readonly T[], k: number): T[] {
  const left = [...rows]
  const picked: T[] = []
  while (picked.length < k && left.length > 0) {
    let bi = 0
    for (let i = 1; i < left.length; i++) {
      if (compareScored(left[bi]!, left[i]!) > 0) bi = i
    }
    picked.push(...left.splice(bi, 1))
  }
  return picked
}

/** Top-K guesses with partition statistics, for display */
export function rankGuesses(
  candidates: CandidateSet,
  opts: { topK?: number; metric?: ScoreMetric } = {},
): Suggestion[] {
  const topK = opts.topK ?? 5
  const metric = opts.metric ?? 'entropy'
  if (candidates.isEmpty() || topK <= 0) return []
  const secrets = candidates.words()
  const words = candidates.dictionary.words
  const rows = words.map((guess, index) => ({
    index,
    isCandidate: candidates.hasIndex(index),
    ...guessStats(secrets, guess, metric),
  }))
  return topScored(rows, topK).map((r) => ({
    guess: words[r.index]!,
    score: r.score,
    isCandidate: r.isCandidate,
    expectedRemaining: r.expectedRemaining,
    worstCase: r.worstCase,
    buckets: r.buckets,
  }))
}
