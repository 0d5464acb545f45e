import { feedbackPattern } from './feedback'
import { patternSpace, type Pattern } from './pattern'
import { CandidateSet } from './filter'

/**
 * entropy: Shannon entropy (bits) of the pattern distribution over candidates.
 * minimax: negated size of the largest pattern bucket.
 * Higher is better for both.
 */
export type ScoreMetric = 'entropy' | 'minimax'

export const SCORE_METRICS: readonly ScoreMetric[] = ['entropy', 'minimax']

export function isScoreMetric(v: string): v is ScoreMetric {
  return v === 'entropy' || v === 'minimax'
}

/** Scores closer than this are ties */
export const SCORE_EPSILON = 1e-9

const DENSE_LIMIT = 59049 // 3^10 buckets; beyond that fall back to a Map

let dense = new Int32Array(0)
const touched: number[] = []

/** Pattern -> number of secrets producing it */
export function partitionByPattern(secrets: Iterable<string>, guess: string): Map<Pattern, number> {
  const buckets = new Map<Pattern, number>()
  for (const s of secrets) {
    const p = feedbackPattern(guess, s)
    buckets.set(p, (buckets.get(p) ?? 0) + 1)
  }
  return buckets
}

/**
 * Bucket sizes of the partition, ascending. Sorting makes any two guesses
 * with the same multiset of sizes score bit-identically.
 */
export function partitionSizes(secrets: readonly string[], guess: string): number[] {
  const space = patternSpace(guess.length)
  let sizes: number[]
  if (space <= DENSE_LIMIT) {
    if (dense.length < space) dense = new Int32Array(space)
    for (const s of secrets) {
      const p = feedbackPattern(guess, s)
      if (dense[p]!++ === 0) touched.push(p)
    }
    sizes = new Array<number>(touched.length)
    for (let i = 0; i < touched.length; i++) {
      const p = touched[i]!
      sizes[i] = dense[p]!
      dense[p] = 0
    }
    touched.length = 0
  } else {
    sizes = [...partitionByPattern(secrets, guess).values()]
  }
  return sizes.sort((a, b) => a - b)
}

/** -Σ (c/n) log2(c/n), computed as log2 n - (1/n) Σ c log2 c */
export function entropyFromSizes(sizes: readonly number[], total: number): number {
  if (total <= 0) return 0
  let acc = 0
  for (const c of sizes) {
    if (c > 0) acc += c * Math.log2(c)
  }
  return Math.max(0, Math.log2(total) - acc / total)
}

export function scoreFromSizes(sizes: readonly number[], total: number, metric: ScoreMetric): number {
  switch (metric) {
    case 'entropy':
      return entropyFromSizes(sizes, total)
    case 'minimax':
      return -(sizes[sizes.length - 1] ?? 0)
  }
}

function secretsOf(candidates: CandidateSet | readonly string[]): readonly string[] {
  return candidates instanceof CandidateSet ? candidates.words() : candidates
}

/** Desirability of `guess` against the candidates; pure */
export function scoreGuess(
  candidates: CandidateSet | readonly string[],
  guess: string,
  metric: ScoreMetric = 'entropy',
): number {
  const secrets = secretsOf(candidates)
  return scoreFromSizes(partitionSizes(secrets, guess), secrets.length, metric)
}

export interface GuessStats {
  score: number
  buckets: number
  worstCase: number
  /** E[|S'|] = Σ c²/n */
  expectedRemaining: number
}

export function guessStats(
  secrets: readonly string[],
  guess: string,
  metric: ScoreMetric = 'entropy',
): GuessStats {
  const sizes = partitionSizes(secrets, guess)
  const n = secrets.length
  let sq = 0
  for (const c of sizes) sq += c * c
  return {
    score: scoreFromSizes(sizes, n, metric),
    buckets: sizes.length,
    worstCase: sizes[sizes.length - 1] ?? 0,
    expectedRemaining: n > 0 ? sq / n : 0,
  }
}

export interface ScoredGuess {
  /** dictionary index of the guess */
  index: number
  score: number
  isCandidate: boolean
}

/**
 * Sort order for guesses: higher score first; within SCORE_EPSILON a guess
 * that could itself be the answer; then dictionary order.
 */
export function compareScored(a: ScoredGuess, b: ScoredGuess): number {
  if (Math.abs(a.score - b.score) > SCORE_EPSILON) return b.score - a.score
  if (a.isCandidate !== b.isCandidate) return a.isCandidate ? -1 : 1
  return a.index - b.index
}

export function pickBetter(a: ScoredGuess | null, b: ScoredGuess | null): ScoredGuess | null {
  if (!a) return b
  if (!b) return a
  return compareScored(a, b) <= 0 ? a : b
}
