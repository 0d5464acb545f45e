import type { CandidateSet } from '../solver/filter'
import { bestGuess } from '../solver/search'

export type PolicyId = 'entropy' | 'minimax' | 'positional-frequency'

export const POLICY_IDS: readonly PolicyId[] = ['entropy', 'minimax', 'positional-frequency']

export function isPolicyId(v: string): v is PolicyId {
  return v === 'entropy' || v === 'minimax' || v === 'positional-frequency'
}

/** Per-position letter counts over the candidates: [pos][letter] */
export function positionFrequencies(words: readonly string[], length: number): number[][] {
  const freq: number[][] = Array.from({ length }, () => new Array<number>(26).fill(0))
  for (const w of words) {
    for (let pos = 0; pos < length; pos++) {
      const c = w.charCodeAt(pos) - 97
      const row = freq[pos]
      if (row && c >= 0 && c < 26) row[c]!++
    }
  }
  return freq
}

/**
 * Candidate whose letters are the most common in their positions among the
 * candidates; ties go to dictionary order. Never looks outside the candidates.
 */
export function pickByPositionalFrequency(candidates: CandidateSet): string {
  const words = candidates.words()
  const freq = positionFrequencies(words, candidates.dictionary.length)
  let best: string | null = null
  let bestScore = -1
  for (const w of words) {
    let s = 0
    for (let pos = 0; pos < w.length; pos++) s += freq[pos]?.[w.charCodeAt(pos) - 97] ?? 0
    if (s > bestScore) {
      best = w
      bestScore = s
    }
  }
  if (best === null) throw new RangeError('no candidates to pick from')
  return best
}

export function pickGuess(policy: PolicyId, candidates: CandidateSet, chunkSize?: number): string {
  switch (policy) {
    case 'entropy':
      return bestGuess(candidates, { metric: 'entropy', chunkSize }).guess
    case 'minimax':
      return bestGuess(candidates, { metric: 'minimax', chunkSize }).guess
    case 'positional-frequency':
      return pickByPositionalFrequency(candidates)
  }
}
