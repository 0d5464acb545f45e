import { describe, it, expect } from 'vitest'
import {
  compareScored,
  entropyFromSizes,
  guessStats,
  partitionByPattern,
  partitionSizes,
  pickBetter,
  scoreGuess,
  SCORE_EPSILON,
} from '../scoring'
import { CandidateSet } from '../filter'
import { parsePattern } from '../pattern'
import { FOUR, fourWords } from './fixtures'

describe('scoreGuess', () => {
  it('a guess that splits n candidates into singletons scores log2 n', () => {
    expect(scoreGuess(['abc', 'abd', 'aec', 'fgh'], 'abc')).toBe(2)
  })

  it('a single candidate scores zero', () => {
    expect(scoreGuess(['abc'], 'abc')).toBe(0)
    expect(scoreGuess(['abc'], 'xyz')).toBe(0)
  })

  it('scores the 1/1/2 split as 1.5 bits', () => {
    expect(scoreGuess(FOUR, 'apple')).toBe(1.5)
    expect(scoreGuess(CandidateSet.all(fourWords()), 'ample')).toBe(1.5)
  })

  it('minimax is the negated largest bucket', () => {
    expect(scoreGuess(FOUR, 'apple', 'minimax')).toBe(-2)
    expect(scoreGuess(['abc', 'abd', 'aec', 'fgh'], 'abc', 'minimax')).toBe(-1)
  })

  it('equal bucket multisets give bit-identical scores', () => {
    const secrets = ['crane', 'crate', 'slate', 'plate', 'grape', 'trace', 'brick']
    const a = partitionSizes(secrets, 'crane')
    const b = [...a].reverse()
    expect(Object.is(entropyFromSizes(a, 7), entropyFromSizes([...b].sort((x, y) => x - y), 7))).toBe(
      true,
    )
    expect(Object.is(scoreGuess(FOUR, 'angle'), scoreGuess(FOUR, 'ankle'))).toBe(true)
  })
})

describe('partitions', () => {
  it('groups secrets by the pattern they produce', () => {
    const buckets = partitionByPattern(FOUR, 'apple')
    expect(buckets.get(parsePattern('g--gg', 5))).toBe(2)
    expect(buckets.get(parsePattern('g-ggg', 5))).toBe(1)
    expect(buckets.get(parsePattern('ggggg', 5))).toBe(1)
    expect(buckets.size).toBe(3)
  })

  it('sizes are sorted ascending', () => {
    expect(partitionSizes(FOUR, 'apple')).toEqual([1, 1, 2])
  })

  it('reports expected remaining and worst case', () => {
    expect(guessStats(FOUR, 'apple')).toEqual({
      score: 1.5,
      buckets: 3,
      worstCase: 2,
      expectedRemaining: 1.5,
    })
  })
})

describe('guess ordering', () => {
  it('a higher score wins outside epsilon', () => {
    const a = { index: 5, score: 1.1, isCandidate: false }
    const b = { index: 0, score: 1.0, isCandidate: true }
    expect(compareScored(a, b)).toBeLessThan(0)
    expect(pickBetter(b, a)).toBe(a)
  })

  it('within epsilon a candidate beats a non-candidate', () => {
    const a = { index: 3, score: 1.0, isCandidate: false }
    const b = { index: 5, score: 1.0 + SCORE_EPSILON / 10, isCandidate: true }
    expect(compareScored(a, b)).toBeGreaterThan(0)
    expect(pickBetter(a, b)).toBe(b)
  })

  it('then the earlier dictionary word wins', () => {
    const a = { index: 7, score: 2, isCandidate: true }
    const b = { index: 2, score: 2, isCandidate: true }
    expect(pickBetter(a, b)).toBe(b)
    expect(pickBetter(null, a)).toBe(a)
    expect(pickBetter(a, null)).toBe(a)
  })
})
