import { describe, it, expect } from 'vitest'
import {
  formatTable,
  pickBest,
  runShard,
  type RowSummary,
  sampleSecrets,
  simulateGame,
  splitEven,
  summarize,
  type ShardResult,
} from '../core'
import { FOUR, fourWords } from '@/solver/__tests__/fixtures'

describe('simulateGame', () => {
  it('solves with the entropy policy', () => {
    const r = simulateGame(fourWords(), 'entropy', 'ankle', { maxGuesses: 6 })
    expect(r).toEqual({
      secret: 'ankle',
      solved: true,
      attempts: 3,
      remaining: 1,
      guesses: ['apple', 'angle', 'ankle'],
    })
  })

  it('uses a precomputed opening', () => {
    const r = simulateGame(fourWords(), 'entropy', 'ankle', { maxGuesses: 6, opening: 'ample' })
    expect(r.guesses).toEqual(['ample', 'angle', 'ankle'])
  })

  it('stops at the guess limit', () => {
    const r = simulateGame(fourWords(), 'entropy', 'ankle', { maxGuesses: 2 })
    expect(r.solved).toBe(false)
    expect(r.attempts).toBe(2)
    expect(r.remaining).toBe(1)
  })
})

describe('runShard / summarize', () => {
  it('aggregates attempts into a histogram', () => {
    const res = runShard({
      words: FOUR,
      length: 5,
      policy: 'entropy',
      secrets: ['apple', 'ankle'],
      attempts: 6,
    })
    expect(res.games).toBe(2)
    expect(res.solved).toBe(2)
    expect(res.totalAttemptsSolved).toBe(4)
    expect(res.attemptHist).toEqual([1, 0, 1, 0, 0, 0, 0])
  })

  it('merges shards of one policy', () => {
    const shard = (games: number, solved: number, hist: number[], rem: number): ShardResult => ({
      policy: 'minimax',
      games,
      solved,
      attemptHist: hist,
      totalAttemptsSolved: solved * 3,
      remainingOnFailAccum: rem,
      totalTimeMs: 5,
    })
    const rows = summarize([shard(2, 2, [0, 0, 2, 0], 0), shard(2, 1, [0, 1, 0, 1], 4)])
    expect(rows).toEqual([
      {
        policy: 'minimax',
        games: 4,
        solved: 3,
        successRate: 0.75,
        avgAttempts: 3,
        avgRemainingOnFail: 4,
        attemptHist: [0, 1, 2, 1],
      },
    ])
    const lines = formatTable(rows).split('\n')
    expect(lines).toHaveLength(2)
    expect(lines[0]?.startsWith('POLICY ')).toBe(true)
    expect(lines[1]?.endsWith('0/1/2/1')).toBe(true)
  })
})

describe('helpers', () => {
  it('splitEven makes contiguous non-empty parts', () => {
    expect(splitEven([1, 2, 3, 4, 5], 2)).toEqual([
      [1, 2],
      [3, 4, 5],
    ])
    expect(splitEven([1, 2], 5)).toEqual([[1], [2]])
    expect(splitEven([], 3)).toEqual([])
  })

  it('sampleSecrets is seeded and keeps list order', () => {
    const words = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h']
    const a = sampleSecrets(words, 3, 9)
    expect(a).toEqual(sampleSecrets(words, 3, 9))
    expect(a).toHaveLength(3)
    expect(new Set(a).size).toBe(3)
    expect(a.map((w) => words.indexOf(w))).toEqual([...a.map((w) => words.indexOf(w))].sort((x, y) => x - y))
    expect(sampleSecrets(words, 20, 9)).toEqual(words)
  })
})

describe('pickBest', () => {
  const row = (policy: RowSummary['policy'], solved: number, avgAttempts: number): RowSummary => ({
    policy,
    games: 10,
    solved,
    successRate: solved / 10,
    avgAttempts,
    avgRemainingOnFail: 0,
    attemptHist: [],
  })

  it('chooses the scoring policy with the most solves', () => {
    const best = pickBest([row('entropy', 8, 3.5), row('minimax', 9, 4), row('positional-frequency', 10, 3)])
    expect(best?.metric).toBe('minimax')
    expect(best?.row.solved).toBe(9)
  })

  it('breaks ties on average attempts, then name', () => {
    expect(pickBest([row('minimax', 9, 3.2), row('entropy', 9, 3.4)])?.metric).toBe('minimax')
    expect(pickBest([row('minimax', 9, 3.4), row('entropy', 9, 3.4)])?.metric).toBe('entropy')
  })

  it('returns null without a scoring policy', () => {
    expect(pickBest([row('positional-frequency', 10, 3)])).toBeNull()
    expect(pickBest([])).toBeNull()
  })
})
