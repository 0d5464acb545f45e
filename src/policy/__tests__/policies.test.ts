import { describe, it, expect } from 'vitest'
import {
  isPolicyId,
  pickByPositionalFrequency,
  pickGuess,
  positionFrequencies,
  POLICY_IDS,
} from '../policies'
import { Dictionary } from '@/solver/dictionary'
import { CandidateSet } from '@/solver/filter'
import { bestGuess } from '@/solver/search'
import { fourWords } from '@/solver/__tests__/fixtures'

describe('positional frequency policy', () => {
  it('counts letters per position', () => {
    const freq = positionFrequencies(['cat', 'car'], 3)
    expect(freq[0]?.[2]).toBe(2) // c
    expect(freq[2]?.[19]).toBe(1) // t
    expect(freq[2]?.[17]).toBe(1) // r
  })

  it('picks the candidate built from the commonest letters', () => {
    const d = new Dictionary(['car', 'bat', 'cot', 'cat'])
    expect(pickByPositionalFrequency(CandidateSet.all(d))).toBe('cat')
  })

  it('breaks ties by dictionary order', () => {
    expect(pickByPositionalFrequency(CandidateSet.all(fourWords()))).toBe('apple')
  })

  it('fails on an empty set', () => {
    const d = new Dictionary(['cat'])
    expect(() => pickByPositionalFrequency(CandidateSet.all(d).filter('cat', 0))).toThrow(RangeError)
  })
})

describe('pickGuess', () => {
  it('delegates the scoring policies to the search', () => {
    const cs = CandidateSet.all(fourWords())
    expect(pickGuess('entropy', cs)).toBe(bestGuess(cs).guess)
    expect(pickGuess('minimax', cs)).toBe(bestGuess(cs, { metric: 'minimax' }).guess)
    expect(pickGuess('positional-frequency', cs)).toBe('apple')
  })

  it('recognizes policy ids', () => {
    expect(POLICY_IDS.every(isPolicyId)).toBe(true)
    expect(isPolicyId('random')).toBe(false)
  })
})
