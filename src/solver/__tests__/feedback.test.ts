import { describe, it, expect } from 'vitest'
import { feedbackPattern, feedbackTrits } from '../feedback'
import { allExact, patternToString } from '../pattern'

describe('feedbackPattern', () => {
  it('marks exact letters and leaves missing ones absent', () => {
    expect(feedbackTrits('cigar', 'civic')).toEqual([2, 2, 0, 0, 0])
    expect(feedbackPattern('cigar', 'civic')).toBe(8)
  })

  it('does not mark a repeated letter present more often than the secret holds it', () => {
    expect(feedbackTrits('allee', 'eagle')).toEqual([1, 1, 0, 1, 2])
  })

  it('resolves exact matches before present ones', () => {
    expect(feedbackTrits('cabal', 'abbey')).toEqual([0, 1, 2, 0, 0])
  })

  it('marks both copies present when the secret has two', () => {
    expect(patternToString(feedbackPattern('speed', 'erase'), 5)).toBe('y-yy-')
  })

  it('is all-exact exactly when guess equals secret', () => {
    expect(feedbackPattern('crane', 'crane')).toBe(allExact(5))
    expect(feedbackPattern('crane', 'crate')).not.toBe(allExact(5))
  })

  it('works for other word lengths', () => {
    expect(feedbackTrits('abc', 'cab')).toEqual([1, 1, 1])
    expect(feedbackTrits('abcdefg', 'abcdefh')).toEqual([2, 2, 2, 2, 2, 2, 0])
  })

  it('rejects mismatched lengths', () => {
    expect(() => feedbackPattern('abc', 'abcd')).toThrow('Guess and secret must have same length')
  })
})
