import { describe, it, expect } from 'vitest'
import {
  allExact,
  decodePattern,
  encodeTrits,
  isSolved,
  parsePattern,
  patternSpace,
  patternToString,
  toPattern,
} from '../pattern'
import { MalformedPatternError } from '../errors'

describe('pattern codec', () => {
  it('packs position 0 as the least significant trit', () => {
    expect(encodeTrits([2, 2, 0, 0, 0])).toBe(8)
    expect(encodeTrits([0, 0, 0, 0, 1])).toBe(81)
    expect(decodePattern(8, 5)).toEqual([2, 2, 0, 0, 0])
  })

  it('all-exact is 3^L - 1', () => {
    expect(allExact(5)).toBe(242)
    expect(allExact(1)).toBe(2)
    expect(isSolved(242, 5)).toBe(true)
    expect(isSolved(241, 5)).toBe(false)
  })

  it('rejects lengths it cannot pack into a safe integer', () => {
    expect(() => patternSpace(0)).toThrow(RangeError)
    expect(() => patternSpace(34)).toThrow(RangeError)
    expect(() => encodeTrits([])).toThrow(RangeError)
  })

  it('formats with g / y / -', () => {
    expect(patternToString(218, 5)).toBe('g--gg')
    expect(patternToString(encodeTrits([1, 0, 1, 1, 0]), 5)).toBe('y-yy-')
  })

  it('parses every accepted symbol set', () => {
    expect(parsePattern('g--gg', 5)).toBe(218)
    expect(parsePattern(' GG--- ', 5)).toBe(8)
    expect(parsePattern('22000', 5)).toBe(8)
    expect(parsePattern('g.bx0', 5)).toBe(2)
    expect(parsePattern('y1', 2)).toBe(4)
  })

  it('reports malformed text', () => {
    expect(() => parsePattern('gg', 5)).toThrow(MalformedPatternError)
    expect(() => parsePattern('ggzgg', 5)).toThrow("unknown symbol 'z'")
  })

  it('toPattern validates numeric codes against the length', () => {
    expect(toPattern(242, 5)).toBe(242)
    expect(toPattern('ggggg', 5)).toBe(242)
    expect(() => toPattern(243, 5)).toThrow(MalformedPatternError)
    expect(() => toPattern(-1, 5)).toThrow(MalformedPatternError)
    expect(() => toPattern(1.5, 5)).toThrow(MalformedPatternError)
  })
})
