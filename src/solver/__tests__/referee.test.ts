import { describe, it, expect } from 'vitest'
import { Referee } from '../referee'
import { InvalidStateError, MalformedWordError } from '../errors'
import { mulberry32, pickOne } from '../random'
import { parsePattern } from '../pattern'
import { fourWords } from './fixtures'

describe('Referee', () => {
  it('answers guesses until the secret is found', () => {
    const ref = new Referee('angle')
    expect(ref.play('apple')).toBe(parsePattern('g--gg', 5))
    expect(ref.status).toBe('playing')
    expect(() => ref.reveal()).toThrow(InvalidStateError)
    expect(ref.play('angle')).toBe(242)
    expect(ref.status).toBe('won')
    expect(ref.attempts).toBe(2)
    expect(ref.reveal()).toBe('angle')
    expect(() => ref.play('angle')).toThrow('the game is already won')
  })

  it('loses after the last allowed guess', () => {
    const ref = new Referee('angle', { maxGuesses: 2 })
    ref.play('apple')
    expect(ref.attemptsLeft).toBe(1)
    ref.play('ample')
    expect(ref.status).toBe('lost')
    expect(ref.reveal()).toBe('angle')
  })

  it('checks guesses against the word list when given one', () => {
    const ref = new Referee('angle', { dictionary: fourWords() })
    expect(() => ref.play('zebra')).toThrow(MalformedWordError)
    expect(() => ref.play('angl')).toThrow(MalformedWordError)
    expect(ref.attempts).toBe(0)
  })

  it('draws a dictionary secret from a seeded generator', () => {
    const d = fourWords()
    const a = Referee.random(d, mulberry32(7))
    const b = Referee.random(d, mulberry32(7))
    const secret = pickOne(d.words, mulberry32(7))
    a.play(secret)
    b.play(secret)
    expect(a.status).toBe('won')
    expect(b.status).toBe('won')
  })
})

describe('mulberry32', () => {
  it('is deterministic per seed and stays in [0, 1)', () => {
    const a = mulberry32(42)
    const b = mulberry32(42)
    for (let i = 0; i < 100; i++) {
      const x = a()
      expect(x).toBe(b())
      expect(x).toBeGreaterThanOrEqual(0)
      expect(x).toBeLessThan(1)
    }
  })

  it('pickOne refuses an empty list', () => {
    expect(() => pickOne([], mulberry32(1))).toThrow(RangeError)
  })
})
