import { describe, it, expect } from 'vitest'
import fc from 'fast-check'
import { feedbackPattern } from '@/solver/feedback'
import { allExact, decodePattern, patternSpace } from '@/solver/pattern'
import { filterWords } from '@/solver/filter'

const alpha = 'abcdefghijklmnopqrstuvwxyz'

// Small alphabet so repeated letters show up often
function genWord(len: number, letters = alpha) {
  return fc
    .array(fc.constantFrom(...letters.split('')), { minLength: len, maxLength: len })
    .map((a) => a.join(''))
}

const RUNS = process.env.FAST_CHECK_RUNS ? Number(process.env.FAST_CHECK_RUNS) : 300

for (const L of [3, 5, 7]) {
  describe(`feedback invariants L=${L}`, () => {
    it('greens equal position matches and the code stays in range', () => {
      fc.assert(
        fc.property(genWord(L, 'abcde'), genWord(L, 'abcde'), (g, s) => {
          const pat = feedbackPattern(g, s)
          expect(pat).toBeGreaterThanOrEqual(0)
          expect(pat).toBeLessThan(patternSpace(L))
          const trits = decodePattern(pat, L)
          let matches = 0
          for (let i = 0; i < L; i++) if (g[i] === s[i]) matches++
          expect(trits.filter((t) => t === 2).length).toBe(matches)
        }),
        { numRuns: RUNS },
      )
    })

    it('never marks a letter non-absent more times than the secret holds it', () => {
      fc.assert(
        fc.property(genWord(L, 'abc'), genWord(L, 'abc'), (g, s) => {
          const trits = decodePattern(feedbackPattern(g, s), L)
          for (const ch of new Set(g)) {
            let marked = 0
            for (let i = 0; i < L; i++) if (g[i] === ch && trits[i] !== 0) marked++
            const held = [...s].filter((c) => c === ch).length
            expect(marked).toBe(Math.min(held, [...g].filter((c) => c === ch).length))
          }
        }),
        { numRuns: RUNS },
      )
    })

    it('the secret always survives filtering by its own feedback', () => {
      fc.assert(
        fc.property(genWord(L, 'abcdef'), genWord(L, 'abcdef'), (g, s) => {
          expect(filterWords([s], g, feedbackPattern(g, s))).toEqual([s])
        }),
        { numRuns: RUNS },
      )
    })

    it('all-exact iff guess equals secret', () => {
      fc.assert(
        fc.property(genWord(L, 'ab'), genWord(L, 'ab'), (g, s) => {
          expect(feedbackPattern(g, s) === allExact(L)).toBe(g === s)
        }),
        { numRuns: RUNS },
      )
    })
  })
}
