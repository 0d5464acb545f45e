import { decodePattern, type Pattern, type Trit } from './pattern'

// Scratch buffers for the hot path. Each worker thread has its own module
// instance, and feedbackPattern never yields, so sharing them is safe.
const counts = new Int32Array(26)
let marks = new Uint8Array(16)

/**
 * Score a guess against a secret.
 * Greens are resolved first and removed from the secret's letter pool; the
 * remaining positions are then marked yellow left to right while the pool
 * still holds the letter. Letters outside a-z can only ever be green.
 */
export function feedbackPattern(guess: string, secret: string): Pattern {
  if (guess.length !== secret.length) {
    throw new Error('Guess and secret must have same length')
  }
  const L = guess.length
  if (marks.length < L) marks = new Uint8Array(L)
  counts.fill(0)

  for (let i = 0; i < L; i++) {
    const c = secret.charCodeAt(i) - 97
    if (c >= 0 && c < 26) counts[c]!++
  }

  // First pass: greens
  for (let i = 0; i < L; i++) {
    const g = guess.charCodeAt(i)
    if (g === secret.charCodeAt(i)) {
      marks[i] = 2
      const c = g - 97
      if (c >= 0 && c < 26) counts[c]!--
    } else {
      marks[i] = 0
    }
  }

  // Second pass: yellows, and pack as we go
  let value = 0
  let mul = 1
  for (let i = 0; i < L; i++) {
    if (marks[i] === 0) {
      const c = guess.charCodeAt(i) - 97
      if (c >= 0 && c < 26 && counts[c]! > 0) {
        marks[i] = 1
        counts[c]!--
      }
    }
    value += marks[i]! * mul
    mul *= 3
  }
  return value
}

export function feedbackTrits(guess: string, secret: string): Trit[] {
  return decodePattern(feedbackPattern(guess, secret), guess.length)
}
