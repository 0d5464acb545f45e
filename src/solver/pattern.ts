import { MalformedPatternError } from './errors'

// Trit meanings: 0=absent (gray), 1=present (yellow), 2=exact (green)
export type Trit = 0 | 1 | 2

export const ABSENT: Trit = 0
export const PRESENT: Trit = 1
export const EXACT: Trit = 2

/**
 * Feedback for one guess against one secret, packed little-endian base-3:
 * position 0 is the least-significant trit. Being a plain number it orders
 * totally and keys a Map directly.
 */
export type Pattern = number

export const MAX_NUMERIC_TRITS = 33 // because 3^33 < 2^53 (safe integer) and 3^34 > 2^53

function toTrit(n: number): Trit {
  return n === 2 ? EXACT : n === 1 ? PRESENT : ABSENT
}

function assertPackable(length: number): void {
  if (!Number.isInteger(length) || length < 1 || length > MAX_NUMERIC_TRITS) {
    throw new RangeError(`pattern length must be 1..${MAX_NUMERIC_TRITS}, got ${length}`)
  }
}

/** Encode trits into a pattern code. Lowest index becomes the least-significant trit. */
export function encodeTrits(trits: readonly Trit[]): Pattern {
  assertPackable(trits.length)
  let value = 0
  let mul = 1
  for (const t of trits) {
    value += t * mul
    mul *= 3
  }
  return value
}

/** Decode a pattern code back into its trit array of given length */
export function decodePattern(p: Pattern, length: number): Trit[] {
  assertPackable(length)
  const out = new Array<Trit>(length)
  let v = p
  for (let i = 0; i < length; i++) {
    out[i] = toTrit(v % 3)
    v = Math.trunc(v / 3)
  }
  return out
}

/** Number of distinct patterns for a word length (3^L) */
export function patternSpace(length: number): number {
  assertPackable(length)
  return Math.pow(3, length)
}

/** Code of the all-exact pattern: Σ 2·3^i = 3^L - 1 */
export function allExact(length: number): Pattern {
  return patternSpace(length) - 1
}

export function isSolved(p: Pattern, length: number): boolean {
  return p === allExact(length)
}

export function isPatternFor(p: Pattern, length: number): boolean {
  return Number.isInteger(p) && p >= 0 && p < patternSpace(length)
}

const SYMBOLS: Record<Trit, string> = { 0: '-', 1: 'y', 2: 'g' }

/** Printable form, e.g. "g-y--" */
export function patternToString(p: Pattern, length: number): string {
  return decodePattern(p, length)
    .map((t) => SYMBOLS[t])
    .join('')
}

function tritFromChar(ch: string): Trit | null {
  switch (ch) {
    case 'g':
    case '2':
      return EXACT
    case 'y':
    case '1':
      return PRESENT
    case '-':
    case '.':
    case '0':
    case 'b':
    case 'x':
      return ABSENT
    default:
      return null
  }
}

/**
 * Parse user/CLI feedback text. Accepts g/y/- (also 2/1/0, and . b x for
 * absent), case-insensitive.
 */
export function parsePattern(text: string, length: number): Pattern {
  const cleaned = text.trim().toLowerCase()
  if (cleaned.length !== length) {
    throw new MalformedPatternError(text, `expected ${length} symbols, got ${cleaned.length}`)
  }
  const trits: Trit[] = []
  for (const ch of cleaned) {
    const t = tritFromChar(ch)
    if (t === null) throw new MalformedPatternError(text, `unknown symbol '${ch}'`)
    trits.push(t)
  }
  return encodeTrits(trits)
}

/** Accept either a packed code or feedback text and return a validated code */
export function toPattern(p: Pattern | string, length: number): Pattern {
  if (typeof p === 'string') return parsePattern(p, length)
  if (!isPatternFor(p, length)) {
    throw new MalformedPatternError(String(p), `not a valid code for length ${length}`)
  }
  return p
}
