// Deterministic lightweight RNG (Mulberry32)
// Reference: https://stackoverflow.com/a/47593316 (public domain)
export type Rng = () => number

export function mulberry32(seed: number): Rng {
  let t = seed >>> 0
  return function () {
    t += 0x6d2b79f5
    let x = Math.imul(t ^ (t >>> 15), 1 | t)
    x ^= x + Math.imul(x ^ (x >>> 7), 61 | x)
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296
  }
}

/** Uniform pick; throws on an empty list */
export function pickOne<T>(items: readonly T[], rng: Rng): T {
  if (items.length === 0) throw new RangeError('cannot pick from an empty list')
  const item = items[Math.floor(rng() * items.length)]
  if (item === undefined) throw new RangeError('rng returned a value outside [0, 1)')
  return item
}
