/** Fixed-size bitset over dictionary indices with an O(1) population count. */
export class Bitset {
  private words: Uint32Array
  private live = 0
  readonly size: number // number of bits

  constructor(size: number) {
    if (!Number.isInteger(size) || size < 0) throw new RangeError('size must be an integer >= 0')
    this.size = size
    this.words = new Uint32Array((size + 31) >>> 5) // divide by 32 round up
  }

  static full(size: number): Bitset {
    const bs = new Bitset(size)
    bs.fillAll()
    return bs
  }

  private check(i: number): void {
    if (!Number.isInteger(i) || i < 0 || i >= this.size) {
      throw new RangeError(`index ${i} out of range 0..${this.size - 1}`)
    }
  }

  fillAll(): void {
    this.words.fill(0xffffffff)
    // Mask off unused bits in last word
    const rem = this.size & 31
    if (rem !== 0) this.words[this.words.length - 1] = (1 << rem) - 1
    this.live = this.size
  }

  has(i: number): boolean {
    this.check(i)
    return (this.words[i >>> 5]! & (1 << (i & 31))) !== 0
  }

  add(i: number): void {
    if (this.has(i)) return
    this.words[i >>> 5]! |= 1 << (i & 31)
    this.live++
  }

  delete(i: number): void {
    if (!this.has(i)) return
    this.words[i >>> 5]! &= ~(1 << (i & 31))
    this.live--
  }

  count(): number {
    return this.live
  }

  /** Set bits in ascending order */
  *indices(): IterableIterator<number> {
    for (let w = 0; w < this.words.length; w++) {
      let word = this.words[w]!
      while (word !== 0) {
        const lsb = word & -word
        const bit = Math.clz32(lsb) ^ 31 // position within word 0..31
        yield (w << 5) + bit
        word ^= lsb
      }
    }
  }

  clone(): Bitset {
    const bs = new Bitset(this.size)
    bs.words.set(this.words)
    bs.live = this.live
    return bs
  }
}
