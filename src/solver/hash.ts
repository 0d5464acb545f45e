// Tiny FNV-1a 32-bit hash (unsigned) for strings / buffers.
// Reference: http://www.isthe.com/chongo/tech/comp/fnv/

const encoder = new TextEncoder()

export function fnv1a32(input: string | Uint8Array): number {
  const data = typeof input === 'string' ? encoder.encode(input) : input
  let hash = 0x811c9dc5 >>> 0 // offset basis
  for (let i = 0; i < data.length; i++) {
    hash ^= data[i]!
    // 32-bit FNV prime 16777619
    hash = Math.imul(hash, 0x01000193) >>> 0
  }
  return hash >>> 0
}

export function hex32(n: number): string {
  return (n >>> 0).toString(16).padStart(8, '0')
}
