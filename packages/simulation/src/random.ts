/**
 * Seedable random source for the outcome simulator.
 *
 * xoshiro256** seeded through SplitMix64, with Box-Muller normals. Two
 * generators built from the same seed produce the same stream.
 */

const MASK_64 = 0xFFFFFFFFFFFFFFFFn

export class Rng {
  private readonly s: BigUint64Array
  private spareNormal: number | null = null

  constructor(seed: number = Date.now()) {
    this.s = new BigUint64Array(4)
    let x = BigInt(Math.trunc(seed)) & MASK_64
    for (let i = 0; i < 4; i++) {
      x = (x + 0x9E3779B97F4A7C15n) & MASK_64
      let z = x
      z = ((z ^ (z >> 30n)) * 0xBF58476D1CE4E5B9n) & MASK_64
      z = ((z ^ (z >> 27n)) * 0x94D049BB133111EBn) & MASK_64
      this.s[i] = z ^ (z >> 31n)
    }
  }

  /** Uniform in [0, 1) from the upper 53 bits. */
  next(): number {
    const s = this.s
    const result = (rotl((s[1]! * 5n) & MASK_64, 7n) * 9n) & MASK_64
    const t = (s[1]! << 17n) & MASK_64

    s[2] = s[2]! ^ s[0]!
    s[3] = s[3]! ^ s[1]!
    s[1] = s[1]! ^ s[2]!
    s[0] = s[0]! ^ s[3]!
    s[2] = s[2]! ^ t
    s[3] = rotl(s[3]!, 45n)

    return Number(result >> 11n) / 9007199254740992
  }

  /** Normal variate (polar Box-Muller); every second call uses the cached spare. */
  normal(mean: number = 0, stddev: number = 1): number {
    if (this.spareNormal !== null) {
      const val = this.spareNormal
      this.spareNormal = null
      return mean + stddev * val
    }

    let u: number, v: number, s: number
    do {
      u = 2 * this.next() - 1
      v = 2 * this.next() - 1
      s = u * u + v * v
    } while (s >= 1 || s === 0)

    const factor = Math.sqrt(-2 * Math.log(s) / s)
    this.spareNormal = v * factor
    return mean + stddev * u * factor
  }
}

function rotl(x: bigint, k: bigint): bigint {
  return ((x << k) | (x >> (64n - k))) & MASK_64
}
