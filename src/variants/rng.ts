/** Rounds discarded after seeding so nearby seeds diverge */
const WARMUP_ROUNDS = 15;

/**
 * Small deterministic PRNG (sfc32) seeded from a 64-bit hex seed.
 *
 * Every selection draws from a fresh instance, so a given seed always produces
 * the same sequence.
 */
export class SeededRandom {
  private a: number;
  private b: number;
  private c: number;
  private d: number;

  constructor(seedHex: string) {
    const high = parseInt(seedHex.slice(0, 8), 16) >>> 0;
    const low = parseInt(seedHex.slice(8, 16), 16) >>> 0;
    this.a = high;
    this.b = low;
    this.c = (high ^ 0x9e3779b9) >>> 0;
    this.d = (low ^ 0x85ebca6b) >>> 0;

    for (let round = 0; round < WARMUP_ROUNDS; round++) {
      this.nextUint32();
    }
  }

  /** Uniform float in [0, 1) */
  next(): number {
    return this.nextUint32() / 4294967296;
  }

  /** Uniform integer in [0, maxExclusive) */
  nextInt(maxExclusive: number): number {
    return Math.floor(this.next() * maxExclusive);
  }

  private nextUint32(): number {
    let t = (this.a + this.b) | 0;
    this.a = this.b ^ (this.b >>> 9);
    this.b = (this.c + (this.c << 3)) | 0;
    this.c = (this.c << 21) | (this.c >>> 11);
    this.d = (this.d + 1) | 0;
    t = (t + this.d) | 0;
    this.c = (this.c + t) | 0;
    return t >>> 0;
  }
}
