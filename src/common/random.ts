import { randomBytes } from "node:crypto";
import seedrandom from "seedrandom";

/** Uniform generator over [0, 1). Every call advances its state. */
export interface RandomSource {
  next(): number;
}

const TWO_POW_26 = 67108864;
const TWO_POW_53 = 9007199254740992;
const POOL_DOUBLES = 512;

/**
 * Non-reproducible source backed by the OS CSPRNG. Bytes are read in pooled
 * blocks and every double carries 53 random bits.
 */
export class CryptoRandomSource implements RandomSource {
  private pool: Buffer = Buffer.alloc(0);
  private offset = 0;

  next(): number {
    if (this.offset + 8 > this.pool.length) {
      this.pool = randomBytes(POOL_DOUBLES * 8);
      this.offset = 0;
    }
    const high = this.pool.readUInt32BE(this.offset) >>> 5; // 27 bits
    const low = this.pool.readUInt32BE(this.offset + 4) >>> 6; // 26 bits
    this.offset += 8;
    return (high * TWO_POW_26 + low) / TWO_POW_53;
  }
}

/** Reproducible source: the same seed always yields the same sequence. */
export class SeededRandomSource implements RandomSource {
  readonly seed: string;
  private readonly prng: seedrandom.PRNG;

  constructor(seed: string | number) {
    this.seed = String(seed);
    this.prng = seedrandom(this.seed);
  }

  next(): number {
    return this.prng.double();
  }
}

let shared: RandomSource | undefined;

/** Process-wide crypto source used whenever a caller supplies none. */
export function defaultRandomSource(): RandomSource {
  if (shared === undefined) shared = new CryptoRandomSource();
  return shared;
}
