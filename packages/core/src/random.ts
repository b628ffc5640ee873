// Deep Sea Adventure - Random Sources
//
// DETERMINISM REQUIREMENT:
// Every random decision in a session (dice, treasure draws) goes through an
// injected RandomSource. Given the same seed and the same decisions, a game
// always plays out identically, which is what GameSession.replay relies on.

import { createHash, randomBytes } from 'crypto';

// =============================================================================
// Types
// =============================================================================

export interface RandomSource {
  /** Integer in [0, maxExclusive) */
  nextInt(maxExclusive: number): number;
}

export const SEED_BYTES = 32;

const UINT64_RANGE = 1n << 64n;

// =============================================================================
// Seeded PRNG (xorshift128+)
// =============================================================================

/**
 * xorshift128+ over two 64-bit lanes. The lanes are read little-endian from
 * the first 16 bytes of the seed; the rest of the seed is unused.
 */
class XorShift128Plus implements RandomSource {
  private lo: bigint;
  private hi: bigint;

  constructor(seed: Uint8Array) {
    if (seed.length < SEED_BYTES) {
      throw new Error(`Seed must be at least ${SEED_BYTES} bytes`);
    }
    const view = new DataView(seed.buffer, seed.byteOffset, seed.byteLength);
    this.lo = view.getBigUint64(0, true);
    this.hi = view.getBigUint64(8, true);

    // An all-zero state is a fixed point
    if (this.lo === 0n && this.hi === 0n) {
      this.lo = 1n;
    }
  }

  private next64(): bigint {
    let x = this.lo;
    const y = this.hi;
    this.lo = y;
    x = BigInt.asUintN(64, x ^ (x << 23n));
    x = x ^ (x >> 17n) ^ y ^ (y >> 26n);
    this.hi = x;
    return BigInt.asUintN(64, x + y);
  }

  /**
   * Draws below the largest multiple of maxExclusive are accepted, so every
   * result is equally likely.
   */
  nextInt(maxExclusive: number): number {
    if (!Number.isInteger(maxExclusive) || maxExclusive <= 0) {
      throw new Error(`max must be a positive integer, got ${maxExclusive}`);
    }
    const bound = BigInt(maxExclusive);
    const limit = UINT64_RANGE - (UINT64_RANGE % bound);

    for (;;) {
      const draw = this.next64();
      if (draw < limit) {
        return Number(draw % bound);
      }
    }
  }
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Creates a deterministic random source from a 32-byte seed.
 */
export function createSeededRandom(seed: Uint8Array): RandomSource {
  return new XorShift128Plus(seed);
}

/** Non-deterministic source backed by Math.random */
export const mathRandom: RandomSource = {
  nextInt(maxExclusive) {
    return Math.floor(Math.random() * maxExclusive);
  },
};

/**
 * Derives a labelled 32-byte seed from a parent seed, so independent streams
 * (one per dive, say) never share state. The index is hashed as a 32-bit
 * big-endian integer after a zero byte that ends the label.
 */
export function deriveSeed(seed: Uint8Array, label: string, index: number): Uint8Array {
  if (!Number.isInteger(index) || index < 0 || index > 0xffffffff) {
    throw new Error(`Seed index must be an integer in [0, 2^32), got ${index}`);
  }
  const suffix = Buffer.alloc(5);
  suffix.writeUInt32BE(index, 1);

  const hash = createHash('sha256');
  hash.update(seed);
  hash.update(label);
  hash.update(suffix);
  return new Uint8Array(hash.digest());
}

/**
 * Creates a 32-byte seed from a hex string.
 */
export function seedFromHex(hex: string): Uint8Array {
  const cleanHex = hex.startsWith('0x') ? hex.slice(2) : hex;
  if (cleanHex.length !== SEED_BYTES * 2 || !/^[0-9a-fA-F]+$/.test(cleanHex)) {
    throw new Error(`Hex seed must be ${SEED_BYTES * 2} hex characters (${SEED_BYTES} bytes)`);
  }

  const bytes = new Uint8Array(SEED_BYTES);
  for (let i = 0; i < SEED_BYTES; i++) {
    bytes[i] = parseInt(cleanHex.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

export function seedToHex(seed: Uint8Array): string {
  return Buffer.from(seed).toString('hex');
}

/**
 * Generates a random 32-byte seed.
 * NOTE: not deterministic; use it to create new sessions, never inside one.
 */
export function generateRandomSeed(): Uint8Array {
  return new Uint8Array(randomBytes(SEED_BYTES));
}
