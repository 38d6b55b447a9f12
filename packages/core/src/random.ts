// Fleet Duel - Randomness
//
// The bot's fleet layout and its shots draw from a RandomSource. The default
// source is a seeded xorshift128+ generator, so a game seed reproduces the
// bot's behaviour exactly; tests pass fixed seeds.

import { randomBytes } from 'crypto';

// =============================================================================
// Types
// =============================================================================

export interface RandomSource {
  /** Uniform integer in [0, max) */
  nextInt(max: number): number;
}

/**
 * Internal state for xorshift128+ PRNG
 */
interface XorShiftState {
  s0: bigint;
  s1: bigint;
}

const MASK_64 = BigInt('0xFFFFFFFFFFFFFFFF');
export const SEED_BYTES = 32;

// =============================================================================
// Seeded PRNG (xorshift128+)
// =============================================================================

/**
 * Creates xorshift128+ state from a 32-byte seed.
 * Bytes 0-7 become s0, bytes 8-15 become s1.
 */
function createPrngState(seed: Uint8Array): XorShiftState {
  if (seed.length < SEED_BYTES) {
    throw new Error(`Seed must be at least ${SEED_BYTES} bytes`);
  }

  let s0 = BigInt(0);
  let s1 = BigInt(0);

  for (let i = 0; i < 8; i++) {
    s0 |= BigInt(seed[i]) << BigInt(i * 8);
  }
  for (let i = 0; i < 8; i++) {
    s1 |= BigInt(seed[i + 8]) << BigInt(i * 8);
  }

  // Ensure non-zero state
  if (s0 === BigInt(0) && s1 === BigInt(0)) {
    s0 = BigInt(1);
  }

  return { s0, s1 };
}

function nextRandom(state: XorShiftState): bigint {
  let s1 = state.s0;
  const s0 = state.s1;

  state.s0 = s0;
  s1 ^= (s1 << BigInt(23)) & MASK_64;
  s1 ^= s1 >> BigInt(17);
  s1 ^= s0;
  s1 ^= s0 >> BigInt(26);
  state.s1 = s1 & MASK_64;

  return (state.s0 + state.s1) & MASK_64;
}

/**
 * A RandomSource backed by xorshift128+.
 * Uses rejection sampling to avoid modulo bias.
 */
export class SeededRandom implements RandomSource {
  private readonly state: XorShiftState;

  constructor(seed: Uint8Array) {
    this.state = createPrngState(seed);
  }

  nextInt(max: number): number {
    if (!Number.isInteger(max) || max <= 0) {
      throw new Error('max must be a positive integer');
    }

    const maxBigInt = BigInt(max);
    const threshold = MASK_64 - (MASK_64 % maxBigInt);

    let rand: bigint;
    do {
      rand = nextRandom(this.state);
    } while (rand >= threshold);

    return Number(rand % maxBigInt);
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Picks one element uniformly.
 * @throws Error on an empty list
 */
export function pickOne<T>(random: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new Error('Cannot pick from an empty list');
  }
  return items[random.nextInt(items.length)];
}

/**
 * Creates a 32-byte seed from a hex string.
 */
export function seedFromHex(hex: string): Uint8Array {
  const cleanHex = hex.startsWith('0x') ? hex.slice(2) : hex;
  if (!/^[0-9a-fA-F]{64}$/.test(cleanHex)) {
    throw new Error('Hex seed must be 64 hex characters (32 bytes)');
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
 * Generates a fresh 32-byte seed from the OS entropy pool.
 */
export function generateRandomSeed(): Uint8Array {
  return new Uint8Array(randomBytes(SEED_BYTES));
}

export function createRandom(seed: Uint8Array = generateRandomSeed()): SeededRandom {
  return new SeededRandom(seed);
}
