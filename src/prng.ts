import { InvalidSeedError } from "./errors.js";

/** A 64-bit signed integer seed. Numbers must be safe integers. */
export type Seed = bigint | number;

export const MIN_SEED = -(1n << 63n);
export const MAX_SEED = (1n << 63n) - 1n;

const TWO_POW_64 = 1n << 64n;
const MASK_64 = TWO_POW_64 - 1n;
const GOLDEN_GAMMA = 0x9e3779b97f4a7c15n;

export function toSeed(value: Seed): bigint {
  if (typeof value === "number") {
    if (!Number.isSafeInteger(value)) {
      throw new InvalidSeedError(String(value), "not a safe integer");
    }
    return BigInt(value);
  }
  if (value < MIN_SEED || value > MAX_SEED) {
    throw new InvalidSeedError(value.toString(), "outside the signed 64-bit range");
  }
  return value;
}

/** Parses a decimal seed such as "12345" or "-7". Returns undefined when it is not one. */
export function parseSeed(raw: string): bigint | undefined {
  const text = raw.trim();
  if (!/^[+-]?\d+$/.test(text)) return undefined;
  const value = BigInt(text);
  if (value < MIN_SEED || value > MAX_SEED) return undefined;
  return value;
}

/**
 * SplitMix64. The signed seed is reinterpreted as an unsigned 64-bit state;
 * each draw adds the golden gamma and mixes the result.
 */
export class Prng {
  private state: bigint;

  constructor(seed: Seed) {
    this.state = BigInt.asUintN(64, toSeed(seed));
  }

  nextUint64(): bigint {
    this.state = (this.state + GOLDEN_GAMMA) & MASK_64;
    let z = this.state;
    z = ((z ^ (z >> 30n)) * 0xbf58476d1ce4e5b9n) & MASK_64;
    z = ((z ^ (z >> 27n)) * 0x94d049bb133111ebn) & MASK_64;
    return z ^ (z >> 31n);
  }

  /** Uniform integer in [0, bound). Draws below 2^64 mod bound are rejected. */
  nextBelow(bound: number): number {
    if (!Number.isSafeInteger(bound) || bound <= 0) {
      throw new RangeError(`Bound must be a positive safe integer, got ${bound}`);
    }
    const n = BigInt(bound);
    const threshold = TWO_POW_64 % n;
    for (;;) {
      const draw = this.nextUint64();
      if (draw >= threshold) return Number(draw % n);
    }
  }
}
