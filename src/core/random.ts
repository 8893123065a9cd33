import { randomBytes, randomInt } from "crypto";

/**
 * Source of the random draws one iteration needs.
 * `int` bounds are inclusive on both ends.
 */
export interface RandomSource {
  int(min: number, max: number): number;
  bytes(size: number): Uint8Array;
  digits(length: number): string;
}

// Bytes at or above this value would bias `% 10`
const DIGIT_CUTOFF = 250;

/**
 * Turn a pool of random bytes into at most `length` decimal digits,
 * discarding bytes that would skew the distribution.
 */
export function bytesToDigits(pool: Uint8Array, length: number): string {
  let out = "";
  for (const byte of pool) {
    if (out.length >= length) break;
    if (byte < DIGIT_CUTOFF) {
      out += String(byte % 10);
    }
  }
  return out;
}

export const cryptoRandom: RandomSource = {
  int(min, max) {
    return randomInt(min, max + 1);
  },
  bytes(size) {
    return randomBytes(size);
  },
  digits(length) {
    // A single fixed-size draw; a short result is left for the caller to handle
    return bytesToDigits(randomBytes(length * 2), length);
  },
};
