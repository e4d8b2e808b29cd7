/**
 * Short Code Generation
 *
 * Strategy: Random Base62
 * - Length: 6 characters by default (62^6 = ~5.6 × 10^10 combinations)
 * - Alphabet: 0-9a-zA-Z (62 URL-safe characters)
 * - Source: Web Crypto `getRandomValues`
 *
 * Short codes double as an unguessability boundary, so every character is
 * drawn from a cryptographically secure source and mapped without bias:
 * bytes at or above 248 (the largest multiple of 62 below 256) are thrown
 * away and redrawn.
 *
 * Uniqueness is not this module's concern; see ./resolver.ts.
 */

import { webcrypto } from "node:crypto";
import { SHORTCODE_CONFIG } from "../constants/index.js";

// =============================================================================
// TYPES
// =============================================================================

/**
 * Fills the given buffer with random bytes and returns it.
 * Must be cryptographically secure outside of tests.
 */
export type RandomSource = (bytes: Uint8Array) => Uint8Array;

/**
 * The random source threw, is unavailable, or returned unusable bytes.
 * Fatal for the call.
 */
export class RandomSourceError extends Error {
  constructor(cause: unknown) {
    super("secure random source unavailable", { cause });
    this.name = "RandomSourceError";
  }
}

// =============================================================================
// GENERATION
// =============================================================================

/** getRandomValues refuses requests larger than this */
const MAX_BYTES_PER_DRAW = 65_536;

/** Consecutive draws yielding no usable byte before the source is given up on */
const MAX_EMPTY_DRAWS = 16;

const ALPHABET_SIZE = SHORTCODE_CONFIG.ALPHABET.length;

/** Bytes below this map onto the alphabet with equal weight */
const UNBIASED_LIMIT = 256 - (256 % ALPHABET_SIZE);

export const secureRandomSource: RandomSource = (bytes) => webcrypto.getRandomValues(bytes);

/**
 * Generate a random Base62 short code.
 *
 * @param length - Number of characters; 0 yields ""
 * @param random - Byte source (default: Web Crypto)
 * @throws RangeError if length is negative or not an integer
 * @throws RandomSourceError if the byte source fails
 *
 * @example
 * ```ts
 * generateRandomCode();    // "aZ3k9Q"
 * generateRandomCode(10);  // "0bX7mPq2Lc"
 * ```
 */
export function generateRandomCode(
  length: number = SHORTCODE_CONFIG.DEFAULT_LENGTH,
  random: RandomSource = secureRandomSource
): string {
  if (!Number.isInteger(length) || length < 0) {
    throw new RangeError(`Short code length must be a non-negative integer, got ${length}`);
  }

  let code = "";
  let emptyDraws = 0;

  while (code.length < length) {
    const before = code.length;
    const bytes = draw(random, Math.min(length - code.length, MAX_BYTES_PER_DRAW));

    for (const byte of bytes) {
      if (byte >= UNBIASED_LIMIT) {
        continue;
      }
      code += SHORTCODE_CONFIG.ALPHABET[byte % ALPHABET_SIZE];
      if (code.length === length) {
        break;
      }
    }

    emptyDraws = code.length === before ? emptyDraws + 1 : 0;
    if (emptyDraws >= MAX_EMPTY_DRAWS) {
      throw new RandomSourceError(new Error(`no usable bytes in ${MAX_EMPTY_DRAWS} draws`));
    }
  }

  return code;
}

function draw(random: RandomSource, count: number): Uint8Array {
  let bytes: Uint8Array;
  try {
    bytes = random(new Uint8Array(count));
  } catch (err) {
    throw new RandomSourceError(err);
  }

  if (bytes.length !== count) {
    throw new RandomSourceError(new Error(`expected ${count} random bytes, got ${bytes.length}`));
  }
  return bytes;
}

/**
 * Whether every character of the code belongs to the Base62 alphabet.
 */
export function isBase62(code: string): boolean {
  for (const char of code) {
    if (!SHORTCODE_CONFIG.ALPHABET.includes(char)) {
      return false;
    }
  }
  return true;
}
