import { InvalidArgumentError } from "./errors.js";

/**
 * Maps a key to a bucket index. Must be pure, and must return an
 * integer in `[0, size)` for every key.
 */
export type HashFunction = (size: number, key: string) => number;

/** Fractional part of the golden ratio, used for multiplicative hashing. */
export const GOLDEN_RATIO_FRACTION = 0.6180339887;

/**
 * Code point of the first character, modulo the table size.
 * Keys sharing a first character always collide. An empty key maps to 0.
 */
export const hashNaive: HashFunction = (size, key) => {
  return (key.codePointAt(0) ?? 0) % size;
};

/**
 * Polynomial string hash (`h * 31 + c`, unsigned 32-bit) scaled into the
 * table with Knuth's multiplicative method: `floor(frac(h * A) * size)`.
 */
export const hashImproved: HashFunction = (size, key) => {
  let h = 0;
  for (const ch of key) {
    h = (Math.imul(h, 31) + (ch.codePointAt(0) ?? 0)) >>> 0;
  }

  const product = h * GOLDEN_RATIO_FRACTION;
  return Math.floor((product - Math.floor(product)) * size);
};

/**
 * djb2 (`h * 33 + c` starting from 5381, unsigned 32-bit), modulo the
 * table size.
 */
export const hashDjb2: HashFunction = (size, key) => {
  let h = 5381;
  for (const ch of key) {
    h = (Math.imul(h, 33) + (ch.codePointAt(0) ?? 0)) >>> 0;
  }
  return h % size;
};

export const hashFunctions = {
  naive: hashNaive,
  improved: hashImproved,
  djb2: hashDjb2,
} satisfies Record<string, HashFunction>;

export type HashFunctionName = keyof typeof hashFunctions;

export function isHashFunctionName(name: string): name is HashFunctionName {
  return Object.prototype.hasOwnProperty.call(hashFunctions, name);
}

/**
 * Look up one of the built-in hash functions by name.
 */
export function resolveHashFunction(name: string): HashFunction {
  if (!isHashFunctionName(name)) {
    throw new InvalidArgumentError(
      "hash function",
      name,
      `expected one of ${Object.keys(hashFunctions).join(", ")}`
    );
  }
  return hashFunctions[name];
}
