import { randomBytes } from "node:crypto";
import { SeededRandom } from "./seeded-random";

/**
 * Unsigned 32-bit value from the system CSPRNG.
 */
export function randomUint32(): number {
  return randomBytes(4).readUInt32LE(0);
}

/**
 * Generator for one generation call: seeded from `seed` when given,
 * otherwise from the system source.
 */
export function createRandom(seed?: number): SeededRandom {
  return new SeededRandom(seed ?? randomUint32());
}
