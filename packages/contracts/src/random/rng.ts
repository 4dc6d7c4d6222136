/**
 * Helpers that turn any uniform source into integers, choices and shuffles.
 */

/**
 * Anything that yields uniform doubles in [0, 1).
 */
export interface RandomSource {
  next(): number;
}

/**
 * Random integer between min and max (inclusive)
 */
export function range(source: RandomSource, min: number, max: number): number {
  return Math.floor(source.next() * (max - min + 1)) + min;
}

/**
 * Uniform index into a collection of `length` items.
 */
export function index(source: RandomSource, length: number): number {
  return range(source, 0, length - 1);
}

/**
 * Random element of an array, or undefined when the array is empty.
 */
export function choice<T>(source: RandomSource, array: readonly [T, ...T[]]): T;
export function choice<T>(source: RandomSource, array: readonly T[]): T | undefined;
export function choice<T>(source: RandomSource, array: readonly T[]): T | undefined {
  if (array.length === 0) return undefined;
  return array[index(source, array.length)];
}

/**
 * Fisher-Yates shuffle into a new array.
 */
export function shuffle<T>(source: RandomSource, array: readonly T[]): T[] {
  const result = Array.from(array);
  for (let i = result.length - 1; i > 0; i--) {
    const j = range(source, 0, i);
    const a = result[i];
    const b = result[j];
    if (a === undefined || b === undefined) continue;
    result[i] = b;
    result[j] = a;
  }
  return result;
}
