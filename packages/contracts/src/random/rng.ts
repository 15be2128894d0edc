/**
 * Helpers shared by every random source. Each takes a `next` function
 * returning a float in [0, 1).
 */

/**
 * Random integer between min and max (inclusive)
 * @param next - Float generator in [0, 1)
 */
export function range(next: () => number, min: number, max: number): number {
  return ~~(next() * (max - min + 1)) + min;
}

/**
 * Uniform pick from an array.
 * Returns undefined only when the array is empty.
 */
export function choice<T>(
  next: () => number,
  items: readonly [T, ...T[]],
): T;
export function choice<T>(
  next: () => number,
  items: readonly T[],
): T | undefined;
export function choice<T>(
  next: () => number,
  items: readonly T[],
): T | undefined {
  if (items.length === 0) return undefined;
  return items[range(next, 0, items.length - 1)];
}

/**
 * Fisher-Yates shuffle into a new array. The input is left untouched.
 */
export function shuffle<T>(next: () => number, items: readonly T[]): T[] {
  const result: T[] = Array.from(items);
  for (let i = result.length - 1; i > 0; i--) {
    const j = range(next, 0, i);
    const a = result[i];
    const b = result[j];
    if (a === undefined || b === undefined) continue;
    result[i] = b;
    result[j] = a;
  }
  return result;
}

/**
 * True with the given chance (0 to 1)
 */
export function probability(next: () => number, chance: number): boolean {
  return next() < chance;
}
