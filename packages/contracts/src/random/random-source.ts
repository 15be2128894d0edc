/**
 * The one randomness contract threaded through layout generation.
 *
 * Every random decision (direction shuffle, fallback pick, walk branch,
 * boss entrance, item room) draws from a single instance of this, so a
 * layout is fully determined by the source it was given.
 */
export interface RandomSource {
  /** Float in [0, 1) */
  next(): number;
  /** Integer in [min, max] */
  range(min: number, max: number): number;
  choice<T>(items: readonly [T, ...T[]]): T;
  choice<T>(items: readonly T[]): T | undefined;
  shuffle<T>(items: readonly T[]): T[];
  probability(chance: number): boolean;
}
