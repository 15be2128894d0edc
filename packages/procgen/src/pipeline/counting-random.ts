import {
  choice,
  probability,
  type RandomSource,
  range,
  shuffle,
} from "@roomforge/contracts";

/**
 * Wraps the run's random source and counts `next()` draws, so trace
 * decisions can say how much randomness each choice consumed.
 *
 * Every helper goes through `next()`, which keeps the sequence identical
 * to calling the same helpers on a SeededRandom directly.
 */
export class CountingRandom implements RandomSource {
  private count = 0;

  constructor(private readonly source: RandomSource) {}

  get draws(): number {
    return this.count;
  }

  next(): number {
    this.count++;
    return this.source.next();
  }

  range(min: number, max: number): number {
    return range(() => this.next(), min, max);
  }

  choice<T>(items: readonly [T, ...T[]]): T;
  choice<T>(items: readonly T[]): T | undefined;
  choice<T>(items: readonly T[]): T | undefined {
    return choice(() => this.next(), items);
  }

  shuffle<T>(items: readonly T[]): T[] {
    return shuffle(() => this.next(), items);
  }

  probability(chance: number): boolean {
    return probability(() => this.next(), chance);
  }
}
