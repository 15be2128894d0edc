/**
 * Seed Creation Utilities
 *
 * Layout seeds are plain uint32 values.
 */

import { LayoutError, randomUint32 } from "@roomforge/contracts";

/**
 * Create a layout seed from a numeric value. Fractions are truncated and
 * the result wraps into uint32 range.
 */
export function createSeed(input: number): number {
  if (!Number.isFinite(input)) {
    throw LayoutError.configInvalid(
      `Seed must be a finite number, got ${input}`,
    );
  }
  return Math.trunc(input) >>> 0;
}

/**
 * Create a layout seed from a string
 */
export function createSeedFromString(input: string): number {
  // DJB2 hash function for strings
  let hash = 5381;
  for (let i = 0; i < input.length; i++) {
    hash = ((hash << 5) + hash + input.charCodeAt(i)) >>> 0;
  }
  return createSeed(hash);
}

/**
 * Fresh seed from the platform's secure random source
 */
export function randomSeed(): number {
  return randomUint32();
}
