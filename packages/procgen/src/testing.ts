/**
 * Testing utilities for layout generation.
 * Separated from validation.ts to avoid circular dependencies.
 *
 * This module depends on the generation API, which would create circular
 * imports if kept in validation.ts.
 */

import type { LayoutConfig } from "@roomforge/contracts";
import { generate } from "./api";

// =============================================================================
// DETERMINISM TESTING
// =============================================================================

/**
 * Error thrown when determinism assertion fails
 */
export class DeterminismViolationError extends Error {
  constructor(
    public readonly checksums: string[],
    public readonly seed: number,
  ) {
    super(
      "Non-deterministic generation detected: " +
        `produced ${checksums.length} different checksums for seed ${seed}`,
    );
    this.name = "DeterminismViolationError";
  }
}

function collectChecksums(
  config: Partial<LayoutConfig>,
  seed: number,
  runs: number,
): { checksums: string[]; durations: number[] } {
  const checksums: string[] = [];
  const durations: number[] = [];

  for (let i = 0; i < runs; i++) {
    // Later runs skip validation; the first run already checked the config
    const result = generate(config, { seed, skipValidation: i > 0 });
    if (!result.success) {
      throw new Error(
        `Generation failed on run ${i + 1}: ${result.error.message}`,
      );
    }
    checksums.push(result.layout.checksum);
    durations.push(result.durationMs);
  }

  return { checksums, durations };
}

/**
 * Assert that generation is deterministic for a seed.
 *
 * Use this in CI tests to catch determinism regressions.
 *
 * @throws {DeterminismViolationError} If runs produce different checksums
 *
 * @example
 * ```typescript
 * it("is deterministic", () => {
 *   assertDeterministic({ rows: 4, cols: 4 }, 12345);
 * });
 * ```
 */
export function assertDeterministic(
  config: Partial<LayoutConfig>,
  seed: number,
  runs: number = 3,
): void {
  const { checksums } = collectChecksums(config, seed, runs);
  const uniqueChecksums = [...new Set(checksums)];
  if (uniqueChecksums.length > 1) {
    throw new DeterminismViolationError(uniqueChecksums, seed);
  }
}

/**
 * Test determinism and return detailed results instead of throwing.
 */
export function testDeterminism(
  config: Partial<LayoutConfig>,
  seed: number,
  runs: number = 3,
): {
  deterministic: boolean;
  checksums: string[];
  uniqueChecksums: string[];
  avgDuration: number;
} {
  const { checksums, durations } = collectChecksums(config, seed, runs);
  const uniqueChecksums = [...new Set(checksums)];
  const totalDuration = durations.reduce((a, b) => a + b, 0);
  const avgDuration =
    durations.length > 0 ? totalDuration / durations.length : 0;

  return {
    deterministic: uniqueChecksums.length === 1,
    checksums,
    uniqueChecksums,
    avgDuration,
  };
}
