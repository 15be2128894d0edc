/**
 * Procedural room-layout generation.
 *
 * Grows a dungeon floor as a graph of rooms on a fixed grid, isolates a
 * boss room behind one entrance and compiles each room into tiles.
 *
 * @example
 * ```typescript
 * import {
 *   createSeedFromString,
 *   dumpLayout,
 *   generate,
 * } from "@roomforge/procgen";
 *
 * const seed = createSeedFromString("floor-1");
 * const result = generate({ rows: 3, cols: 4 }, { seed });
 *
 * if (result.success) {
 *   console.log(dumpLayout(result.layout).join("\n"));
 * }
 * ```
 */

// Core modules
export * from "./core";
// Generators
export * from "./generators";
// Rooms and the grid they live on
export * from "./grid";
export * from "./layout";
export * from "./rooms";
export * from "./tiles";
// Pass Library
export * as passes from "./passes";
// Pipeline
export * from "./pipeline";
// Utilities
export * from "./utils";

// High-level API
export {
  type GenerateFailure,
  type GenerateOptions,
  type GenerateResult,
  type GenerateSuccess,
  generate,
} from "./api";
export { createSeed, createSeedFromString, randomSeed } from "./seed";
export {
  assertDeterministic,
  DeterminismViolationError,
  testDeterminism,
} from "./testing";
export {
  computeStats,
  type GenerationStats,
  hasFullRoster,
  type LayoutValidationResult,
  validateLayout,
} from "./validation";
