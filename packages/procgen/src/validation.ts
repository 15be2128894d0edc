/**
 * Layout Validation & Statistics
 *
 * Public facade for validation and statistics utilities.
 * For testing utilities (determinism checks), see testing.ts.
 */

export {
  computeStats,
  type GenerationStats,
  hasFullRoster,
} from "./validation/compute-stats";
export {
  type LayoutValidationResult,
  type ValidationFailure,
  type ValidationSuccess,
} from "./validation/result-types";
export { validateLayout } from "./validation/validate-layout";
