/**
 * Common Passes
 *
 * Passes shared by every layout pipeline.
 */

export { reportDiagnostic } from "./diagnostics";
export { createFinalizePass } from "./finalize";
export { createInitializeGridPass } from "./initialize-grid";
export { createPlaceStartPass } from "./place-start";
export { createRealizeTilesPass } from "./realize-tiles";
