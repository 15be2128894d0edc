/**
 * Pass Library
 *
 * The passes the layout pipeline is assembled from, grouped by concern.
 *
 * @example
 * ```typescript
 * import { passes, PipelineBuilder } from "@roomforge/procgen";
 *
 * const pipeline = PipelineBuilder.create<EmptyArtifact>("debug")
 *   .pipe(passes.common.createInitializeGridPass())
 *   .pipe(passes.common.createPlaceStartPass())
 *   .pipe(passes.connectivity.createRepairConnectivityPass())
 *   .build();
 * ```
 */

export * as boss from "./boss";
export * as common from "./common";
export * as connectivity from "./connectivity";
export * as growth from "./growth";
