/**
 * Pass, context and pipeline contracts.
 */

import type { RandomSource, ValidatedLayoutConfig } from "@roomforge/contracts";
import type { CountingRandom } from "../counting-random";
import type { Artifact } from "./artifacts";
import type { TraceCollector, TraceEvent } from "./trace";

// =============================================================================
// PASS CONTEXT
// =============================================================================

/**
 * Runtime context shared by every pass of one run.
 *
 * `rng` is the only source of randomness. Passes must not reach for
 * Math.random or build their own generator, or the same seed stops
 * reproducing the same layout.
 */
export interface PassContext {
  readonly rng: CountingRandom;
  readonly config: Readonly<ValidatedLayoutConfig>;
  readonly trace: TraceCollector;
  readonly seed: number;
}

// =============================================================================
// PASSES
// =============================================================================

/**
 * A pass transforms one artifact type into another. Passes are synchronous.
 */
export interface Pass<TIn extends Artifact, TOut extends Artifact> {
  readonly id: string;
  readonly inputType: TIn["type"];
  readonly outputType: TOut["type"];
  run(input: TIn, ctx: PassContext): TOut;
}

// =============================================================================
// PIPELINE
// =============================================================================

/**
 * Lightweight metrics collected after each pass.
 */
export interface PassMetrics {
  readonly passId: string;
  readonly passIndex: number;
  readonly durationMs: number;
  /** Rooms on the grid after this pass */
  readonly roomCount: number;
  /** Adjacent pairs open on both sides after this pass */
  readonly openEdgeCount: number;
}

export type PassMetricsCallback = (metrics: PassMetrics) => void;

export interface PipelineSuccess<T extends Artifact> {
  readonly success: true;
  readonly artifact: T;
  readonly trace: readonly TraceEvent[];
  readonly durationMs: number;
}

export interface PipelineFailure {
  readonly success: false;
  readonly error: Error;
  readonly trace: readonly TraceEvent[];
  readonly durationMs: number;
}

/**
 * Pipeline execution result. Use `if (result.success)` to narrow.
 */
export type PipelineResult<T extends Artifact> =
  | PipelineSuccess<T>
  | PipelineFailure;

export interface PipelineRunInput {
  readonly config: Readonly<ValidatedLayoutConfig>;
  readonly rng: RandomSource;
  readonly seed: number;
  /** Record trace events (default false) */
  readonly trace?: boolean;
}

export interface PipelineOptions {
  readonly onPassMetrics?: PassMetricsCallback;
}

export interface Pipeline<TStart extends Artifact, TEnd extends Artifact> {
  readonly id: string;
  /** Pass ids in execution order */
  readonly passIds: readonly string[];
  runSync(
    input: TStart,
    run: PipelineRunInput,
    options?: PipelineOptions,
  ): PipelineResult<TEnd>;
}
