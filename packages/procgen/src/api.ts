/**
 * Generation API
 *
 * High-level entry point for room-layout generation.
 */

import {
  buildLayoutConfig,
  DEFAULT_LAYOUT_CONFIG,
  type LayoutConfig,
  LayoutError,
  LayoutSeedSchema,
  type RandomSource,
  SeededRandom,
  type ValidatedLayoutConfig,
} from "@roomforge/contracts";
import type { z } from "zod";
import { createRoomWalkPipeline } from "./generators/room-walk";
import type { DungeonLayout } from "./layout/dungeon-layout";
import type { PassMetricsCallback, TraceEvent } from "./pipeline/types";
import { createEmptyArtifact } from "./pipeline/types";
import { randomSeed } from "./seed";
import type { TileWriter } from "./tiles/tile-writer";

/**
 * Generation options
 */
export interface GenerateOptions {
  /** Seed for the built-in generator. Random when omitted. */
  readonly seed?: number;
  /**
   * Random source to draw from instead of a SeededRandom built from
   * `seed`. The seed is still recorded on the layout.
   */
  readonly rng?: RandomSource;
  /** Record trace events (default false) */
  readonly trace?: boolean;
  /** Paint the realized rooms into shared tile layers */
  readonly tileWriter?: TileWriter;
  /** Open every adjacent non-boss room pair (default true) */
  readonly connectAdjacent?: boolean;
  /** Leave unreachable rooms unrepaired. Debugging only. */
  readonly skipConnectivityRepair?: boolean;
  /**
   * Skip config validation before generation.
   * Default: false (validation is performed)
   */
  readonly skipValidation?: boolean;
  readonly onPassMetrics?: PassMetricsCallback;
}

export interface GenerateSuccess {
  readonly success: true;
  readonly layout: DungeonLayout;
  readonly trace: readonly TraceEvent[];
  readonly durationMs: number;
}

export interface GenerateFailure {
  readonly success: false;
  readonly error: LayoutError;
  readonly trace: readonly TraceEvent[];
  readonly durationMs: number;
}

/**
 * Discriminated union - use `if (result.success)` to narrow.
 */
export type GenerateResult = GenerateSuccess | GenerateFailure;

function describeIssues(
  error: z.ZodError,
): Array<{ path: string; message: string }> {
  return error.issues.map((issue) => ({
    path: issue.path.map(String).join("."),
    message: issue.message,
  }));
}

function failure(error: LayoutError): GenerateFailure {
  return { success: false, error, trace: [], durationMs: 0 };
}

type ResolvedInput =
  | {
      readonly ok: true;
      readonly config: ValidatedLayoutConfig;
      readonly seed: number;
    }
  | { readonly ok: false; readonly error: LayoutError };

function resolveInput(
  config: Partial<LayoutConfig>,
  options: GenerateOptions,
): ResolvedInput {
  const seed = options.seed ?? randomSeed();

  // Validate config by default (can be skipped for performance)
  if (options.skipValidation) {
    return { ok: true, config: { ...DEFAULT_LAYOUT_CONFIG, ...config }, seed };
  }

  const seedCheck = LayoutSeedSchema.safeParse(seed);
  if (!seedCheck.success) {
    return {
      ok: false,
      error: LayoutError.configInvalid(`Invalid seed: ${seed}`, {
        issues: describeIssues(seedCheck.error),
      }),
    };
  }

  const built = buildLayoutConfig(config);
  if (!built.isOk()) {
    const issues = describeIssues(built.error);
    const summary = issues.map((i) => `${i.path}: ${i.message}`).join("; ");
    return {
      ok: false,
      error: LayoutError.configInvalid(`Invalid configuration: ${summary}`, {
        issues,
      }),
    };
  }
  return { ok: true, config: built.value, seed: seedCheck.data };
}

/**
 * Generate a room layout.
 *
 * By default, validates the configuration before generation.
 * Use `skipValidation: true` for hot paths where config is known-valid.
 *
 * @example
 * ```typescript
 * const result = generate({ rows: 4, cols: 5 }, { seed: 1234 });
 * if (result.success) {
 *   console.log(dumpLayout(result.layout).join("\n"));
 * }
 * ```
 */
export function generate(
  config: Partial<LayoutConfig> = {},
  options: GenerateOptions = {},
): GenerateResult {
  const input = resolveInput(config, options);
  if (!input.ok) return failure(input.error);

  const pipeline = createRoomWalkPipeline({
    tileWriter: options.tileWriter,
    connectAdjacent: options.connectAdjacent,
    skipConnectivityRepair: options.skipConnectivityRepair,
  });

  const result = pipeline.runSync(
    createEmptyArtifact(),
    {
      config: input.config,
      rng: options.rng ?? new SeededRandom(input.seed),
      seed: input.seed,
      trace: options.trace,
    },
    { onPassMetrics: options.onPassMetrics },
  );

  if (!result.success) {
    const error = LayoutError.generationFailed(result.error.message);
    error.cause = result.error;
    return {
      success: false,
      error,
      trace: result.trace,
      durationMs: result.durationMs,
    };
  }

  return {
    success: true,
    layout: result.artifact.layout,
    trace: result.trace,
    durationMs: result.durationMs,
  };
}
