/**
 * Type-safe pipeline builder DSL.
 *
 * Composes passes into a pipeline with compile-time checking of the
 * artifact flow: a pass can only follow one whose output it accepts.
 */

import { CountingRandom } from "./counting-random";
import { createTraceCollector } from "./trace";
import {
  type Artifact,
  isLayoutStateArtifact,
  type Pass,
  type PassContext,
  type PassMetrics,
  type Pipeline,
  type PipelineFailure,
  type PipelineOptions,
  type PipelineResult,
  type PipelineRunInput,
  type TraceCollector,
} from "./types";

/**
 * Mutable bookkeeping for one run: which pass is executing, for error
 * reporting and metrics.
 */
class PipelineExecution {
  passIndex = -1;
  passId = "unknown";

  constructor(
    readonly ctx: PassContext,
    private readonly options: PipelineOptions | undefined,
  ) {}

  runPass<TIn extends Artifact, TOut extends Artifact>(
    pass: Pass<TIn, TOut>,
    input: TIn,
  ): TOut {
    this.passIndex++;
    this.passId = pass.id;

    this.ctx.trace.start(pass.id);
    const stepStart = performance.now();
    const output = pass.run(input, this.ctx);
    const stepDuration = performance.now() - stepStart;
    this.ctx.trace.end(pass.id, stepDuration);

    if (this.options?.onPassMetrics) {
      this.options.onPassMetrics(
        collectPassMetrics(output, pass.id, this.passIndex, stepDuration),
      );
    }

    return output;
  }
}

type Runner<TStart extends Artifact, TCurrent extends Artifact> = (
  input: TStart,
  execution: PipelineExecution,
) => TCurrent;

/**
 * Collect lightweight metrics from the current artifact.
 */
function collectPassMetrics(
  artifact: Artifact,
  passId: string,
  passIndex: number,
  durationMs: number,
): PassMetrics {
  if (!isLayoutStateArtifact(artifact)) {
    return { passId, passIndex, durationMs, roomCount: 0, openEdgeCount: 0 };
  }
  return {
    passId,
    passIndex,
    durationMs,
    roomCount: artifact.grid.roomCount,
    openEdgeCount: artifact.grid.countOpenEdges(),
  };
}

function buildErrorResult(
  error: unknown,
  execution: PipelineExecution,
  trace: TraceCollector,
  startTime: number,
): PipelineFailure {
  const originalError =
    error instanceof Error ? error : new Error(String(error));
  const enhancedError = new Error(
    `Pipeline failed at step ${execution.passIndex} ` +
      `(pass: ${execution.passId}): ${originalError.message}`,
  );
  enhancedError.cause = originalError;

  return {
    success: false,
    error: enhancedError,
    trace: trace.getEvents(),
    durationMs: performance.now() - startTime,
  };
}

/**
 * Pipeline builder for composing passes.
 *
 * Type parameters:
 * - TStart: The input artifact type for the pipeline
 * - TCurrent: The current output artifact type (evolves as passes are added)
 *
 * @example
 * ```typescript
 * const pipeline = PipelineBuilder.create<EmptyArtifact>("room-walk")
 *   .pipe(createInitializeGridPass())
 *   .pipe(createPlaceStartPass())
 *   .when(repair, createRepairConnectivityPass())
 *   .pipe(createFinalizePass())
 *   .build();
 * ```
 */
export class PipelineBuilder<
  TStart extends Artifact,
  TCurrent extends Artifact,
> {
  private constructor(
    private readonly id: string,
    private readonly passIds: readonly string[],
    private readonly runner: Runner<TStart, TCurrent>,
  ) {}

  static create<TStart extends Artifact>(
    id: string,
  ): PipelineBuilder<TStart, TStart> {
    return new PipelineBuilder<TStart, TStart>(id, [], (input) => input);
  }

  /**
   * Add a pass to the pipeline.
   */
  pipe<TNext extends Artifact>(
    pass: Pass<TCurrent, TNext>,
  ): PipelineBuilder<TStart, TNext> {
    const previous = this.runner;
    return new PipelineBuilder<TStart, TNext>(
      this.id,
      [...this.passIds, pass.id],
      (input, execution) => execution.runPass(pass, previous(input, execution)),
    );
  }

  /**
   * Add a pass only when `condition` holds. The pass must keep the
   * artifact type, so the chain types the same either way.
   */
  when(
    condition: boolean,
    pass: Pass<TCurrent, TCurrent>,
  ): PipelineBuilder<TStart, TCurrent> {
    return condition ? this.pipe(pass) : this;
  }

  build(): Pipeline<TStart, TCurrent> {
    const runner = this.runner;
    return {
      id: this.id,
      passIds: [...this.passIds],

      runSync(
        input: TStart,
        run: PipelineRunInput,
        options?: PipelineOptions,
      ): PipelineResult<TCurrent> {
        const startTime = performance.now();
        const trace = createTraceCollector(run.trace ?? false);
        const execution = new PipelineExecution(
          {
            rng: new CountingRandom(run.rng),
            config: run.config,
            trace,
            seed: run.seed,
          },
          options,
        );

        try {
          const artifact = runner(input, execution);
          return {
            success: true,
            artifact,
            trace: trace.getEvents(),
            durationMs: performance.now() - startTime,
          };
        } catch (error) {
          return buildErrorResult(error, execution, trace, startTime);
        }
      },
    };
  }
}

export function createPipeline<TStart extends Artifact>(
  id: string,
): PipelineBuilder<TStart, TStart> {
  return PipelineBuilder.create<TStart>(id);
}
