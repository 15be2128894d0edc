/**
 * Pipeline builder and execution tests
 */

import { SeededRandom } from "@roomforge/contracts";
import { describe, expect, it } from "vitest";
import { createPipeline, PipelineBuilder } from "../src/pipeline/builder";
import { CountingRandom } from "../src/pipeline/counting-random";
import {
  createTraceCollector,
  DefaultTraceCollector,
  NoOpTraceCollector,
} from "../src/pipeline/trace";
import type {
  EmptyArtifact,
  LayoutStateArtifact,
  Pass,
  PassMetrics,
  PipelineRunInput,
} from "../src/pipeline/types";
import {
  createEmptyArtifact,
  createLayoutStateArtifact,
} from "../src/pipeline/types";
import { RoomCategory } from "../src/rooms/types";
import { createGrid, testConfig } from "./helpers";

function runInput(
  overrides: Partial<PipelineRunInput> = {},
): PipelineRunInput {
  return {
    config: testConfig(),
    rng: new SeededRandom(42),
    seed: 42,
    ...overrides,
  };
}

const gridPass: Pass<EmptyArtifact, LayoutStateArtifact> = {
  id: "test.grid",
  inputType: "empty",
  outputType: "layout-state",
  run(_input, ctx) {
    const { rows, cols } = ctx.config;
    return createLayoutStateArtifact(createGrid(rows, cols));
  },
};

function placePass(
  id: string,
  row: number,
  col: number,
): Pass<LayoutStateArtifact, LayoutStateArtifact> {
  return {
    id,
    inputType: "layout-state",
    outputType: "layout-state",
    run(input) {
      input.grid.place({ row, col }, RoomCategory.NORMAL).getOrThrow();
      return input;
    },
  };
}

describe("PipelineBuilder", () => {
  it("records pass ids in order", () => {
    const pipeline = PipelineBuilder.create<EmptyArtifact>("test")
      .pipe(gridPass)
      .pipe(placePass("test.a", 0, 0))
      .pipe(placePass("test.b", 0, 1))
      .build();

    expect(pipeline.id).toBe("test");
    expect(pipeline.passIds).toEqual(["test.grid", "test.a", "test.b"]);
  });

  it("skips a conditional pass when the condition is false", () => {
    const pipeline = createPipeline<EmptyArtifact>("test")
      .pipe(gridPass)
      .when(false, placePass("test.skipped", 0, 0))
      .when(true, placePass("test.kept", 0, 1))
      .build();

    expect(pipeline.passIds).toEqual(["test.grid", "test.kept"]);
    const result = pipeline.runSync(createEmptyArtifact(), runInput());
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.artifact.grid.roomCount).toBe(1);
    }
  });

  it("threads the artifact through every pass", () => {
    const pipeline = createPipeline<EmptyArtifact>("test")
      .pipe(gridPass)
      .pipe(placePass("test.a", 0, 0))
      .pipe(placePass("test.b", 2, 3))
      .build();

    const result = pipeline.runSync(createEmptyArtifact(), runInput());
    if (!result.success) throw result.error;
    expect(result.artifact.grid.rooms()).toHaveLength(2);
  });

  it("wraps a throwing pass with its step and id", () => {
    const pipeline = createPipeline<EmptyArtifact>("test")
      .pipe(gridPass)
      .pipe(placePass("test.a", 0, 0))
      .pipe(placePass("test.again", 0, 0))
      .build();

    const result = pipeline.runSync(createEmptyArtifact(), runInput());

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe(
        "Pipeline failed at step 2 (pass: test.again): " +
          "Cell [0,0] already holds a room",
      );
      expect(result.error.cause).toBeInstanceOf(Error);
    }
  });

  it("reports metrics after each pass", () => {
    const metrics: PassMetrics[] = [];
    const pipeline = createPipeline<EmptyArtifact>("test")
      .pipe(gridPass)
      .pipe(placePass("test.a", 0, 0))
      .build();

    pipeline.runSync(createEmptyArtifact(), runInput(), {
      onPassMetrics: (m) => metrics.push(m),
    });

    expect(
      metrics.map((m) => [m.passId, m.passIndex, m.roomCount, m.openEdgeCount]),
    ).toEqual([
      ["test.grid", 0, 0, 0],
      ["test.a", 1, 1, 0],
    ]);
  });

  it("emits start and end trace events when tracing", () => {
    const pipeline = createPipeline<EmptyArtifact>("test")
      .pipe(gridPass)
      .build();

    const traced = pipeline.runSync(
      createEmptyArtifact(),
      runInput({ trace: true }),
    );
    const silent = pipeline.runSync(createEmptyArtifact(), runInput());

    expect(traced.trace.map((e) => [e.passId, e.eventType])).toEqual([
      ["test.grid", "start"],
      ["test.grid", "end"],
    ]);
    expect(silent.trace).toEqual([]);
  });

  it("hands passes a counting wrapper over the run's random source", () => {
    let seen = -1;
    const drawPass: Pass<EmptyArtifact, EmptyArtifact> = {
      id: "test.draw",
      inputType: "empty",
      outputType: "empty",
      run(input, ctx) {
        ctx.rng.next();
        ctx.rng.shuffle([1, 2, 3]);
        seen = ctx.rng.draws;
        return input;
      },
    };

    createPipeline<EmptyArtifact>("test")
      .pipe(drawPass)
      .build()
      .runSync(createEmptyArtifact(), runInput());
    expect(seen).toBe(3);
  });
});

describe("CountingRandom", () => {
  it("reproduces the wrapped source's sequence", () => {
    const wrapped = new CountingRandom(new SeededRandom(9));
    const direct = new SeededRandom(9);

    expect([
      wrapped.next(),
      wrapped.range(0, 9),
      wrapped.shuffle(["a", "b", "c"]),
    ]).toEqual([
      direct.next(),
      direct.range(0, 9),
      direct.shuffle(["a", "b", "c"]),
    ]);
    expect(wrapped.draws).toBe(4);
  });

  it("draws nothing for a choice from an empty list", () => {
    const rng = new CountingRandom(new SeededRandom(9));
    expect(rng.choice([])).toBeUndefined();
    expect(rng.draws).toBe(0);
  });
});

describe("TraceCollector", () => {
  it("summarises decisions by system", () => {
    const trace = new DefaultTraceCollector(true);
    trace.decision("p", {
      system: "growth",
      question: "q",
      options: [],
      chosen: 1,
      reason: "r",
      rngConsumed: 2,
    });
    trace.decision("p", {
      system: "boss",
      question: "q",
      options: [],
      chosen: 1,
      reason: "r",
      rngConsumed: 1,
    });
    trace.warning("p", "careful");

    const stats = trace.getDecisionStats();
    expect(stats.totalDecisions).toBe(2);
    expect(stats.totalRngConsumed).toBe(3);
    expect(stats.bySystem.growth).toBe(1);
    expect(stats.bySystem.boss).toBe(1);
    expect(trace.getDecisionsBySystem("growth")).toHaveLength(1);
    expect(trace.getEvents()).toHaveLength(3);

    trace.clear();
    expect(trace.getEvents()).toEqual([]);
  });

  it("records nothing when disabled", () => {
    const trace = createTraceCollector(false);
    expect(trace).toBeInstanceOf(NoOpTraceCollector);
    trace.warning("p", "ignored");
    expect(trace.getEvents()).toEqual([]);
    expect(trace.getDecisionStats().totalDecisions).toBe(0);
  });
});
