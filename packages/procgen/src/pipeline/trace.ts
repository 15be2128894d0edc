/**
 * Trace collector implementation for debugging and observability.
 */

import type {
  DecisionStats,
  DecisionSystem,
  StructuredDecisionData,
  StructuredDecisionEvent,
  TraceCollector,
  TraceEvent,
  TraceEventType,
} from "./types";

export const DECISION_SYSTEMS: readonly DecisionSystem[] = [
  "allocation",
  "growth",
  "boss",
  "connectivity",
  "tiles",
];

function emptySystemCounts(): Record<DecisionSystem, number> {
  return { allocation: 0, growth: 0, boss: 0, connectivity: 0, tiles: 0 };
}

/**
 * Default trace collector implementation
 */
export class DefaultTraceCollector implements TraceCollector {
  readonly enabled: boolean;
  private readonly events: TraceEvent[] = [];
  private readonly decisions: StructuredDecisionEvent[] = [];
  private readonly startTime: number;

  constructor(enabled: boolean = false) {
    this.enabled = enabled;
    this.startTime = performance.now();
  }

  private emit(
    passId: string,
    eventType: TraceEventType,
    data?: unknown,
  ): void {
    if (!this.enabled) return;

    this.events.push({
      timestamp: performance.now() - this.startTime,
      passId,
      eventType,
      data,
    });
  }

  start(passId: string): void {
    this.emit(passId, "start");
  }

  end(passId: string, durationMs: number): void {
    this.emit(passId, "end", { durationMs });
  }

  decision(passId: string, data: StructuredDecisionData): void {
    if (!this.enabled) return;

    const event: StructuredDecisionEvent = {
      timestamp: performance.now() - this.startTime,
      passId,
      eventType: "decision",
      data,
    };

    this.events.push(event);
    this.decisions.push(event);
  }

  warning(passId: string, message: string): void {
    this.emit(passId, "warning", { message });
  }

  getEvents(): readonly TraceEvent[] {
    return this.events;
  }

  getDecisionsBySystem(
    system: DecisionSystem,
  ): readonly StructuredDecisionEvent[] {
    return this.decisions.filter((e) => e.data.system === system);
  }

  getDecisionStats(): DecisionStats {
    const bySystem = emptySystemCounts();
    let totalRngConsumed = 0;

    for (const event of this.decisions) {
      bySystem[event.data.system]++;
      totalRngConsumed += event.data.rngConsumed;
    }

    return {
      totalDecisions: this.decisions.length,
      bySystem,
      totalRngConsumed,
    };
  }

  clear(): void {
    this.events.length = 0;
    this.decisions.length = 0;
  }
}

/**
 * No-op trace collector for production
 */
export class NoOpTraceCollector implements TraceCollector {
  readonly enabled = false;

  start(_passId: string): void {}
  end(_passId: string, _durationMs: number): void {}
  decision(_passId: string, _data: StructuredDecisionData): void {}
  warning(_passId: string, _message: string): void {}
  getEvents(): readonly TraceEvent[] {
    return [];
  }
  getDecisionsBySystem(
    _system: DecisionSystem,
  ): readonly StructuredDecisionEvent[] {
    return [];
  }
  getDecisionStats(): DecisionStats {
    return {
      totalDecisions: 0,
      bySystem: emptySystemCounts(),
      totalRngConsumed: 0,
    };
  }
  clear(): void {}
}

export function createTraceCollector(enabled: boolean): TraceCollector {
  return enabled ? new DefaultTraceCollector(true) : new NoOpTraceCollector();
}

