/**
 * Pipeline Trace Types
 *
 * Types for tracing generation decisions and debugging.
 */

export type TraceEventType = "start" | "end" | "decision" | "warning";

/**
 * Decision system identifiers for structured tracing.
 */
export type DecisionSystem =
  | "allocation" // grid setup, start placement
  | "growth" // random-walk room attachment
  | "boss" // boss choice, entrance, item room
  | "connectivity" // adjacent connection, reachability repair
  | "tiles"; // compilation and realization

export interface StructuredDecisionData {
  readonly system: DecisionSystem;
  /** The question being answered */
  readonly question: string;
  readonly options: readonly unknown[];
  readonly chosen: unknown;
  /** Human-readable reason */
  readonly reason: string;
  /** Random draws consumed while deciding */
  readonly rngConsumed: number;
  readonly context?: Record<string, unknown>;
}

export interface TraceEvent {
  readonly timestamp: number;
  readonly passId: string;
  readonly eventType: TraceEventType;
  readonly data?: unknown;
}

export interface StructuredDecisionEvent extends TraceEvent {
  readonly eventType: "decision";
  readonly data: StructuredDecisionData;
}

export interface DecisionStats {
  readonly totalDecisions: number;
  readonly bySystem: Readonly<Record<DecisionSystem, number>>;
  readonly totalRngConsumed: number;
}

export interface TraceCollector {
  readonly enabled: boolean;
  start(passId: string): void;
  end(passId: string, durationMs: number): void;
  decision(passId: string, data: StructuredDecisionData): void;
  warning(passId: string, message: string): void;
  getEvents(): readonly TraceEvent[];
  getDecisionsBySystem(
    system: DecisionSystem,
  ): readonly StructuredDecisionEvent[];
  getDecisionStats(): DecisionStats;
  clear(): void;
}
