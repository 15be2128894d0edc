/**
 * Pipeline Artifacts
 *
 * Typed data products handed from pass to pass.
 */

import type { LayoutErrorCode } from "@roomforge/contracts";
import type { RoomGrid } from "../../grid/room-grid";
import type { DungeonLayout } from "../../layout/dungeon-layout";
import type { Room } from "../../rooms/room";

// =============================================================================
// BASE ARTIFACT
// =============================================================================

/**
 * Base artifact interface. All artifacts have a type discriminant and a
 * unique ID.
 */
export interface Artifact<T extends string = string> {
  readonly type: T;
  readonly id: string;
}

// =============================================================================
// DIAGNOSTICS
// =============================================================================

/**
 * A degradation detected during generation. Recorded, never thrown.
 */
export interface LayoutDiagnostic {
  readonly code: LayoutErrorCode;
  readonly message: string;
  readonly severity: "warning" | "error";
  /** Pass that reported it */
  readonly passId: string;
  readonly details?: Record<string, unknown>;
}

/**
 * Validation violation
 */
export interface Violation {
  readonly type: string;
  readonly message: string;
  readonly severity: "error" | "warning";
}

// =============================================================================
// ARTIFACT TYPES
// =============================================================================

/**
 * Empty artifact - starting point for pipelines
 */
export interface EmptyArtifact extends Artifact<"empty"> {
  readonly type: "empty";
}

/**
 * Layout generation state - carries the grid and distinguished rooms
 * through every pass. The grid and its rooms are mutated in place; the
 * artifact itself is rebuilt when a reference or diagnostic changes.
 */
export interface LayoutStateArtifact extends Artifact<"layout-state"> {
  readonly type: "layout-state";
  readonly grid: RoomGrid;
  readonly start?: Room;
  readonly boss?: Room;
  readonly item?: Room;
  readonly diagnostics: readonly LayoutDiagnostic[];
}

/**
 * Final artifact - the published layout
 */
export interface LayoutArtifact extends Artifact<"layout"> {
  readonly type: "layout";
  readonly layout: DungeonLayout;
}

export type AnyArtifact = EmptyArtifact | LayoutStateArtifact | LayoutArtifact;

// =============================================================================
// FACTORY FUNCTIONS
// =============================================================================

export function createEmptyArtifact(): EmptyArtifact {
  return { type: "empty", id: "empty" };
}

export function createLayoutStateArtifact(
  grid: RoomGrid,
  id: string = "layout-state",
): LayoutStateArtifact {
  return { type: "layout-state", id, grid, diagnostics: [] };
}

export function isLayoutStateArtifact(
  artifact: Artifact,
): artifact is LayoutStateArtifact {
  return artifact.type === "layout-state";
}
