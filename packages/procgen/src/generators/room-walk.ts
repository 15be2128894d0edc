/**
 * Room-Walk Layout Generator
 *
 * Grows a room layout on a fixed grid by a random walk from a central
 * Start room, isolates a boss room behind a single entrance and repairs
 * reachability before the tiles are realized.
 */

import { PipelineBuilder } from "../pipeline/builder";
import type {
  EmptyArtifact,
  LayoutArtifact,
  Pipeline,
} from "../pipeline/types";
import {
  createAssignItemRoomPass,
  createIsolateBossPass,
} from "../passes/boss";
import {
  createFinalizePass,
  createInitializeGridPass,
  createPlaceStartPass,
  createRealizeTilesPass,
} from "../passes/common";
import {
  createConnectAdjacentPass,
  createRepairConnectivityPass,
} from "../passes/connectivity";
import { createGrowRoomsPass } from "../passes/growth";
import type { TileWriter } from "../tiles/tile-writer";

export interface RoomWalkPipelineOptions {
  /** Paint rooms into these layers once compiled */
  readonly tileWriter?: TileWriter;
  /** Open every adjacent non-boss pair (default true) */
  readonly connectAdjacent?: boolean;
  /** Leave unreachable rooms as they are (default false) */
  readonly skipConnectivityRepair?: boolean;
}

export const ROOM_WALK_PIPELINE_ID = "room-walk";

export function createRoomWalkPipeline(
  options: RoomWalkPipelineOptions = {},
): Pipeline<EmptyArtifact, LayoutArtifact> {
  return PipelineBuilder.create<EmptyArtifact>(ROOM_WALK_PIPELINE_ID)
    .pipe(createInitializeGridPass())
    .pipe(createPlaceStartPass())
    .pipe(createGrowRoomsPass())
    .pipe(createIsolateBossPass())
    .pipe(createAssignItemRoomPass())
    .when(options.connectAdjacent ?? true, createConnectAdjacentPass())
    .when(!options.skipConnectivityRepair, createRepairConnectivityPass())
    .pipe(createRealizeTilesPass(options.tileWriter))
    .pipe(createFinalizePass())
    .build();
}
