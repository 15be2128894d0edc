/**
 * Initialize Grid Pass
 *
 * Builds the empty rows x cols room grid every later pass writes into.
 */

import { RoomGrid } from "../../grid/room-grid";
import {
  createLayoutStateArtifact,
  type EmptyArtifact,
  type LayoutStateArtifact,
  type Pass,
} from "../../pipeline/types";

export function createInitializeGridPass(): Pass<
  EmptyArtifact,
  LayoutStateArtifact
> {
  const passId = "layout.initialize-grid";

  return {
    id: passId,
    inputType: "empty",
    outputType: "layout-state",
    run(_input, ctx) {
      const { rows, cols, interiorSize, roomSizeInTiles, cellSize } =
        ctx.config;
      const grid = new RoomGrid(rows, cols, {
        interiorSize,
        roomSizeInTiles,
        cellSize,
      });

      ctx.trace.decision(passId, {
        system: "allocation",
        question: "Grid size",
        options: [],
        chosen: { rows, cols },
        reason: `Created ${rows}x${cols} grid with ${rows * cols} free cells`,
        rngConsumed: 0,
      });

      return createLayoutStateArtifact(grid);
    },
  };
}
