/**
 * Place Start Pass
 *
 * Puts the Start room in the middle cell, (floor(rows/2), floor(cols/2)).
 * Its exits stay closed; connect-adjacent opens them later.
 */

import type { LayoutStateArtifact, Pass } from "../../pipeline/types";
import { RoomCategory } from "../../rooms/types";

export function createPlaceStartPass(): Pass<
  LayoutStateArtifact,
  LayoutStateArtifact
> {
  const passId = "layout.place-start";

  return {
    id: passId,
    inputType: "layout-state",
    outputType: "layout-state",
    run(input, ctx) {
      const { grid } = input;
      const coord = {
        row: Math.floor(grid.rows / 2),
        col: Math.floor(grid.cols / 2),
      };
      const start = grid.place(coord, RoomCategory.START).getOrThrow();

      ctx.trace.decision(passId, {
        system: "allocation",
        question: "Start cell",
        options: [],
        chosen: coord,
        reason: "Middle cell of the grid",
        rngConsumed: 0,
      });

      return { ...input, start };
    },
  };
}
