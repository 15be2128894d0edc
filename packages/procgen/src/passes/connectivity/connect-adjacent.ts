/**
 * Connect Adjacent Pass
 *
 * Opens the exit pair between every two grid-adjacent rooms, leaving the
 * boss alone. Sides sealed by boss isolation stay sealed. This is also
 * where Start gets its exits.
 */

import type { LayoutStateArtifact, Pass } from "../../pipeline/types";
import { RoomCategory } from "../../rooms/types";

export function createConnectAdjacentPass(): Pass<
  LayoutStateArtifact,
  LayoutStateArtifact
> {
  const passId = "layout.connect-adjacent";

  return {
    id: passId,
    inputType: "layout-state",
    outputType: "layout-state",
    run(input, ctx) {
      const { grid } = input;
      const edgesBefore = grid.countOpenEdges();

      for (const room of grid.rooms()) {
        if (room.category === RoomCategory.BOSS) continue;
        const neighbors = grid.neighbors(room.coordinate);
        for (const { direction, room: neighbor } of neighbors) {
          if (neighbor.category === RoomCategory.BOSS) continue;
          grid.connect(room, direction);
        }
      }

      const edgesAfter = grid.countOpenEdges();
      const opened = edgesAfter - edgesBefore;
      ctx.trace.decision(passId, {
        system: "connectivity",
        question: "Connect adjacent rooms",
        options: [],
        chosen: opened,
        reason: `Opened ${opened} edges, ${edgesAfter} in total`,
        rngConsumed: 0,
      });

      return input;
    },
  };
}
