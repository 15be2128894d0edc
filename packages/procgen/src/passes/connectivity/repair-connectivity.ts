/**
 * Repair Connectivity Pass
 *
 * Finds rooms Start cannot reach without crossing the boss and opens a
 * wall between each of them and a reached neighbour. A repair can make
 * further rooms reachable, so the scan repeats until a round changes
 * nothing. Rooms still cut off afterwards are reported and left alone.
 */

import type { GridCoordinate } from "../../core/geometry/types";
import type { LayoutStateArtifact, Pass } from "../../pipeline/types";
import { RoomCategory } from "../../rooms/types";
import { reportDiagnostic } from "../common/diagnostics";
import { computeReachableRooms, findUnreachableRooms } from "./reachability";

const at = ({ row, col }: GridCoordinate): string => `[${row},${col}]`;

export function createRepairConnectivityPass(): Pass<
  LayoutStateArtifact,
  LayoutStateArtifact
> {
  const passId = "layout.repair-connectivity";

  return {
    id: passId,
    inputType: "layout-state",
    outputType: "layout-state",
    run(input, ctx) {
      const { grid, start } = input;
      if (!start) {
        throw new Error("repair-connectivity requires a placed start room");
      }

      let reached = computeReachableRooms(grid, start);
      let repairs = 0;
      let progress = true;

      while (progress) {
        progress = false;
        for (const room of findUnreachableRooms(grid, start)) {
          if (reached.has(room)) continue;

          const neighbors = grid.neighbors(room.coordinate);
          for (const { direction, room: neighbor } of neighbors) {
            if (neighbor.category === RoomCategory.BOSS) continue;
            if (!reached.has(neighbor)) continue;
            if (!grid.connect(room, direction)) continue;

            room.compile();
            neighbor.compile();
            repairs++;
            progress = true;
            reached = computeReachableRooms(grid, start);

            ctx.trace.decision(passId, {
              system: "connectivity",
              question: `Reconnect ${at(room.coordinate)}`,
              options: neighbors.map((n) => n.direction),
              chosen: direction,
              reason: `Opened toward reached room ${at(neighbor.coordinate)}`,
              rngConsumed: 0,
            });
            break;
          }
        }
      }

      let state = input;
      for (const room of findUnreachableRooms(grid, start)) {
        state = reportDiagnostic(
          state,
          ctx,
          passId,
          "REPAIR_IMPOSSIBLE",
          `Room ${at(room.coordinate)} has no reachable neighbour`,
          { row: room.coordinate.row, col: room.coordinate.col },
        );
      }

      ctx.trace.decision(passId, {
        system: "connectivity",
        question: "Reachability",
        options: [],
        chosen: reached.size,
        reason: `${repairs} repairs, ${reached.size} rooms reachable`,
        rngConsumed: 0,
      });

      return state;
    },
  };
}
