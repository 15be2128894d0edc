/**
 * Isolate Boss Pass
 *
 * Picks the boss room, keeps one random entrance and seals every other
 * side for good, on both sides of each wall.
 *
 * Any room but Start can hold the boss. Rooms on the grid border win;
 * the farthest one from Start (by straight-line grid distance) is taken,
 * the first in row-major order on ties. A room left behind the sealed
 * boss is the repair pass's business.
 */

import { type GridCoordinate, gridDistance } from "../../core/geometry/types";
import type { RoomGrid, RoomNeighbor } from "../../grid/room-grid";
import type { LayoutStateArtifact, Pass } from "../../pipeline/types";
import type { Room } from "../../rooms/room";
import { RoomCategory } from "../../rooms/types";
import { reportDiagnostic } from "../common/diagnostics";

export function isBorderCell(
  grid: RoomGrid,
  coord: GridCoordinate,
): boolean {
  return (
    coord.row === 0 ||
    coord.row === grid.rows - 1 ||
    coord.col === 0 ||
    coord.col === grid.cols - 1
  );
}

/**
 * Farthest room from `origin`; the first one wins a tie.
 */
export function farthestRoom(
  rooms: readonly Room[],
  origin: GridCoordinate,
): Room | undefined {
  let best: Room | undefined;
  let bestDistance = -1;
  for (const room of rooms) {
    const distance = gridDistance(room.coordinate, origin);
    if (distance > bestDistance) {
      best = room;
      bestDistance = distance;
    }
  }
  return best;
}

export function selectBossRoom(
  grid: RoomGrid,
  start: Room,
): Room | undefined {
  const candidates = grid.rooms().filter((room) => room !== start);
  const border = candidates.filter((room) =>
    isBorderCell(grid, room.coordinate),
  );
  return farthestRoom(
    border.length > 0 ? border : candidates,
    start.coordinate,
  );
}

export function createIsolateBossPass(): Pass<
  LayoutStateArtifact,
  LayoutStateArtifact
> {
  const passId = "layout.isolate-boss";

  return {
    id: passId,
    inputType: "layout-state",
    outputType: "layout-state",
    run(input, ctx) {
      const { grid, start } = input;
      if (!start) {
        throw new Error("isolate-boss requires a placed start room");
      }

      const boss = selectBossRoom(grid, start);
      if (!boss) {
        return reportDiagnostic(
          input,
          ctx,
          passId,
          "INSUFFICIENT_ROOMS",
          "No room besides Start to hold the boss",
          { roomCount: grid.roomCount },
        );
      }

      boss.category = RoomCategory.BOSS;
      const [first, ...rest] = grid.neighbors(boss.coordinate);
      if (!first) {
        for (const direction of boss.openExits()) {
          boss.setExit(direction, false);
        }
        boss.compile();
        return reportDiagnostic(
          { ...input, boss },
          ctx,
          passId,
          "BOSS_HAS_NO_ADJACENT_ROOM",
          `Boss room [${boss.coordinate.row},${boss.coordinate.col}] ` +
            "has no neighbour",
        );
      }

      const neighbors: readonly [RoomNeighbor, ...RoomNeighbor[]] = [
        first,
        ...rest,
      ];
      const before = ctx.rng.draws;
      const entrance = ctx.rng.choice(neighbors);

      for (const neighbor of neighbors) {
        if (neighbor === entrance) {
          grid.connect(boss, neighbor.direction);
        } else {
          grid.sever(boss, neighbor.direction);
        }
        neighbor.room.compile();
      }
      // Sides facing empty cells lead nowhere.
      for (const direction of boss.openExits()) {
        if (direction !== entrance.direction) boss.setExit(direction, false);
      }
      boss.compile();

      const { row, col } = boss.coordinate;
      const distance = gridDistance(boss.coordinate, start.coordinate);
      ctx.trace.decision(passId, {
        system: "boss",
        question: "Boss entrance",
        options: neighbors.map(({ direction }) => direction),
        chosen: entrance.direction,
        reason: `Boss at [${row},${col}], ${distance.toFixed(2)} from start`,
        rngConsumed: ctx.rng.draws - before,
      });

      return { ...input, boss };
    },
  };
}
