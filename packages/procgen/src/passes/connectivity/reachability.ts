/**
 * Reachability over open exits.
 *
 * The walk starts at Start and never enters the Boss room, so a room only
 * counts as reachable when a path of open exit pairs avoids the boss.
 */

import { calculateBFSDistances } from "../../core/graph";
import type { RoomGrid } from "../../grid/room-grid";
import type { Room } from "../../rooms/room";
import { RoomCategory } from "../../rooms/types";

export function computeReachableRooms(grid: RoomGrid, start: Room): Set<Room> {
  const { distances } = calculateBFSDistances<Room>(start, (room) =>
    grid
      .connectedNeighbors(room.coordinate)
      .filter(({ room: neighbor }) => neighbor.category !== RoomCategory.BOSS)
      .map(({ room: neighbor }) => neighbor),
  );
  return new Set(distances.keys());
}

/**
 * Non-boss rooms Start cannot reach, row-major.
 */
export function findUnreachableRooms(grid: RoomGrid, start: Room): Room[] {
  const reached = computeReachableRooms(grid, start);
  return grid
    .rooms()
    .filter(
      (room) => room.category !== RoomCategory.BOSS && !reached.has(room),
    );
}
