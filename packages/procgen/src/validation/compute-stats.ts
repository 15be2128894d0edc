import { calculateBFSDistances } from "../core/graph";
import type { DungeonLayout } from "../layout/dungeon-layout";
import type { Room } from "../rooms/room";
import { RoomCategory } from "../rooms/types";

/**
 * Generation statistics for analyzing layouts
 */
export interface GenerationStats {
  readonly roomCount: number;
  readonly roomTypeCounts: Readonly<Record<RoomCategory, number>>;
  readonly openEdgeCount: number;
  readonly avgExitsPerRoom: number;
  /** Rooms with exactly one exit */
  readonly deadEndCount: number;
  /** Occupied share of the grid, 0..1 */
  readonly gridFillRatio: number;
  /** Most hops from start to any room, boss included */
  readonly maxDepthFromStart: number;
  readonly diagnosticCount: number;
}

/**
 * Compute statistics for a generated layout
 */
export function computeStats(layout: DungeonLayout): GenerationStats {
  const rooms = layout.getAllRooms();
  const grid = layout.roomGrid;

  const roomTypeCounts: Record<RoomCategory, number> = {
    start: 0,
    normal: 0,
    boss: 0,
    item: 0,
  };
  let totalExits = 0;
  let deadEndCount = 0;
  for (const room of rooms) {
    roomTypeCounts[room.category]++;
    const exits = room.openExits().length;
    totalExits += exits;
    if (exits === 1) deadEndCount++;
  }

  const start = layout.getStartRoom();
  const maxDepthFromStart = start
    ? calculateBFSDistances<Room>(start, (room) =>
        grid
          .connectedNeighbors(room.coordinate)
          .map(({ room: neighbor }) => neighbor),
      ).maxDistance
    : 0;

  return {
    roomCount: rooms.length,
    roomTypeCounts,
    openEdgeCount: grid.countOpenEdges(),
    avgExitsPerRoom: rooms.length > 0 ? totalExits / rooms.length : 0,
    deadEndCount,
    gridFillRatio: rooms.length / (layout.rows * layout.cols),
    maxDepthFromStart,
    diagnosticCount: layout.diagnostics.length,
  };
}

/** True when the layout has at least one room of each gameplay role */
export function hasFullRoster(layout: DungeonLayout): boolean {
  return (
    layout.getStartRoom() !== undefined &&
    layout.getBossRoom() !== undefined &&
    layout.getItemRoom() !== undefined &&
    layout.getAllRooms().some((room) => room.category === RoomCategory.NORMAL)
  );
}
