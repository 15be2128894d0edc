/**
 * Room Tile Compiler
 *
 * Turns a room's interior size and exit flags into its wall/floor tiles,
 * and lays the door overlay used while a room is locked.
 *
 * Layout of a compiled room (interior 4x2, north and west open):
 *
 * ```
 *  # # . . # #    y = 3 (north edge)
 *  . . . . . #
 *  . . . . . #
 *  # # # # # #    y = 0 (south edge)
 * ```
 */

import type { Dimensions, Point } from "../core/geometry/types";
import { DIRECTIONS, type Direction } from "../core/geometry/types";
import { TileGrid } from "../core/tiles/tile-grid";
import { TileType } from "../core/tiles/types";
import type { ExitFlags } from "../rooms/types";

export type DoorState = "open" | "locked";

/**
 * Interior plus the one-tile wall ring
 */
export function totalTileSize(interior: Dimensions): Dimensions {
  return { width: interior.width + 2, height: interior.height + 2 };
}

/**
 * The two border tiles carved for an exit, centred on that side.
 *
 * @example
 * ```typescript
 * exitTilePositions({ width: 14, height: 10 }, Direction.NORTH);
 * // [{ x: 7, y: 11 }, { x: 8, y: 11 }]
 * ```
 */
export function exitTilePositions(
  interior: Dimensions,
  direction: Direction,
): readonly [Point, Point] {
  const total = totalTileSize(interior);
  const midX = Math.floor(total.width / 2);
  const midY = Math.floor(total.height / 2);
  const top = total.height - 1;
  const right = total.width - 1;

  switch (direction) {
    case "north":
      return [
        { x: midX - 1, y: top },
        { x: midX, y: top },
      ];
    case "south":
      return [
        { x: midX - 1, y: 0 },
        { x: midX, y: 0 },
      ];
    case "east":
      return [
        { x: right, y: midY - 1 },
        { x: right, y: midY },
      ];
    case "west":
      return [
        { x: 0, y: midY - 1 },
        { x: 0, y: midY },
      ];
  }
}

/**
 * Compile a room's tiles. Pure: equal inputs give equal grids.
 */
export function compileRoomTiles(
  interior: Dimensions,
  exits: Readonly<ExitFlags>,
): TileGrid {
  const total = totalTileSize(interior);
  const tiles = TileGrid.fromDimensions(total, TileType.FLOOR);

  for (let x = 0; x < total.width; x++) {
    tiles.set(x, 0, TileType.WALL);
    tiles.set(x, total.height - 1, TileType.WALL);
  }
  for (let y = 0; y < total.height; y++) {
    tiles.set(0, y, TileType.WALL);
    tiles.set(total.width - 1, y, TileType.WALL);
  }

  for (const direction of DIRECTIONS) {
    if (!exits[direction]) continue;
    for (const p of exitTilePositions(interior, direction)) {
      tiles.setAt(p, TileType.FLOOR);
    }
  }

  return tiles;
}

/**
 * Write DOOR (locked) or FLOOR (open) over every open exit, in place.
 * Closed sides are untouched, and exit flags are never read for writing.
 */
export function applyDoorOverlay(
  tiles: TileGrid,
  interior: Dimensions,
  exits: Readonly<ExitFlags>,
  state: DoorState,
): void {
  const value = state === "locked" ? TileType.DOOR : TileType.FLOOR;
  for (const direction of DIRECTIONS) {
    if (!exits[direction]) continue;
    for (const p of exitTilePositions(interior, direction)) {
      tiles.setAt(p, value);
    }
  }
}

/**
 * Every opening of a room as (direction, position) pairs, N/S/E/W order.
 */
export function openExitTiles(
  interior: Dimensions,
  exits: Readonly<ExitFlags>,
): Array<{ readonly direction: Direction; readonly position: Point }> {
  const result: Array<{ direction: Direction; position: Point }> = [];
  for (const direction of DIRECTIONS) {
    if (!exits[direction]) continue;
    for (const position of exitTilePositions(interior, direction)) {
      result.push({ direction, position });
    }
  }
  return result;
}
