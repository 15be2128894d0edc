import {
  DIRECTION_LABELS,
  DIRECTIONS,
  type Point,
} from "../core/geometry/types";
import type { Room } from "../rooms/room";
import type { DungeonLayout } from "./dungeon-layout";

const formatPoint = (p: Point): string =>
  `${p.x.toFixed(2)}, ${p.y.toFixed(2)}`;

/**
 * World position a room should sit at, from its coordinate and the
 * lattice pitch alone.
 */
export function expectedWorldPosition(
  layout: DungeonLayout,
  room: Room,
): Point {
  const { roomSizeInTiles, cellSize } = layout.config;
  return {
    x: room.coordinate.col * roomSizeInTiles.width * cellSize,
    y: room.coordinate.row * roomSizeInTiles.height * cellSize,
  };
}

export function formatRoomLine(layout: DungeonLayout, room: Room): string {
  const exits = DIRECTIONS.map(
    (d) => `${DIRECTION_LABELS[d]}:${room.hasExit(d)}`,
  ).join(" ");
  const { row, col } = room.coordinate;
  return (
    `[${row},${col}] ${room.category.toUpperCase()}: ` +
    `Expected(${formatPoint(expectedWorldPosition(layout, room))}) ` +
    `Actual(${formatPoint(room.realizedWorldCenter)}) ` +
    `Exits(${exits})`
  );
}

/**
 * One line per occupied cell, row-major. Actual comes from where the tile
 * writer painted the room, so a writer with an offset, or a room painted
 * away from its lattice anchor, shows up as a mismatch.
 *
 * @example
 * ```
 * [1,2] START: Expected(12.80, 4.80) Actual(12.80, 4.80)
 *   Exits(N:true S:false E:true W:true)
 * ```
 */
export function dumpLayout(layout: DungeonLayout): string[] {
  return layout.getAllRooms().map((room) => formatRoomLine(layout, room));
}
