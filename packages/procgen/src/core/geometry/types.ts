/**
 * Core geometry types for room-grid layouts.
 * All types are immutable value objects.
 */

/**
 * Tile or world position. Tiles use integer coordinates with y pointing up.
 */
export interface Point {
  readonly x: number;
  readonly y: number;
}

/**
 * Width and height, in tiles unless stated otherwise
 */
export interface Dimensions {
  readonly width: number;
  readonly height: number;
}

/**
 * Integer address of a cell in the room grid
 */
export interface GridCoordinate {
  readonly row: number;
  readonly col: number;
}

// =============================================================================
// DIRECTIONS
// =============================================================================

/**
 * The four exit sides of a room
 */
export const Direction = {
  NORTH: "north",
  SOUTH: "south",
  EAST: "east",
  WEST: "west",
} as const;

export type Direction = (typeof Direction)[keyof typeof Direction];

/**
 * Canonical enumeration order. Every "first match" rule scans in this order.
 */
export const DIRECTIONS: readonly [
  Direction,
  Direction,
  Direction,
  Direction,
] = [Direction.NORTH, Direction.SOUTH, Direction.EAST, Direction.WEST];

export const OPPOSITE: Readonly<Record<Direction, Direction>> = {
  north: "south",
  south: "north",
  east: "west",
  west: "east",
};

/**
 * Grid offsets. North grows the row index, matching the y-up tile axis.
 */
export const DIRECTION_DELTAS: Readonly<Record<Direction, GridCoordinate>> = {
  north: { row: 1, col: 0 },
  south: { row: -1, col: 0 },
  east: { row: 0, col: 1 },
  west: { row: 0, col: -1 },
};

/**
 * One-letter labels used by dumps and traces
 */
export const DIRECTION_LABELS: Readonly<Record<Direction, string>> = {
  north: "N",
  south: "S",
  east: "E",
  west: "W",
};

export function step(
  coord: GridCoordinate,
  direction: Direction,
): GridCoordinate {
  const delta = DIRECTION_DELTAS[direction];
  return { row: coord.row + delta.row, col: coord.col + delta.col };
}

export function coordKey(coord: GridCoordinate): string {
  return `${coord.row},${coord.col}`;
}

/**
 * Straight-line distance between two cells
 */
export function gridDistance(a: GridCoordinate, b: GridCoordinate): number {
  return Math.hypot(a.row - b.row, a.col - b.col);
}
