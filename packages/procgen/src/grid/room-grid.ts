/**
 * Grid Allocator
 *
 * Owns the rows x cols matrix of optional rooms and the pool of cells
 * not yet taken.
 */

import { Err, LayoutError, Ok, type Result } from "@roomforge/contracts";
import {
  coordKey,
  DIRECTIONS,
  type Direction,
  type GridCoordinate,
  OPPOSITE,
  step,
} from "../core/geometry/types";
import { Room, type RoomGeometry } from "../rooms/room";
import type { RoomCategory } from "../rooms/types";

export interface RoomNeighbor {
  /** Side of the queried cell the neighbour sits on */
  readonly direction: Direction;
  readonly room: Room;
}

/**
 * Fixed-size room grid.
 *
 * Rooms are stored row-major, and every enumeration (rooms, free cells,
 * neighbours) follows a stable order so that "first match" rules are
 * deterministic.
 */
export class RoomGrid {
  readonly rows: number;
  readonly cols: number;
  readonly geometry: RoomGeometry;
  private readonly cells: Array<Room | undefined>;
  private readonly available = new Set<string>();

  constructor(rows: number, cols: number, geometry: RoomGeometry) {
    if (rows <= 0 || cols <= 0) {
      throw new Error(`Invalid room grid dimensions: ${rows}x${cols}`);
    }
    this.rows = rows;
    this.cols = cols;
    this.geometry = geometry;
    this.cells = new Array<Room | undefined>(rows * cols).fill(undefined);

    for (let row = 0; row < rows; row++) {
      for (let col = 0; col < cols; col++) {
        this.available.add(coordKey({ row, col }));
      }
    }
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  isInBounds(coord: GridCoordinate): boolean {
    return (
      coord.row >= 0 &&
      coord.row < this.rows &&
      coord.col >= 0 &&
      coord.col < this.cols
    );
  }

  isAvailable(coord: GridCoordinate): boolean {
    return this.available.has(coordKey(coord));
  }

  get(coord: GridCoordinate): Room | undefined {
    if (!this.isInBounds(coord)) return undefined;
    return this.cells[coord.row * this.cols + coord.col];
  }

  /**
   * Occupied rooms, row-major
   */
  rooms(): Room[] {
    const result: Room[] = [];
    for (const room of this.cells) {
      if (room) result.push(room);
    }
    return result;
  }

  get roomCount(): number {
    return this.cells.length - this.available.size;
  }

  /**
   * Free cells, row-major
   */
  availableCells(): GridCoordinate[] {
    const result: GridCoordinate[] = [];
    for (let row = 0; row < this.rows; row++) {
      for (let col = 0; col < this.cols; col++) {
        if (this.available.has(coordKey({ row, col }))) {
          result.push({ row, col });
        }
      }
    }
    return result;
  }

  /**
   * Occupied neighbours in N, S, E, W order
   */
  neighbors(coord: GridCoordinate): RoomNeighbor[] {
    const result: RoomNeighbor[] = [];
    for (const direction of DIRECTIONS) {
      const room = this.get(step(coord, direction));
      if (room) result.push({ direction, room });
    }
    return result;
  }

  /**
   * Neighbours joined to `coord` by an open exit on both sides
   */
  connectedNeighbors(coord: GridCoordinate): RoomNeighbor[] {
    const self = this.get(coord);
    if (!self) return [];
    return this.neighbors(coord).filter(
      ({ direction, room }) =>
        self.hasExit(direction) && room.hasExit(OPPOSITE[direction]),
    );
  }

  /**
   * Directions whose adjacent cell is in bounds and still free
   */
  availableDirections(coord: GridCoordinate): Direction[] {
    return DIRECTIONS.filter((direction) => {
      const next = step(coord, direction);
      return this.isInBounds(next) && this.isAvailable(next);
    });
  }

  // ===========================================================================
  // MUTATION
  // ===========================================================================

  /**
   * Put a new room in a free cell. Takes the cell out of the free pool and
   * does nothing else: exits stay closed.
   */
  place(
    coord: GridCoordinate,
    category: RoomCategory,
  ): Result<Room, LayoutError> {
    if (!this.isInBounds(coord)) {
      return Err(LayoutError.outOfBounds(coord, this.rows, this.cols));
    }
    if (this.get(coord)) {
      return Err(LayoutError.cellOccupied(coord));
    }

    const { row, col } = coord;
    const room = new Room({ row, col }, category, this.geometry);
    this.cells[coord.row * this.cols + coord.col] = room;
    this.available.delete(coordKey(coord));
    return Ok(room);
  }

  /**
   * Open the exit pair between a room and its neighbour in `direction`.
   * Refused when there is no neighbour or either side is permanently closed.
   *
   * @returns true when both sides are open afterwards
   */
  connect(room: Room, direction: Direction): boolean {
    const neighbor = this.get(step(room.coordinate, direction));
    if (!neighbor) return false;
    const back = OPPOSITE[direction];
    if (room.isClosedToward(direction) || neighbor.isClosedToward(back)) {
      return false;
    }
    room.setExit(direction, true);
    neighbor.setExit(back, true);
    return true;
  }

  /**
   * Close the exit pair for good on both sides.
   */
  sever(room: Room, direction: Direction): void {
    room.closePermanently(direction);
    const neighbor = this.get(step(room.coordinate, direction));
    neighbor?.closePermanently(OPPOSITE[direction]);
  }

  /**
   * Count of adjacent pairs with both sides open
   */
  countOpenEdges(): number {
    let edges = 0;
    for (const room of this.rooms()) {
      for (const { direction } of this.connectedNeighbors(room.coordinate)) {
        // each edge is seen from both ends; count the north/east side only
        if (direction === "north" || direction === "east") edges++;
      }
    }
    return edges;
  }
}
