/**
 * Room entity: one occupied grid cell's logical state.
 */

import {
  type Dimensions,
  DIRECTIONS,
  type Direction,
  type GridCoordinate,
  type Point,
} from "../core/geometry/types";
import type { TileGrid } from "../core/tiles/tile-grid";
import {
  applyDoorOverlay,
  compileRoomTiles,
  totalTileSize,
} from "../tiles/compiler";
import { createExitFlags, type ExitFlags, type RoomCategory } from "./types";

/**
 * Where a room sits on the tile lattice and in world space.
 */
export interface RoomGeometry {
  readonly interiorSize: Dimensions;
  /** Lattice pitch in tiles; at least interior + 2 on each axis */
  readonly roomSizeInTiles: Dimensions;
  /** World units per tile */
  readonly cellSize: number;
}

/**
 * A single room.
 *
 * Exits are mutable while the layout is being generated. After tiles are
 * realized only the runtime flags (`cleared`, `locked`, `playerInRoom`)
 * change, and locking never touches `exits`.
 *
 * @example
 * ```typescript
 * const room = new Room({ row: 1, col: 2 }, RoomCategory.NORMAL, geometry);
 * room.setExit(Direction.NORTH, true);
 * room.compile();
 * room.lock();   // doors over the north opening
 * room.unlock(); // back to the compiled tiles
 * ```
 */
export class Room {
  readonly coordinate: GridCoordinate;
  readonly interiorSize: Dimensions;
  /** Lattice anchor in tiles: (col x pitchX, row x pitchY) */
  readonly anchorTile: Point;
  /** Lattice anchor in world units */
  readonly worldAnchor: Point;
  /** World units per tile */
  readonly cellSize: number;

  category: RoomCategory;
  cleared = false;
  locked = false;
  playerInRoom = false;

  private readonly exitFlags: ExitFlags = createExitFlags();
  private readonly closures = new Set<Direction>();
  private compiled: TileGrid;
  private paintedOrigin: Point | undefined;

  constructor(
    coordinate: GridCoordinate,
    category: RoomCategory,
    geometry: RoomGeometry,
  ) {
    this.coordinate = coordinate;
    this.category = category;
    this.interiorSize = geometry.interiorSize;
    this.cellSize = geometry.cellSize;
    this.anchorTile = {
      x: coordinate.col * geometry.roomSizeInTiles.width,
      y: coordinate.row * geometry.roomSizeInTiles.height,
    };
    this.worldAnchor = {
      x: this.anchorTile.x * geometry.cellSize,
      y: this.anchorTile.y * geometry.cellSize,
    };
    this.compiled = compileRoomTiles(this.interiorSize, this.exitFlags);
  }

  // ===========================================================================
  // EXITS
  // ===========================================================================

  get exits(): Readonly<ExitFlags> {
    return this.exitFlags;
  }

  hasExit(direction: Direction): boolean {
    return this.exitFlags[direction];
  }

  /**
   * Set one exit flag. Opening a side closed by boss isolation is refused.
   * @returns whether the flag now has the requested value
   */
  setExit(direction: Direction, open: boolean): boolean {
    if (open && this.closures.has(direction)) return false;
    this.exitFlags[direction] = open;
    return true;
  }

  /**
   * Close a side for good. Later `setExit(direction, true)` calls fail.
   */
  closePermanently(direction: Direction): void {
    this.exitFlags[direction] = false;
    this.closures.add(direction);
  }

  isClosedToward(direction: Direction): boolean {
    return this.closures.has(direction);
  }

  openExits(): Direction[] {
    return DIRECTIONS.filter((direction) => this.exitFlags[direction]);
  }

  // ===========================================================================
  // TILES
  // ===========================================================================

  get totalSize(): Dimensions {
    return totalTileSize(this.interiorSize);
  }

  /**
   * World tile of the room's (0, 0) tile: the anchor minus half the room.
   */
  get tileOrigin(): Point {
    const total = this.totalSize;
    return {
      x: this.anchorTile.x - Math.floor(total.width / 2),
      y: this.anchorTile.y - Math.floor(total.height / 2),
    };
  }

  /**
   * World tile the room's (0, 0) tile was last painted at, if painted.
   */
  get realizedOrigin(): Point | undefined {
    return this.paintedOrigin;
  }

  markRealized(origin: Point): void {
    this.paintedOrigin = origin;
  }

  markUnrealized(): void {
    this.paintedOrigin = undefined;
  }

  /**
   * World position of the centre tile where it was painted. A room no
   * writer has painted is measured from its tile origin.
   */
  get realizedWorldCenter(): Point {
    const origin = this.paintedOrigin ?? this.tileOrigin;
    const total = this.totalSize;
    return {
      x: (origin.x + Math.floor(total.width / 2)) * this.cellSize,
      y: (origin.y + Math.floor(total.height / 2)) * this.cellSize,
    };
  }

  /**
   * Current tiles, including doors while locked.
   */
  get tiles(): TileGrid {
    return this.compiled;
  }

  /**
   * Recompile tiles from the current exits. A locked room keeps its doors.
   */
  compile(): TileGrid {
    this.compiled = compileRoomTiles(this.interiorSize, this.exitFlags);
    if (this.locked) {
      applyDoorOverlay(
        this.compiled,
        this.interiorSize,
        this.exitFlags,
        "locked",
      );
    }
    return this.compiled;
  }

  /**
   * @returns false when already locked
   */
  lock(): boolean {
    if (this.locked) return false;
    this.locked = true;
    applyDoorOverlay(
      this.compiled,
      this.interiorSize,
      this.exitFlags,
      "locked",
    );
    return true;
  }

  /**
   * @returns false when already unlocked
   */
  unlock(): boolean {
    if (!this.locked) return false;
    this.locked = false;
    applyDoorOverlay(this.compiled, this.interiorSize, this.exitFlags, "open");
    return true;
  }

  // ===========================================================================
  // RUNTIME LIFECYCLE
  // ===========================================================================

  /**
   * Player stepped in. Locks the room unless it is already cleared.
   * @returns false when the player was already inside
   */
  enter(): boolean {
    if (this.playerInRoom) return false;
    this.playerInRoom = true;
    if (!this.cleared) this.lock();
    return true;
  }

  /**
   * @returns false when the player was not inside
   */
  exit(): boolean {
    if (!this.playerInRoom) return false;
    this.playerInRoom = false;
    return true;
  }

  /**
   * Mark the room cleared and open its doors.
   * @returns false when it was already cleared
   */
  markCleared(): boolean {
    if (this.cleared) return false;
    this.cleared = true;
    this.unlock();
    return true;
  }
}
