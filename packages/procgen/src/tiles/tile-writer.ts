/**
 * Tile Writer
 *
 * Paints rooms into shared, world-addressed tile layers. The layers are
 * handed in by the caller, usually the host engine's tilemaps wrapped in
 * the `TileLayer` interface, or `MemoryTileLayer` for tooling and tests.
 */

import { Err, LayoutError, Ok, type Result } from "@roomforge/contracts";
import type { Point } from "../core/geometry/types";
import { TileType } from "../core/tiles/types";
import type { Room } from "../rooms/room";
import { openExitTiles } from "./compiler";

// =============================================================================
// LAYERS
// =============================================================================

/**
 * One world-addressed tile layer. `null` erases a tile.
 */
export interface TileLayer {
  setTile(x: number, y: number, asset: string | null): void;
  getTile(x: number, y: number): string | null;
}

export interface TileLayers {
  readonly floor: TileLayer;
  readonly walls: TileLayer;
}

export interface TilePalette {
  readonly floor?: string;
  readonly wall?: string;
  readonly door?: string;
}

/**
 * Sparse in-memory layer keyed by "x,y".
 */
export class MemoryTileLayer implements TileLayer {
  private readonly tiles = new Map<string, string>();

  setTile(x: number, y: number, asset: string | null): void {
    const key = `${x},${y}`;
    if (asset === null) {
      this.tiles.delete(key);
    } else {
      this.tiles.set(key, asset);
    }
  }

  getTile(x: number, y: number): string | null {
    return this.tiles.get(`${x},${y}`) ?? null;
  }

  get size(): number {
    return this.tiles.size;
  }

  clear(): void {
    this.tiles.clear();
  }
}

// =============================================================================
// WRITER
// =============================================================================

export interface TileWriterOptions {
  /**
   * World tile where the lattice's (0, 0) anchor lands on the layers.
   * Hosts whose tilemap origin is shifted pass it; defaults to (0, 0).
   */
  readonly offset?: Point;
}

interface ResolvedPalette {
  readonly floor: string;
  readonly wall: string;
  readonly door: string | undefined;
}

export class TileWriter {
  readonly offset: Point;

  constructor(
    readonly layers: TileLayers,
    readonly palette: TilePalette,
    options: TileWriterOptions = {},
  ) {
    this.offset = options.offset ?? { x: 0, y: 0 };
  }

  /**
   * Paint every tile of the room at `tileOrigin + offset + (x, y)` and
   * record that origin on the room. Nothing is written when the palette
   * lacks an asset the room needs.
   *
   * @returns number of tiles written
   */
  writeRoom(room: Room): Result<number, LayoutError> {
    const palette = this.resolvePalette(room);
    if (!palette.isOk()) return Err(palette.error);

    const origin = this.placementOf(room);
    let written = 0;
    room.tiles.forEach((x, y, tile) => {
      this.paint({ x: origin.x + x, y: origin.y + y }, tile, palette.value);
      written++;
    });
    room.markRealized(origin);
    return Ok(written);
  }

  /**
   * Erase every tile the room covers, on both layers.
   */
  clearRoom(room: Room): void {
    const origin = room.realizedOrigin ?? this.placementOf(room);
    const { width, height } = room.totalSize;
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        this.layers.floor.setTile(origin.x + x, origin.y + y, null);
        this.layers.walls.setTile(origin.x + x, origin.y + y, null);
      }
    }
    room.markUnrealized();
  }

  /**
   * Repaint only the exit openings, after the room was locked or unlocked.
   */
  syncDoors(room: Room): Result<number, LayoutError> {
    const palette = this.resolvePalette(room);
    if (!palette.isOk()) return Err(palette.error);

    const origin = room.realizedOrigin ?? this.placementOf(room);
    const openings = openExitTiles(room.interiorSize, room.exits);
    for (const { position } of openings) {
      this.paint(
        { x: origin.x + position.x, y: origin.y + position.y },
        room.tiles.getAt(position),
        palette.value,
      );
    }
    return Ok(openings.length);
  }

  private placementOf(room: Room): Point {
    const { x, y } = room.tileOrigin;
    return { x: x + this.offset.x, y: y + this.offset.y };
  }

  private paint(
    world: Point,
    tile: TileType,
    palette: ResolvedPalette,
  ): void {
    this.layers.floor.setTile(world.x, world.y, palette.floor);
    switch (tile) {
      case TileType.FLOOR:
        this.layers.walls.setTile(world.x, world.y, null);
        break;
      case TileType.WALL:
        this.layers.walls.setTile(world.x, world.y, palette.wall);
        break;
      case TileType.DOOR:
        this.layers.walls.setTile(world.x, world.y, palette.door ?? null);
        break;
    }
  }

  private resolvePalette(
    room: Room,
  ): Result<ResolvedPalette, LayoutError> {
    const { floor, wall, door } = this.palette;
    const missing: string[] = [];
    if (floor === undefined) missing.push("floor");
    if (wall === undefined) missing.push("wall");
    if (door === undefined && room.tiles.count(TileType.DOOR) > 0) {
      missing.push("door");
    }

    if (floor === undefined || wall === undefined || missing.length > 0) {
      const { row, col } = room.coordinate;
      return Err(
        new LayoutError(
          "MISSING_TILE_ASSET",
          `Palette has no ${missing.join(", ")} asset for room [${row},${col}]`,
          { row, col, missing },
        ),
      );
    }
    return Ok({ floor, wall, door });
  }
}
