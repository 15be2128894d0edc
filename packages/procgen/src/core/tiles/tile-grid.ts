/**
 * Flat tile grid for one room, stored in a Uint8Array.
 */

import type { Dimensions, Point } from "../geometry/types";
import { isTileType, TileType } from "./types";

const DEV_MODE = process.env.NODE_ENV !== "production";

/**
 * A room's tiles, indexed (x, y) with y = 0 on the south edge.
 *
 * @remarks
 * Internally mutable: the door overlay writes into it in place. Use
 * `clone()` before handing a grid to code that must not see later changes.
 */
export class TileGrid {
  readonly width: number;
  readonly height: number;
  private readonly data: Uint8Array;

  constructor(width: number, height: number, fill: TileType = TileType.FLOOR) {
    if (width <= 0 || height <= 0) {
      throw new Error(`Invalid tile grid dimensions: ${width}x${height}`);
    }

    this.width = width;
    this.height = height;
    this.data = new Uint8Array(width * height);

    if (fill !== TileType.FLOOR) {
      this.data.fill(fill);
    }
  }

  static fromDimensions(
    dim: Dimensions,
    fill: TileType = TileType.FLOOR,
  ): TileGrid {
    return new TileGrid(dim.width, dim.height, fill);
  }

  isInBounds(x: number, y: number): boolean {
    return x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  /**
   * Tile at (x, y); out of bounds reads as WALL
   */
  get(x: number, y: number): TileType {
    if (!this.isInBounds(x, y)) return TileType.WALL;
    const value = this.data[y * this.width + x] ?? TileType.WALL;
    return isTileType(value) ? value : TileType.WALL;
  }

  getAt(p: Point): TileType {
    return this.get(p.x, p.y);
  }

  set(x: number, y: number, value: TileType): void {
    if (!this.isInBounds(x, y)) {
      if (DEV_MODE) {
        console.warn(
          `TileGrid.set: out of bounds (${x}, ${y}) ` +
            `for grid ${this.width}x${this.height}`,
        );
      }
      return;
    }
    this.data[y * this.width + x] = value;
  }

  setAt(p: Point, value: TileType): void {
    this.set(p.x, p.y, value);
  }

  count(value: TileType): number {
    let total = 0;
    for (const tile of this.data) {
      if (tile === value) total++;
    }
    return total;
  }

  /**
   * Visit every tile, south row first
   */
  forEach(fn: (x: number, y: number, tile: TileType) => void): void {
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        fn(x, y, this.get(x, y));
      }
    }
  }

  equals(other: TileGrid): boolean {
    if (other.width !== this.width || other.height !== this.height) {
      return false;
    }
    const theirs = other.getRawDataCopy();
    for (let i = 0; i < this.data.length; i++) {
      if (this.data[i] !== theirs[i]) return false;
    }
    return true;
  }

  clone(): TileGrid {
    const copy = new TileGrid(this.width, this.height);
    copy.data.set(this.data);
    return copy;
  }

  getRawDataCopy(): Uint8Array {
    return new Uint8Array(this.data);
  }

  /**
   * Rows as arrays, north row first, for rendering.
   */
  toRows(): TileType[][] {
    const rows: TileType[][] = [];
    for (let y = this.height - 1; y >= 0; y--) {
      const row: TileType[] = [];
      for (let x = 0; x < this.width; x++) {
        row.push(this.get(x, y));
      }
      rows.push(row);
    }
    return rows;
  }
}
