/**
 * Dungeon Layout
 *
 * The published result of a generation run: the room grid plus the
 * distinguished rooms, read through query methods.
 */

import type { ValidatedLayoutConfig } from "@roomforge/contracts";
import type { GridCoordinate } from "../core/geometry/types";
import type { RoomGrid } from "../grid/room-grid";
import type { LayoutDiagnostic } from "../pipeline/types/artifacts";
import type { Room } from "../rooms/room";
import { RoomCategory } from "../rooms/types";

export interface DungeonLayoutInit {
  readonly grid: RoomGrid;
  readonly config: Readonly<ValidatedLayoutConfig>;
  readonly seed: number;
  readonly checksum: string;
  readonly start?: Room;
  readonly boss?: Room;
  readonly item?: Room;
  readonly diagnostics?: readonly LayoutDiagnostic[];
}

export class DungeonLayout {
  readonly config: Readonly<ValidatedLayoutConfig>;
  readonly seed: number;
  readonly checksum: string;
  readonly diagnostics: readonly LayoutDiagnostic[];

  private readonly grid: RoomGrid;
  private readonly start: Room | undefined;
  private readonly boss: Room | undefined;
  private readonly item: Room | undefined;

  constructor(init: DungeonLayoutInit) {
    this.grid = init.grid;
    this.config = init.config;
    this.seed = init.seed;
    this.checksum = init.checksum;
    this.start = init.start;
    this.boss = init.boss;
    this.item = init.item;
    this.diagnostics = init.diagnostics ?? [];
  }

  get rows(): number {
    return this.grid.rows;
  }

  get cols(): number {
    return this.grid.cols;
  }

  /**
   * Cells with no room, row-major
   */
  get availableCells(): GridCoordinate[] {
    return this.grid.availableCells();
  }

  get roomGrid(): RoomGrid {
    return this.grid;
  }

  getStartRoom(): Room | undefined {
    return this.start;
  }

  getBossRoom(): Room | undefined {
    return this.boss;
  }

  getItemRoom(): Room | undefined {
    return this.item;
  }

  getRoomAt(coord: GridCoordinate): Room | undefined {
    return this.grid.get(coord);
  }

  getAllRooms(): Room[] {
    return this.grid.rooms();
  }

  getNormalRooms(): Room[] {
    return this.grid
      .rooms()
      .filter((room) => room.category === RoomCategory.NORMAL);
  }

  hasDiagnostic(code: LayoutDiagnostic["code"]): boolean {
    return this.diagnostics.some((d) => d.code === code);
  }
}
