export interface TileSize {
  readonly width: number;
  readonly height: number;
}

/**
 * Generation-time parameters, supplied once per level.
 */
export interface LayoutConfig {
  /** Grid rows */
  readonly rows: number;
  /** Grid columns */
  readonly cols: number;
  /** Walkable tiles per room, excluding the wall ring */
  readonly interiorSize: TileSize;
  /** Lattice pitch between room anchors, in tiles */
  readonly roomSizeInTiles: TileSize;
  /** World units per tile */
  readonly cellSize: number;
  /** Rooms the random walk tries to attach besides Start */
  readonly targetFightRoomCount: number;
}

export const DEFAULT_LAYOUT_CONFIG: LayoutConfig = {
  rows: 3,
  cols: 4,
  interiorSize: { width: 14, height: 10 },
  roomSizeInTiles: { width: 16, height: 12 },
  cellSize: 0.4,
  targetFightRoomCount: 6,
};

/**
 * The only state persisted between sessions.
 */
export interface FloorProgress {
  readonly currentFloor: number;
}
