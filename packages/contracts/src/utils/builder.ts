import type { z } from "zod";
import {
  LayoutConfigSchema,
  MAX_GRID_DIMENSION,
  type ValidatedLayoutConfig,
} from "../schemas/layout";
import {
  DEFAULT_LAYOUT_CONFIG,
  type LayoutConfig,
  type TileSize,
} from "../types/layout";
import { Err, Ok, type Result } from "../types/result";

export type BuildConfigInput = Partial<LayoutConfig>;

function clampDimension(value: number): number {
  return Math.max(1, Math.min(Math.trunc(value), MAX_GRID_DIMENSION));
}

function clampRoomCount(rows: number, cols: number, roomCount: number): number {
  const maxRooms = rows * cols - 1;
  return Math.max(0, Math.min(Math.trunc(roomCount), maxRooms));
}

/**
 * Widen the lattice pitch so it always fits the interior plus its walls.
 */
function fitRoomPitch(interior: TileSize, pitch: TileSize): TileSize {
  return {
    width: Math.max(pitch.width, interior.width + 2),
    height: Math.max(pitch.height, interior.height + 2),
  };
}

/**
 * Fill defaults, clamp the grid and room count into range, then validate.
 *
 * Values that cannot be repaired by clamping (a non-positive cell size,
 * a fractional interior) still fail validation.
 *
 * @example
 * ```typescript
 * const res = buildLayoutConfig({
 *   rows: 5,
 *   cols: 5,
 *   targetFightRoomCount: 40,
 * });
 * if (res.success) res.value.targetFightRoomCount; // 24
 * ```
 */
export function buildLayoutConfig(
  input: BuildConfigInput = {},
): Result<ValidatedLayoutConfig, z.ZodError> {
  const rows = clampDimension(input.rows ?? DEFAULT_LAYOUT_CONFIG.rows);
  const cols = clampDimension(input.cols ?? DEFAULT_LAYOUT_CONFIG.cols);
  const interiorSize = input.interiorSize ?? DEFAULT_LAYOUT_CONFIG.interiorSize;
  const roomSizeInTiles = fitRoomPitch(
    interiorSize,
    input.roomSizeInTiles ?? DEFAULT_LAYOUT_CONFIG.roomSizeInTiles,
  );

  const candidate: LayoutConfig = {
    rows,
    cols,
    interiorSize,
    roomSizeInTiles,
    cellSize: input.cellSize ?? DEFAULT_LAYOUT_CONFIG.cellSize,
    targetFightRoomCount: clampRoomCount(
      rows,
      cols,
      input.targetFightRoomCount ?? DEFAULT_LAYOUT_CONFIG.targetFightRoomCount,
    ),
  };

  const parsed = LayoutConfigSchema.safeParse(candidate);
  if (!parsed.success) return Err(parsed.error);
  return Ok(parsed.data);
}
