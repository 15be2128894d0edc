import type { Direction } from "../core/geometry/types";

/**
 * Room role tag. One Room type carries it; behaviour differences are
 * looked up by tag instead of subclassing.
 */
export const RoomCategory = {
  START: "start",
  NORMAL: "normal",
  BOSS: "boss",
  ITEM: "item",
} as const;

export type RoomCategory = (typeof RoomCategory)[keyof typeof RoomCategory];

/**
 * Whether each wall is carved open toward the neighbouring cell
 */
export type ExitFlags = Record<Direction, boolean>;

export function createExitFlags(open: Partial<ExitFlags> = {}): ExitFlags {
  return {
    north: open.north ?? false,
    south: open.south ?? false,
    east: open.east ?? false,
    west: open.west ?? false,
  };
}
