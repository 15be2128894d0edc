/**
 * Tile values written by the tile compiler
 */
export const TileType = {
  FLOOR: 0,
  WALL: 1,
  /** Collidable door placed over an exit opening while a room is locked */
  DOOR: 2,
} as const;

export type TileType = (typeof TileType)[keyof typeof TileType];

export function isTileType(value: number): value is TileType {
  return (
    value === TileType.FLOOR ||
    value === TileType.WALL ||
    value === TileType.DOOR
  );
}
