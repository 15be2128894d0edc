/**
 * ASCII Layout Renderer
 *
 * Renders room maps and room tiles as ASCII art for debugging.
 *
 * @example
 * ```typescript
 * import { generate, renderLayoutAscii } from "@roomforge/procgen";
 *
 * const result = generate({}, { seed: 12345 });
 * if (result.success) {
 *   console.log(renderLayoutAscii(result.layout));
 * }
 * ```
 */

import type { TileGrid } from "../core/tiles/tile-grid";
import { TileType } from "../core/tiles/types";
import type { DungeonLayout } from "../layout/dungeon-layout";
import type { Room } from "../rooms/room";
import type { RoomCategory } from "../rooms/types";

// =============================================================================
// CONFIGURATION
// =============================================================================

/**
 * ASCII character mapping for rooms and tiles
 */
export interface AsciiCharset {
  readonly rooms: Readonly<Record<RoomCategory, string>>;
  readonly empty: string;
  readonly horizontalLink: string;
  readonly verticalLink: string;
  readonly wall: string;
  readonly floor: string;
  readonly door: string;
}

export const DEFAULT_CHARSET: AsciiCharset = {
  rooms: { start: "S", normal: "o", boss: "B", item: "I" },
  empty: ".",
  horizontalLink: "-",
  verticalLink: "|",
  wall: "#",
  floor: ".",
  door: "+",
};

export interface RenderOptions {
  readonly charset?: AsciiCharset;
  /** Color output (ANSI escape codes) */
  readonly useColors?: boolean;
}

// =============================================================================
// ANSI COLOR CODES
// =============================================================================

const ANSI = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
} as const;

function colorize(text: string, ...codes: string[]): string {
  return codes.join("") + text + ANSI.reset;
}

const CATEGORY_COLORS: Readonly<Record<RoomCategory, string>> = {
  start: ANSI.green,
  normal: ANSI.dim,
  boss: ANSI.red,
  item: ANSI.yellow,
};

// =============================================================================
// RENDER FUNCTIONS
// =============================================================================

function roomChar(
  room: Room | undefined,
  charset: AsciiCharset,
  useColors: boolean,
): string {
  if (!room) return charset.empty;
  const char = charset.rooms[room.category];
  return useColors
    ? colorize(char, ANSI.bold, CATEGORY_COLORS[room.category])
    : char;
}

/**
 * Draw the room map, north (highest row) at the top. Links between rooms
 * are drawn where the exit on the left or lower room is open.
 *
 * ```
 * o-B
 * |
 * S-o
 * ```
 */
export function renderLayoutAscii(
  layout: DungeonLayout,
  options: RenderOptions = {},
): string {
  const { charset = DEFAULT_CHARSET, useColors = false } = options;
  const lines: string[] = [];

  for (let row = layout.rows - 1; row >= 0; row--) {
    let cells = "";
    for (let col = 0; col < layout.cols; col++) {
      const room = layout.getRoomAt({ row, col });
      cells += roomChar(room, charset, useColors);
      if (col < layout.cols - 1) {
        cells += room?.hasExit("east") ? charset.horizontalLink : " ";
      }
    }
    lines.push(cells.trimEnd());

    if (row > 0) {
      let links = "";
      for (let col = 0; col < layout.cols; col++) {
        const room = layout.getRoomAt({ row, col });
        links += room?.hasExit("south") ? charset.verticalLink : " ";
        if (col < layout.cols - 1) links += " ";
      }
      lines.push(links.trimEnd());
    }
  }

  return lines.join("\n");
}

/**
 * Draw one room's tiles, north row first.
 */
export function renderTileGrid(
  tiles: TileGrid,
  options: RenderOptions = {},
): string {
  const { charset = DEFAULT_CHARSET, useColors = false } = options;
  const paint = (char: string, color: string): string =>
    useColors ? colorize(char, color) : char;
  return tiles
    .toRows()
    .map((row) =>
      row
        .map((tile) => {
          switch (tile) {
            case TileType.WALL:
              return paint(charset.wall, ANSI.blue);
            case TileType.DOOR:
              return paint(charset.door, ANSI.yellow);
            case TileType.FLOOR:
              return charset.floor;
          }
        })
        .join(""),
    )
    .join("\n");
}
