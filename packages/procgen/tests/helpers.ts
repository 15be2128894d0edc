import {
  choice,
  DEFAULT_LAYOUT_CONFIG,
  probability,
  type RandomSource,
  range,
  SeededRandom,
  shuffle,
  type ValidatedLayoutConfig,
} from "@roomforge/contracts";
import { calculateLayoutChecksum } from "../src/core/hash";
import { RoomGrid } from "../src/grid/room-grid";
import { DungeonLayout } from "../src/layout/dungeon-layout";
import { CountingRandom } from "../src/pipeline/counting-random";
import { createTraceCollector } from "../src/pipeline/trace";
import {
  createLayoutStateArtifact,
  type LayoutStateArtifact,
  type PassContext,
} from "../src/pipeline/types";
import type { Room } from "../src/rooms/room";
import { RoomCategory } from "../src/rooms/types";

/**
 * Replays a fixed list of draws and fails loudly when it runs out.
 */
export class ScriptedRandom implements RandomSource {
  private index = 0;

  constructor(private readonly values: readonly number[]) {}

  get remaining(): number {
    return this.values.length - this.index;
  }

  next(): number {
    const value = this.values[this.index++];
    if (value === undefined) {
      throw new Error("ScriptedRandom ran out of values");
    }
    return value;
  }

  range(min: number, max: number): number {
    return range(() => this.next(), min, max);
  }

  choice<T>(items: readonly [T, ...T[]]): T;
  choice<T>(items: readonly T[]): T | undefined;
  choice<T>(items: readonly T[]): T | undefined {
    return choice(() => this.next(), items);
  }

  shuffle<T>(items: readonly T[]): T[] {
    return shuffle(() => this.next(), items);
  }

  probability(chance: number): boolean {
    return probability(() => this.next(), chance);
  }
}

export function testConfig(
  overrides: Partial<ValidatedLayoutConfig> = {},
): ValidatedLayoutConfig {
  return { ...DEFAULT_LAYOUT_CONFIG, ...overrides };
}

export function createContext(
  rng: RandomSource = new SeededRandom(1),
  config: ValidatedLayoutConfig = testConfig(),
): PassContext {
  return {
    rng: new CountingRandom(rng),
    config,
    trace: createTraceCollector(true),
    seed: 1,
  };
}

export function createGrid(
  rows: number,
  cols: number,
  config = testConfig(),
): RoomGrid {
  return new RoomGrid(rows, cols, {
    interiorSize: config.interiorSize,
    roomSizeInTiles: config.roomSizeInTiles,
    cellSize: config.cellSize,
  });
}

/**
 * Place rooms from [row, col, category] entries, in order
 */
export function placeRooms(
  grid: RoomGrid,
  entries: ReadonlyArray<readonly [number, number, RoomCategory]>,
): Room[] {
  return entries.map(([row, col, category]) =>
    grid.place({ row, col }, category).getOrThrow(),
  );
}

export function stateFor(
  grid: RoomGrid,
  rooms: Partial<Pick<LayoutStateArtifact, "start" | "boss" | "item">> = {},
): LayoutStateArtifact {
  return { ...createLayoutStateArtifact(grid), ...rooms };
}

export function layoutFor(
  grid: RoomGrid,
  config = testConfig(),
): DungeonLayout {
  const rooms = grid.rooms();
  return new DungeonLayout({
    grid,
    config,
    seed: 1,
    checksum: calculateLayoutChecksum(grid.rows, grid.cols, rooms),
    start: rooms.find((room) => room.category === RoomCategory.START),
    boss: rooms.find((room) => room.category === RoomCategory.BOSS),
    item: rooms.find((room) => room.category === RoomCategory.ITEM),
  });
}
