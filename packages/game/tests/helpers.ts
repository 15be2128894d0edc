import {
  MemoryTileLayer,
  Room,
  type RoomCategory,
  TileWriter,
} from "@roomforge/procgen";
import type {
  EncounterSpawner,
  RewardSpawner,
} from "../src/encounter/encounter";
import type { EncounterKind, RewardKind } from "../src/rooms/room-behavior";

export const GEOMETRY = {
  interiorSize: { width: 2, height: 2 },
  roomSizeInTiles: { width: 4, height: 4 },
  cellSize: 1,
};

/**
 * Spawns a fixed number of hostiles per wave and records every call.
 */
export class FakeSpawner implements EncounterSpawner, RewardSpawner {
  readonly waves: Array<{ room: Room; kind: EncounterKind }> = [];
  readonly despawned: Room[] = [];
  readonly rewards: Array<{ room: Room; kind: RewardKind }> = [];

  constructor(private readonly waveSize = 3) {}

  spawnWave(room: Room, kind: EncounterKind): number {
    this.waves.push({ room, kind });
    return this.waveSize;
  }

  despawnAll(room: Room): void {
    this.despawned.push(room);
  }

  spawnReward(room: Room, kind: RewardKind): void {
    this.rewards.push({ room, kind });
  }
}

export function createWriter() {
  const floor = new MemoryTileLayer();
  const walls = new MemoryTileLayer();
  const palette = { floor: "F", wall: "W", door: "D" };
  return { floor, walls, writer: new TileWriter({ floor, walls }, palette) };
}

/**
 * Lone room at (0, 0) with an east exit, compiled. Its east opening sits
 * on world tiles (1, -1) and (1, 0).
 */
export function createRoom(category: RoomCategory): Room {
  const room = new Room({ row: 0, col: 0 }, category, GEOMETRY);
  room.setExit("east", true);
  room.compile();
  return room;
}
