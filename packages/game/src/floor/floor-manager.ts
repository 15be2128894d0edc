/**
 * Floor Manager
 *
 * Owns the current floor: generates its layout, builds a controller per
 * room, moves the player between rooms and advances floors once the boss
 * is down.
 */

import { FloorProgressSchema, type LayoutConfig } from "@roomforge/contracts";
import {
  type DungeonLayout,
  dumpLayout,
  type GenerateResult,
  type GridCoordinate,
  generate,
  type Room,
  type TileWriter,
} from "@roomforge/procgen";
import type { EncounterSpawner, RewardSpawner } from "../encounter/encounter";
import type { RoomEventBus } from "../events/room-events";
import { RoomController } from "../rooms/room-controller";
import type { FloorProgressStore } from "./progress-store";

const DEV_MODE = process.env.NODE_ENV !== "production";

export const DEFAULT_MAX_FLOORS = 10;
export const DEFAULT_STARTING_FLOOR = 1;

// =============================================================================
// TYPES
// =============================================================================

export interface LayoutRequest {
  readonly floor: number;
  /** Absent when the floor should get a random seed */
  readonly seed?: number;
  readonly tileWriter: TileWriter;
}

export type LayoutGenerator = (request: LayoutRequest) => GenerateResult;

export interface FloorManagerDeps {
  readonly generateLayout: LayoutGenerator;
  readonly tileWriter: TileWriter;
  readonly events: RoomEventBus;
  readonly store: FloorProgressStore;
  readonly spawner: EncounterSpawner;
  readonly rewards?: RewardSpawner;
}

export interface FloorManagerOptions {
  readonly maxFloors?: number;
  readonly startingFloor?: number;
  /** Fixed seed per floor; random seeds when omitted */
  readonly seedForFloor?: (floor: number) => number;
}

export type NextFloorResult =
  | { readonly status: "blocked" }
  | {
      readonly status: "advanced";
      readonly floor: number;
      readonly layout: DungeonLayout;
    }
  | { readonly status: "completed"; readonly floors: number };

/**
 * Layout generator over `generate` with a fixed config.
 */
export function createLayoutGenerator(
  config: Partial<LayoutConfig> = {},
): LayoutGenerator {
  return ({ seed, tileWriter }) =>
    generate(
      config,
      seed === undefined ? { tileWriter } : { seed, tileWriter },
    );
}

// =============================================================================
// MANAGER
// =============================================================================

export class FloorManager {
  readonly maxFloors: number;
  private floor: number;
  private layout: DungeonLayout | undefined;
  private readonly controllers = new Map<Room, RoomController>();
  private playerRoom: Room | undefined;

  constructor(
    private readonly deps: FloorManagerDeps,
    private readonly options: FloorManagerOptions = {},
  ) {
    this.maxFloors = options.maxFloors ?? DEFAULT_MAX_FLOORS;
    this.floor = options.startingFloor ?? DEFAULT_STARTING_FLOOR;
  }

  get currentFloor(): number {
    return this.floor;
  }

  get currentLayout(): DungeonLayout | undefined {
    return this.layout;
  }

  get currentRoom(): Room | undefined {
    return this.playerRoom;
  }

  // ===========================================================================
  // FLOORS
  // ===========================================================================

  /**
   * Generate the current floor and put the player in its start room.
   *
   * @throws LayoutError when generation fails
   */
  startFloor(): DungeonLayout {
    return this.buildFloor();
  }

  /**
   * Move to the next floor. Refused until the floor is complete, unless
   * forced. On the last floor the game completes instead. Progress is
   * saved only once the new floor is built.
   *
   * @throws LayoutError when generation fails; the saved floor is kept
   */
  nextFloor(force = false): NextFloorResult {
    if (!force && !this.isFloorComplete()) return { status: "blocked" };

    if (this.floor >= this.maxFloors) {
      this.deps.events.emit("game.completed", { floors: this.floor });
      return { status: "completed", floors: this.floor };
    }

    this.floor++;
    this.deps.events.emit("floor.changed", { floor: this.floor });
    const layout = this.buildFloor();
    this.save();
    return { status: "advanced", floor: this.floor, layout };
  }

  /**
   * Throw the current floor away and generate it again.
   */
  recreateLevel(): DungeonLayout {
    return this.buildFloor();
  }

  /**
   * Despawn hostiles, erase tiles and drop the room controllers.
   */
  clearLayout(): void {
    for (const controller of this.controllers.values()) {
      controller.teardown();
    }
    this.controllers.clear();
    this.layout = undefined;
    this.playerRoom = undefined;
  }

  /**
   * Boss cleared, or every room cleared on a floor without a boss.
   */
  isFloorComplete(): boolean {
    if (!this.layout) return false;
    const boss = this.layout.getBossRoom();
    if (boss) return boss.cleared;
    return this.layout.getAllRooms().every((room) => room.cleared);
  }

  // ===========================================================================
  // ROOMS
  // ===========================================================================

  controllerAt(coord: GridCoordinate): RoomController | undefined {
    const room = this.layout?.getRoomAt(coord);
    return room ? this.controllers.get(room) : undefined;
  }

  /**
   * Player crossed into the room at `coord`.
   * @returns false when there is no room there or the player is already in it
   */
  enterRoom(coord: GridCoordinate): boolean {
    const next = this.controllerAt(coord);
    if (!next || next.room === this.playerRoom) return false;

    if (this.playerRoom) {
      this.controllers.get(this.playerRoom)?.playerExited();
    }
    this.playerRoom = next.room;
    return next.playerEntered();
  }

  /**
   * Advance every room's encounter one step.
   */
  tick(): void {
    for (const controller of this.controllers.values()) {
      controller.tick();
    }
  }

  // ===========================================================================
  // PERSISTENCE
  // ===========================================================================

  save(): void {
    this.deps.store.write({ currentFloor: this.floor });
  }

  /**
   * Restore the floor number. Invalid or missing data keeps the current
   * value.
   * @returns whether a saved floor was applied
   */
  load(): boolean {
    const data = this.deps.store.read();
    if (data === undefined) return false;

    const parsed = FloorProgressSchema.safeParse(data);
    if (!parsed.success || parsed.data.currentFloor > this.maxFloors) {
      if (DEV_MODE) {
        console.warn(
          "[floor] Ignoring invalid saved progress, " +
            `staying on floor ${this.floor}`,
        );
      }
      return false;
    }
    this.floor = parsed.data.currentFloor;
    return true;
  }

  dump(): string[] {
    return this.layout ? dumpLayout(this.layout) : [];
  }

  // ===========================================================================
  // INTERNAL
  // ===========================================================================

  private buildFloor(): DungeonLayout {
    this.clearLayout();

    const seed = this.options.seedForFloor?.(this.floor);
    const result = this.deps.generateLayout({
      floor: this.floor,
      tileWriter: this.deps.tileWriter,
      ...(seed === undefined ? {} : { seed }),
    });
    if (!result.success) throw result.error;

    const { layout } = result;
    this.layout = layout;
    for (const room of layout.getAllRooms()) {
      this.controllers.set(
        room,
        new RoomController(room, {
          tileWriter: this.deps.tileWriter,
          events: this.deps.events,
          spawner: this.deps.spawner,
          ...(this.deps.rewards ? { rewards: this.deps.rewards } : {}),
        }),
      );
    }

    this.deps.events.emit("floor.generated", { floor: this.floor, layout });

    const start = layout.getStartRoom();
    if (start) this.enterRoom(start.coordinate);
    return layout;
  }
}
