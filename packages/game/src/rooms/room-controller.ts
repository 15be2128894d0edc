import type { Room, TileWriter } from "@roomforge/procgen";
import {
  Encounter,
  type EncounterSpawner,
  type RewardSpawner,
} from "../encounter/encounter";
import type { RoomEventBus } from "../events/room-events";
import { behaviorFor } from "./room-behavior";

const DEV_MODE = process.env.NODE_ENV !== "production";

export interface RoomControllerDeps {
  readonly tileWriter: TileWriter;
  readonly events: RoomEventBus;
  readonly spawner: EncounterSpawner;
  readonly rewards?: RewardSpawner;
}

/**
 * Runtime driver for one realized room: forwards host reports to the
 * room's encounter, repaints doors when the lock state changes and
 * publishes room events.
 */
export class RoomController {
  readonly encounter: Encounter;

  constructor(
    readonly room: Room,
    private readonly deps: RoomControllerDeps,
  ) {
    const behavior = behaviorFor(room.category);
    if (behavior.startsCleared) room.markCleared();
    this.encounter = new Encounter(room, behavior, deps.spawner, deps.rewards);
  }

  playerEntered(): boolean {
    const wasLocked = this.room.locked;
    if (!this.room.enter()) return false;
    if (this.room.locked !== wasLocked) this.syncDoors();
    this.deps.events.emit("room.entered", { room: this.room });
    this.encounter.playerEntered();
    return true;
  }

  playerExited(): boolean {
    if (!this.room.exit()) return false;
    this.deps.events.emit("room.exited", { room: this.room });
    return true;
  }

  /**
   * Advance the encounter one step.
   */
  tick(): boolean {
    const wasLocked = this.room.locked;
    const wasCleared = this.room.cleared;
    if (!this.encounter.tick()) return false;
    if (this.room.locked !== wasLocked) this.syncDoors();
    if (!wasCleared && this.room.cleared) {
      this.deps.events.emit("room.cleared", { room: this.room });
    }
    return true;
  }

  /**
   * Host report of hostiles left alive. At zero the room is cleared and
   * its doors open.
   */
  reportHostilesRemaining(count: number): boolean {
    if (!this.encounter.hostilesRemaining(count)) return false;
    this.syncDoors();
    this.deps.events.emit("room.cleared", { room: this.room });
    return true;
  }

  /**
   * Remove the room's hostiles and erase its tiles.
   */
  teardown(): void {
    this.deps.spawner.despawnAll(this.room);
    this.deps.tileWriter.clearRoom(this.room);
  }

  private syncDoors(): void {
    const result = this.deps.tileWriter.syncDoors(this.room);
    if (result.isErr() && DEV_MODE) {
      console.warn(`[rooms] ${result.error.message}`);
    }
  }
}
