/**
 * Encounter State Machine
 *
 * Sequences one room's fight:
 *
 * ```
 * Idle --entered--> Locking --tick--> SpawningWave --tick--> AwaitingClear
 *   |                                      |                       |
 *   +--(cleared)--> Unlocked <--(0 spawned)+---hostiles(0)---------+
 * ```
 *
 * Transitions that do not apply in the current state are no-ops and
 * return false.
 */

import type { Room } from "@roomforge/procgen";
import {
  EncounterKind,
  RewardKind,
  type RoomBehavior,
} from "../rooms/room-behavior";

export const EncounterState = {
  IDLE: "idle",
  LOCKING: "locking",
  SPAWNING_WAVE: "spawning-wave",
  AWAITING_CLEAR: "awaiting-clear",
  UNLOCKED: "unlocked",
} as const;

export type EncounterState =
  (typeof EncounterState)[keyof typeof EncounterState];

/**
 * Spawns the hostiles of a room. Supplied by the host.
 */
export interface EncounterSpawner {
  /** @returns number of hostiles spawned */
  spawnWave(room: Room, kind: EncounterKind): number;
  despawnAll(room: Room): void;
}

export interface RewardSpawner {
  spawnReward(room: Room, kind: RewardKind): void;
}

export class Encounter {
  private current: EncounterState = EncounterState.IDLE;

  constructor(
    readonly room: Room,
    readonly behavior: RoomBehavior,
    private readonly spawner: EncounterSpawner,
    private readonly rewards?: RewardSpawner,
  ) {}

  get state(): EncounterState {
    return this.current;
  }

  playerEntered(): boolean {
    if (this.current !== EncounterState.IDLE) return false;
    this.current = this.room.cleared
      ? EncounterState.UNLOCKED
      : EncounterState.LOCKING;
    return true;
  }

  /**
   * Advance one automatic step.
   */
  tick(): boolean {
    switch (this.current) {
      case EncounterState.LOCKING:
        this.room.lock();
        this.current = EncounterState.SPAWNING_WAVE;
        return true;

      case EncounterState.SPAWNING_WAVE: {
        const spawned =
          this.behavior.encounter === EncounterKind.NONE
            ? 0
            : this.spawner.spawnWave(this.room, this.behavior.encounter);
        if (spawned > 0) {
          this.current = EncounterState.AWAITING_CLEAR;
        } else {
          this.clear();
        }
        return true;
      }

      default:
        return false;
    }
  }

  hostilesRemaining(count: number): boolean {
    if (this.current !== EncounterState.AWAITING_CLEAR || count > 0) {
      return false;
    }
    this.clear();
    return true;
  }

  private clear(): void {
    this.room.markCleared();
    this.current = EncounterState.UNLOCKED;
    if (this.behavior.reward !== RewardKind.NONE) {
      this.rewards?.spawnReward(this.room, this.behavior.reward);
    }
  }
}
