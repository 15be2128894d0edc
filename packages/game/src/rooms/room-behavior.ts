import { RoomCategory } from "@roomforge/procgen";

export const EncounterKind = {
  NONE: "none",
  WAVE: "wave",
  BOSS: "boss",
} as const;

export type EncounterKind = (typeof EncounterKind)[keyof typeof EncounterKind];

export const RewardKind = {
  NONE: "none",
  ITEM: "item",
  /** Teleporter to the next floor */
  FLOOR_EXIT: "floor-exit",
} as const;

export type RewardKind = (typeof RewardKind)[keyof typeof RewardKind];

export interface RoomBehavior {
  /** Room is cleared as soon as it is built */
  readonly startsCleared: boolean;
  readonly encounter: EncounterKind;
  /** Spawned once the room is cleared */
  readonly reward: RewardKind;
}

/**
 * What each room category does at runtime. Rooms share one class and look
 * their behaviour up here by category.
 */
export const ROOM_BEHAVIORS: Readonly<Record<RoomCategory, RoomBehavior>> = {
  [RoomCategory.START]: {
    startsCleared: true,
    encounter: EncounterKind.NONE,
    reward: RewardKind.NONE,
  },
  [RoomCategory.NORMAL]: {
    startsCleared: false,
    encounter: EncounterKind.WAVE,
    reward: RewardKind.NONE,
  },
  [RoomCategory.ITEM]: {
    startsCleared: false,
    encounter: EncounterKind.WAVE,
    reward: RewardKind.ITEM,
  },
  [RoomCategory.BOSS]: {
    startsCleared: false,
    encounter: EncounterKind.BOSS,
    reward: RewardKind.FLOOR_EXIT,
  },
};

export function behaviorFor(category: RoomCategory): RoomBehavior {
  return ROOM_BEHAVIORS[category];
}
