import { RoomCategory } from "@roomforge/procgen";
import { describe, expect, it } from "vitest";
import {
  behaviorFor,
  EncounterKind,
  RewardKind,
} from "../src/rooms/room-behavior";

describe("room behaviour table", () => {
  it("starts only the start room cleared", () => {
    expect(behaviorFor(RoomCategory.START).startsCleared).toBe(true);
    expect(behaviorFor(RoomCategory.NORMAL).startsCleared).toBe(false);
    expect(behaviorFor(RoomCategory.ITEM).startsCleared).toBe(false);
    expect(behaviorFor(RoomCategory.BOSS).startsCleared).toBe(false);
  });

  it("maps categories to encounters and rewards", () => {
    expect(behaviorFor(RoomCategory.START)).toEqual({
      startsCleared: true,
      encounter: EncounterKind.NONE,
      reward: RewardKind.NONE,
    });
    expect(behaviorFor(RoomCategory.NORMAL).encounter).toBe("wave");
    expect(behaviorFor(RoomCategory.ITEM).reward).toBe("item");
    expect(behaviorFor(RoomCategory.BOSS)).toEqual({
      startsCleared: false,
      encounter: "boss",
      reward: "floor-exit",
    });
  });
});
