import { RoomCategory } from "@roomforge/procgen";
import { describe, expect, it } from "vitest";
import { RoomEventBus } from "../src/events/room-events";
import { createRoom } from "./helpers";

describe("RoomEventBus", () => {
  it("dispatches payloads to handlers in subscription order", () => {
    const events = new RoomEventBus();
    const calls: string[] = [];
    events.on("floor.changed", ({ floor }) => calls.push(`a${floor}`));
    events.on("floor.changed", ({ floor }) => calls.push(`b${floor}`));

    events.emit("floor.changed", { floor: 2 });

    expect(calls).toEqual(["a2", "b2"]);
  });

  it("only reaches handlers of the emitted type", () => {
    const events = new RoomEventBus();
    const room = createRoom(RoomCategory.NORMAL);
    const cleared: unknown[] = [];
    events.on("room.cleared", ({ room: r }) => cleared.push(r));

    events.emit("room.entered", { room });
    events.emit("room.cleared", { room });

    expect(cleared).toEqual([room]);
  });

  it("unsubscribes through the returned function", () => {
    const events = new RoomEventBus();
    let count = 0;
    const off = events.on("game.completed", () => count++);

    events.emit("game.completed", { floors: 10 });
    off();
    events.emit("game.completed", { floors: 10 });

    expect(count).toBe(1);
    expect(events.listenerCount("game.completed")).toBe(0);
  });

  it("runs once handlers a single time", () => {
    const events = new RoomEventBus();
    const floors: number[] = [];
    events.once("floor.changed", ({ floor }) => floors.push(floor));

    events.emit("floor.changed", { floor: 2 });
    events.emit("floor.changed", { floor: 3 });

    expect(floors).toEqual([2]);
  });

  it("keeps dispatching when a handler unsubscribes itself", () => {
    const events = new RoomEventBus();
    const calls: string[] = [];
    const off = events.on("floor.changed", () => {
      calls.push("first");
      off();
    });
    events.on("floor.changed", () => calls.push("second"));

    events.emit("floor.changed", { floor: 1 });

    expect(calls).toEqual(["first", "second"]);
  });

  it("drops every handler on clear", () => {
    const events = new RoomEventBus();
    events.on("floor.changed", () => undefined);
    events.on("room.exited", () => undefined);

    events.clear();

    expect(events.listenerCount("floor.changed")).toBe(0);
    expect(events.listenerCount("room.exited")).toBe(0);
  });
});
