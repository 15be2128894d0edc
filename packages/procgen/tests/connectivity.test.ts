import { describe, expect, it } from "vitest";
import { Direction } from "../src/core/geometry/types";
import {
  createConnectAdjacentPass,
} from "../src/passes/connectivity/connect-adjacent";
import {
  findUnreachableRooms,
} from "../src/passes/connectivity/reachability";
import {
  createRepairConnectivityPass,
} from "../src/passes/connectivity/repair-connectivity";
import { RoomCategory } from "../src/rooms/types";
import { createContext, createGrid, placeRooms, stateFor } from "./helpers";

const { START, NORMAL, BOSS } = RoomCategory;

describe("findUnreachableRooms", () => {
  it("finds a room with no open path from start", () => {
    const grid = createGrid(3, 3);
    const [start, right, corner] = placeRooms(grid, [
      [1, 1, START],
      [1, 2, NORMAL],
      [2, 2, NORMAL],
    ]);
    if (!start) throw new Error("no start");
    grid.connect(start, Direction.EAST);

    expect(findUnreachableRooms(grid, start)).toEqual([corner]);
    expect(findUnreachableRooms(grid, start)).not.toContain(right);
  });

  it("does not walk through the boss", () => {
    const grid = createGrid(1, 3);
    const [start, boss, beyond] = placeRooms(grid, [
      [0, 1, START],
      [0, 0, BOSS],
      [0, 2, NORMAL],
    ]);
    if (!start || !boss || !beyond) throw new Error("rooms not placed");
    grid.connect(start, Direction.WEST);

    expect(findUnreachableRooms(grid, start)).toEqual([beyond]);
  });
});

describe("repair-connectivity", () => {
  it("reconnects an unreachable room to a reached neighbour", () => {
    const grid = createGrid(3, 3);
    const [start, right, corner] = placeRooms(grid, [
      [1, 1, START],
      [1, 2, NORMAL],
      [2, 2, NORMAL],
    ]);
    if (!start) throw new Error("no start");
    grid.connect(start, Direction.EAST);
    expect(findUnreachableRooms(grid, start)).toEqual([corner]);

    const state = createRepairConnectivityPass().run(
      stateFor(grid, { start }),
      createContext(),
    );

    expect(corner?.openExits()).toEqual(["south"]);
    expect(right?.hasExit(Direction.NORTH)).toBe(true);
    expect(findUnreachableRooms(grid, start)).toEqual([]);
    expect(state.diagnostics).toEqual([]);
  });

  it("cascades through rooms reached by earlier repairs", () => {
    const grid = createGrid(1, 4);
    const [start, near, far] = placeRooms(grid, [
      [0, 2, START],
      [0, 1, NORMAL],
      [0, 0, NORMAL],
    ]);
    if (!start) throw new Error("no start");
    const ctx = createContext();
    expect(findUnreachableRooms(grid, start)).toEqual([far, near]);

    createRepairConnectivityPass().run(stateFor(grid, { start }), ctx);

    expect(near?.openExits()).toEqual(["east", "west"]);
    expect(far?.openExits()).toEqual(["east"]);
    expect(findUnreachableRooms(grid, start)).toEqual([]);
    const reconnects = ctx.trace
      .getDecisionsBySystem("connectivity")
      .filter((e) => e.data.question.startsWith("Reconnect"));
    expect(reconnects.map((e) => e.data.question)).toEqual([
      "Reconnect [0,1]",
      "Reconnect [0,0]",
    ]);
  });

  it("reports a room that only borders the boss", () => {
    const grid = createGrid(1, 4);
    const [start, , stranded] = placeRooms(grid, [
      [0, 2, START],
      [0, 1, BOSS],
      [0, 0, NORMAL],
    ]);
    if (!start) throw new Error("no start");

    const state = createRepairConnectivityPass().run(
      stateFor(grid, { start }),
      createContext(),
    );

    expect(stranded?.openExits()).toEqual([]);
    expect(state.diagnostics.map((d) => [d.code, d.message])).toEqual([
      ["REPAIR_IMPOSSIBLE", "Room [0,0] has no reachable neighbour"],
    ]);
  });
});

describe("connect-adjacent", () => {
  it("opens every adjacent pair except those touching the boss", () => {
    const grid = createGrid(2, 2);
    const [start, up, boss, diagonal] = placeRooms(grid, [
      [0, 0, START],
      [1, 0, NORMAL],
      [0, 1, BOSS],
      [1, 1, NORMAL],
    ]);

    createConnectAdjacentPass().run(
      stateFor(grid, { start }),
      createContext(),
    );

    expect(start?.openExits()).toEqual(["north"]);
    expect(up?.openExits()).toEqual(["south", "east"]);
    expect(diagonal?.openExits()).toEqual(["west"]);
    expect(boss?.openExits()).toEqual([]);
    expect(grid.countOpenEdges()).toBe(2);
  });
});
