import { describe, expect, it } from "vitest";
import { generate } from "../src/api";
import { Direction } from "../src/core/geometry/types";
import { calculateLayoutChecksum } from "../src/core/hash";
import { DungeonLayout } from "../src/layout/dungeon-layout";
import { RoomCategory } from "../src/rooms/types";
import { computeStats, hasFullRoster } from "../src/validation/compute-stats";
import { validateLayout } from "../src/validation/validate-layout";
import { createGrid, layoutFor, placeRooms, testConfig } from "./helpers";

const { START, NORMAL, BOSS } = RoomCategory;

function compileAll(grid: ReturnType<typeof createGrid>): void {
  for (const room of grid.rooms()) room.compile();
}

describe("validateLayout", () => {
  it("accepts generated layouts", () => {
    for (let seed = 1; seed <= 40; seed++) {
      const result = generate(
        { rows: 4, cols: 5, targetFightRoomCount: 9 },
        { seed },
      );
      if (!result.success) throw result.error;
      const validation = validateLayout(result.layout);

      expect(validation.success).toBe(true);
      // Only rooms the repair pass gave up on may show up, as warnings
      const stranded = result.layout.diagnostics.filter(
        (d) => d.code === "REPAIR_IMPOSSIBLE",
      );
      expect(validation.violations).toHaveLength(stranded.length);
      for (const violation of validation.violations) {
        expect(violation.type).toBe("invariant.connectivity");
        expect(violation.severity).toBe("warning");
      }
    }
  });

  it("downgrades a room reported as unrepairable to a warning", () => {
    const grid = createGrid(1, 3);
    const [start, boss] = placeRooms(grid, [
      [0, 0, START],
      [0, 1, BOSS],
      [0, 2, NORMAL],
    ]);
    if (!start || !boss) throw new Error("rooms not placed");
    grid.connect(start, Direction.EAST);
    compileAll(grid);
    const layout = new DungeonLayout({
      grid,
      config: testConfig({ rows: 1, cols: 3 }),
      seed: 1,
      checksum: calculateLayoutChecksum(1, 3, grid.rooms()),
      start,
      boss,
      diagnostics: [
        {
          code: "REPAIR_IMPOSSIBLE",
          message: "Room [0,2] has no reachable neighbour",
          severity: "warning",
          passId: "layout.repair-connectivity",
          details: { row: 0, col: 2 },
        },
      ],
    });

    expect(validateLayout(layout)).toEqual({
      success: true,
      violations: [
        {
          type: "invariant.connectivity",
          message: "Room [0,2] is not reachable from start",
          severity: "warning",
        },
      ],
    });
  });

  it("accepts a consistent hand-built layout", () => {
    const grid = createGrid(1, 2);
    const [start] = placeRooms(grid, [
      [0, 1, START],
      [0, 0, NORMAL],
    ]);
    if (!start) throw new Error("no start");
    grid.connect(start, Direction.WEST);
    compileAll(grid);

    expect(validateLayout(layoutFor(grid)).success).toBe(true);
  });

  it("flags tiles that were not recompiled after an exit change", () => {
    const grid = createGrid(1, 2);
    const [start] = placeRooms(grid, [
      [0, 1, START],
      [0, 0, NORMAL],
    ]);
    if (!start) throw new Error("no start");
    grid.connect(start, Direction.WEST);

    const result = validateLayout(layoutFor(grid));
    expect(result.success).toBe(false);
    expect(result.violations.map((v) => v.type)).toEqual([
      "invariant.tiles.stale",
      "invariant.tiles.stale",
    ]);
  });

  it("flags an exit into an empty cell", () => {
    const grid = createGrid(1, 2);
    const [start] = placeRooms(grid, [
      [0, 1, START],
      [0, 0, NORMAL],
    ]);
    if (!start) throw new Error("no start");
    grid.connect(start, Direction.WEST);
    start.setExit(Direction.NORTH, true);
    compileAll(grid);

    const { violations } = validateLayout(layoutFor(grid));
    expect(violations.map((v) => v.type)).toEqual(["invariant.exit.dangling"]);
  });

  it("flags a one-sided exit and the room it cuts off", () => {
    const grid = createGrid(1, 2);
    const [start] = placeRooms(grid, [
      [0, 1, START],
      [0, 0, NORMAL],
    ]);
    if (!start) throw new Error("no start");
    start.setExit(Direction.WEST, true);
    compileAll(grid);

    const { violations } = validateLayout(layoutFor(grid));
    expect(violations.map((v) => v.type)).toEqual([
      "invariant.exit.symmetry",
      "invariant.connectivity",
    ]);
  });

  it("flags a boss with two entrances", () => {
    const grid = createGrid(1, 3);
    const [start, boss] = placeRooms(grid, [
      [0, 0, START],
      [0, 1, BOSS],
      [0, 2, NORMAL],
    ]);
    if (!start || !boss) throw new Error("rooms not placed");
    grid.connect(start, Direction.EAST);
    grid.connect(boss, Direction.EAST);
    compileAll(grid);

    const result = validateLayout(layoutFor(grid));
    expect(result.violations.map((v) => [v.type, v.message])).toEqual([
      [
        "invariant.boss.entrance",
        "Boss room has 2 entrances, expected exactly one",
      ],
      ["invariant.connectivity", "Room [0,2] is not reachable from start"],
    ]);
  });

  it("flags a second start room", () => {
    const grid = createGrid(1, 2);
    const [a] = placeRooms(grid, [
      [0, 0, START],
      [0, 1, START],
    ]);
    if (!a) throw new Error("no start");
    grid.connect(a, Direction.EAST);
    compileAll(grid);

    expect(validateLayout(layoutFor(grid)).violations).toEqual([
      {
        type: "invariant.start.count",
        message: "Expected exactly one start room, found 2",
        severity: "error",
      },
    ]);
  });

  it("flags a checksum that does not match the rooms", () => {
    const grid = createGrid(1, 1);
    placeRooms(grid, [[0, 0, START]]);
    const layout = new DungeonLayout({
      grid,
      config: testConfig({ rows: 1, cols: 1 }),
      seed: 1,
      checksum: "v1:0000000000000000",
      start: grid.get({ row: 0, col: 0 }),
    });

    const { violations } = validateLayout(layout);
    expect(violations.map((v) => v.type)).toEqual(["invariant.checksum"]);
  });
});

describe("computeStats", () => {
  it("summarises a hand-built layout", () => {
    const grid = createGrid(2, 2);
    const [start, up] = placeRooms(grid, [
      [0, 0, START],
      [1, 0, NORMAL],
      [0, 1, BOSS],
    ]);
    if (!start || !up) throw new Error("rooms not placed");
    grid.connect(start, Direction.NORTH);
    grid.connect(start, Direction.EAST);

    const stats = computeStats(layoutFor(grid));

    expect(stats).toEqual({
      roomCount: 3,
      roomTypeCounts: { start: 1, normal: 1, boss: 1, item: 0 },
      openEdgeCount: 2,
      avgExitsPerRoom: 4 / 3,
      deadEndCount: 2,
      gridFillRatio: 0.75,
      maxDepthFromStart: 1,
      diagnosticCount: 0,
    });
    expect(hasFullRoster(layoutFor(grid))).toBe(false);
  });
});
