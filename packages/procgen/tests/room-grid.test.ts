import { describe, expect, it } from "vitest";
import { Direction } from "../src/core/geometry/types";
import { RoomCategory } from "../src/rooms/types";
import { createGrid, placeRooms } from "./helpers";

describe("RoomGrid", () => {
  it("starts empty with every cell available", () => {
    const grid = createGrid(3, 4);
    expect(grid.roomCount).toBe(0);
    expect(grid.availableCells()).toHaveLength(12);
    expect(grid.rooms()).toEqual([]);
  });

  it("takes a placed cell out of the free pool and opens nothing", () => {
    const grid = createGrid(3, 4);
    const room = grid
      .place({ row: 1, col: 2 }, RoomCategory.START)
      .getOrThrow();

    expect(grid.isAvailable({ row: 1, col: 2 })).toBe(false);
    expect(grid.availableCells()).toHaveLength(11);
    expect(grid.get({ row: 1, col: 2 })).toBe(room);
    expect(room.openExits()).toEqual([]);
  });

  it("rejects an occupied cell", () => {
    const grid = createGrid(3, 4);
    grid.place({ row: 0, col: 0 }, RoomCategory.START);
    const result = grid.place({ row: 0, col: 0 }, RoomCategory.NORMAL);

    expect(result.isErr()).toBe(true);
    expect(result.error.code).toBe("CELL_OCCUPIED");
    expect(result.error.message).toBe("Cell [0,0] already holds a room");
  });

  it("rejects a cell outside the grid", () => {
    const grid = createGrid(3, 4);
    const result = grid.place({ row: 3, col: 0 }, RoomCategory.NORMAL);

    expect(result.isErr()).toBe(true);
    expect(result.error.code).toBe("OUT_OF_BOUNDS");
    expect(result.error.details).toEqual({ row: 3, col: 0, rows: 3, cols: 4 });
  });

  it("enumerates rooms row-major", () => {
    const grid = createGrid(3, 3);
    placeRooms(grid, [
      [2, 0, RoomCategory.NORMAL],
      [0, 2, RoomCategory.NORMAL],
      [1, 1, RoomCategory.START],
      [0, 1, RoomCategory.NORMAL],
    ]);

    const cells = grid
      .rooms()
      .map((r) => [r.coordinate.row, r.coordinate.col]);
    expect(cells).toEqual([
      [0, 1],
      [0, 2],
      [1, 1],
      [2, 0],
    ]);
  });

  it("lists occupied neighbours in N, S, E, W order", () => {
    const grid = createGrid(3, 3);
    placeRooms(grid, [
      [1, 1, RoomCategory.START],
      [1, 0, RoomCategory.NORMAL],
      [2, 1, RoomCategory.NORMAL],
      [0, 1, RoomCategory.NORMAL],
    ]);

    expect(grid.neighbors({ row: 1, col: 1 }).map((n) => n.direction)).toEqual([
      "north",
      "south",
      "west",
    ]);
    expect(grid.availableDirections({ row: 1, col: 1 })).toEqual(["east"]);
  });

  it("connects both sides of a pair", () => {
    const grid = createGrid(2, 2);
    const [a, b] = placeRooms(grid, [
      [0, 0, RoomCategory.START],
      [1, 0, RoomCategory.NORMAL],
    ]);

    expect(a && grid.connect(a, Direction.NORTH)).toBe(true);
    expect(a?.hasExit(Direction.NORTH)).toBe(true);
    expect(b?.hasExit(Direction.SOUTH)).toBe(true);
    expect(grid.countOpenEdges()).toBe(1);
    const linked = grid.connectedNeighbors({ row: 0, col: 0 });
    expect(linked.map((n) => n.room)).toEqual([b]);
  });

  it("will not connect toward an empty cell", () => {
    const grid = createGrid(2, 2);
    const [a] = placeRooms(grid, [[0, 0, RoomCategory.START]]);
    expect(a && grid.connect(a, Direction.EAST)).toBe(false);
    expect(a?.hasExit(Direction.EAST)).toBe(false);
  });

  it("keeps a severed pair closed for good", () => {
    const grid = createGrid(1, 2);
    const [a, b] = placeRooms(grid, [
      [0, 0, RoomCategory.BOSS],
      [0, 1, RoomCategory.NORMAL],
    ]);
    if (!a || !b) throw new Error("rooms not placed");

    grid.connect(a, Direction.EAST);
    grid.sever(a, Direction.EAST);

    expect(a.hasExit(Direction.EAST)).toBe(false);
    expect(b.hasExit(Direction.WEST)).toBe(false);
    expect(grid.connect(b, Direction.WEST)).toBe(false);
    expect(grid.countOpenEdges()).toBe(0);
  });
});
