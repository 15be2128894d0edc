/**
 * BFS Distance Calculation unit tests
 */

import { describe, expect, it } from "vitest";
import { calculateBFSDistances } from "../src/core/graph/bfs-distance";

describe("calculateBFSDistances", () => {
  it("calculates distances from start node in simple graph", () => {
    // Graph: 0 -> 1 -> 2 -> 3
    const adjacency = new Map<number, number[]>([
      [0, [1]],
      [1, [2]],
      [2, [3]],
      [3, []],
    ]);

    const { distances, maxDistance } = calculateBFSDistances(
      0,
      (nodeId) => adjacency.get(nodeId) ?? [],
    );

    expect(distances.get(0)).toBe(0);
    expect(distances.get(1)).toBe(1);
    expect(distances.get(2)).toBe(2);
    expect(distances.get(3)).toBe(3);
    expect(maxDistance).toBe(3);
  });

  it("takes the shortest path in a graph with a shortcut", () => {
    const adjacency = new Map<string, string[]>([
      ["a", ["b", "d"]],
      ["b", ["c"]],
      ["c", ["d"]],
      ["d", []],
    ]);

    const { distances } = calculateBFSDistances(
      "a",
      (id) => adjacency.get(id) ?? [],
    );

    expect(distances.get("d")).toBe(1);
    expect(distances.get("c")).toBe(2);
  });

  it("leaves unreachable nodes out of the result", () => {
    const adjacency = new Map<number, number[]>([
      [0, [1]],
      [1, [0]],
      [2, []],
    ]);

    const { distances } = calculateBFSDistances(
      0,
      (id) => adjacency.get(id) ?? [],
    );

    expect(distances.has(2)).toBe(false);
    expect(distances.size).toBe(2);
  });

  it("handles a lone source node", () => {
    const { distances, maxDistance } = calculateBFSDistances(7, () => []);
    expect([...distances.entries()]).toEqual([[7, 0]]);
    expect(maxDistance).toBe(0);
  });
});
