import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  JsonFileFloorProgressStore,
  MemoryFloorProgressStore,
} from "../src/floor/progress-store";

describe("MemoryFloorProgressStore", () => {
  it("returns what was written", () => {
    const store = new MemoryFloorProgressStore();
    expect(store.read()).toBeUndefined();

    store.write({ currentFloor: 3 });
    expect(store.read()).toEqual({ currentFloor: 3 });
  });
});

describe("JsonFileFloorProgressStore", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "roomforge-progress-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes pretty JSON and reads it back", () => {
    const path = join(dir, "saves", "progress.json");
    const store = new JsonFileFloorProgressStore(path);

    store.write({ currentFloor: 5 });

    expect(readFileSync(path, "utf8")).toBe('{\n  "currentFloor": 5\n}\n');
    expect(store.read()).toEqual({ currentFloor: 5 });
  });

  it("reads nothing from a missing file", () => {
    const store = new JsonFileFloorProgressStore(join(dir, "absent.json"));
    expect(store.read()).toBeUndefined();
  });

  it("reads nothing from a malformed file", () => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ currentFloor: ", "utf8");

    expect(new JsonFileFloorProgressStore(path).read()).toBeUndefined();
  });
});
