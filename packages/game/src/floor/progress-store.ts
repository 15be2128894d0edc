/**
 * Floor progress persistence.
 *
 * Stores hand back raw data; `FloorManager.load` validates it.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import type { FloorProgress } from "@roomforge/contracts";

export interface FloorProgressStore {
  /** Saved data, unvalidated; undefined when nothing was saved */
  read(): unknown;
  write(progress: FloorProgress): void;
}

export class MemoryFloorProgressStore implements FloorProgressStore {
  private data: unknown;

  constructor(initial?: unknown) {
    this.data = initial;
  }

  read(): unknown {
    return this.data;
  }

  write(progress: FloorProgress): void {
    this.data = { ...progress };
  }
}

/**
 * Progress kept as a small JSON document on disk.
 */
export class JsonFileFloorProgressStore implements FloorProgressStore {
  constructor(readonly path: string) {}

  read(): unknown {
    if (!existsSync(this.path)) return undefined;
    const text = readFileSync(this.path, "utf8");
    try {
      return JSON.parse(text);
    } catch (error) {
      if (error instanceof SyntaxError) return undefined;
      throw error;
    }
  }

  write(progress: FloorProgress): void {
    mkdirSync(dirname(this.path), { recursive: true });
    writeFileSync(this.path, `${JSON.stringify(progress, null, 2)}\n`, "utf8");
  }
}
