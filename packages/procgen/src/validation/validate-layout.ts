import {
  DIRECTIONS,
  type GridCoordinate,
  OPPOSITE,
  step,
} from "../core/geometry/types";
import { calculateLayoutChecksum } from "../core/hash";
import type { DungeonLayout } from "../layout/dungeon-layout";
import { findUnreachableRooms } from "../passes/connectivity/reachability";
import type { Violation } from "../pipeline/types";
import { RoomCategory } from "../rooms/types";
import { applyDoorOverlay, compileRoomTiles } from "../tiles/compiler";
import {
  hasErrorViolations,
  type LayoutValidationResult,
} from "./result-types";

const at = (row: number, col: number): string => `[${row},${col}]`;

function checkCategoryCounts(
  layout: DungeonLayout,
  violations: Violation[],
): void {
  const rooms = layout.getAllRooms();
  const count = (category: RoomCategory): number =>
    rooms.filter((room) => room.category === category).length;

  const starts = count(RoomCategory.START);
  if (starts !== 1) {
    violations.push({
      type: "invariant.start.count",
      message: `Expected exactly one start room, found ${starts}`,
      severity: "error",
    });
  }
  const bosses = count(RoomCategory.BOSS);
  if (bosses > 1) {
    violations.push({
      type: "invariant.boss.count",
      message: `Expected at most one boss room, found ${bosses}`,
      severity: "error",
    });
  }
  const items = count(RoomCategory.ITEM);
  if (items > 1) {
    violations.push({
      type: "invariant.item.count",
      message: `Expected at most one item room, found ${items}`,
      severity: "error",
    });
  }
}

function checkExits(layout: DungeonLayout, violations: Violation[]): void {
  for (const room of layout.getAllRooms()) {
    const where = at(room.coordinate.row, room.coordinate.col);
    for (const direction of DIRECTIONS) {
      if (!room.hasExit(direction)) continue;
      const neighbor = layout.getRoomAt(step(room.coordinate, direction));
      if (!neighbor) {
        violations.push({
          type: "invariant.exit.dangling",
          message: `Room ${where} has a ${direction} exit into an empty cell`,
          severity: "error",
        });
      } else if (!neighbor.hasExit(OPPOSITE[direction])) {
        violations.push({
          type: "invariant.exit.symmetry",
          message:
            `Room ${where} opens ${direction} ` +
            "but its neighbour does not open back",
          severity: "error",
        });
      }
    }
  }
}

function checkBossEntrance(
  layout: DungeonLayout,
  violations: Violation[],
): void {
  const boss = layout.getBossRoom();
  if (!boss) return;
  const open = boss.openExits().length;
  if (open === 1) return;

  const degenerate = layout.hasDiagnostic("BOSS_HAS_NO_ADJACENT_ROOM");
  if (open === 0 && degenerate) {
    violations.push({
      type: "invariant.boss.isolated",
      message: "Boss room had no neighbour and has no entrance",
      severity: "warning",
    });
    return;
  }
  violations.push({
    type: "invariant.boss.entrance",
    message: `Boss room has ${open} entrances, expected exactly one`,
    severity: "error",
  });
}

/**
 * Whether the repair pass already gave up on the room at `coord`.
 */
function reportedUnrepairable(
  layout: DungeonLayout,
  coord: GridCoordinate,
): boolean {
  return layout.diagnostics.some(
    ({ code, details }) =>
      code === "REPAIR_IMPOSSIBLE" &&
      details?.row === coord.row &&
      details?.col === coord.col,
  );
}

function checkConnectivity(
  layout: DungeonLayout,
  violations: Violation[],
): void {
  const start = layout.getStartRoom();
  if (!start) return;
  for (const room of findUnreachableRooms(layout.roomGrid, start)) {
    const { row, col } = room.coordinate;
    violations.push({
      type: "invariant.connectivity",
      message: `Room ${at(row, col)} is not reachable from start`,
      severity: reportedUnrepairable(layout, room.coordinate)
        ? "warning"
        : "error",
    });
  }
}

function checkTiles(layout: DungeonLayout, violations: Violation[]): void {
  for (const room of layout.getAllRooms()) {
    const expected = compileRoomTiles(room.interiorSize, room.exits);
    if (room.locked) {
      applyDoorOverlay(expected, room.interiorSize, room.exits, "locked");
    }
    if (!room.tiles.equals(expected)) {
      const { row, col } = room.coordinate;
      violations.push({
        type: "invariant.tiles.stale",
        message: `Room ${at(row, col)} tiles do not match its exits`,
        severity: "error",
      });
    }
  }
}

function checkAvailableCells(
  layout: DungeonLayout,
  violations: Violation[],
): void {
  for (const cell of layout.availableCells) {
    if (layout.getRoomAt(cell)) {
      violations.push({
        type: "invariant.cells.available",
        message: `Cell ${at(cell.row, cell.col)} is both free and occupied`,
        severity: "error",
      });
    }
  }
}

/**
 * Validate a generated layout against its structural invariants.
 *
 * Checks:
 * - One start room, at most one boss and one item room
 * - Exit symmetry, and no exit into an empty cell
 * - Boss room has a single entrance
 * - All non-boss rooms reachable from start without crossing the boss
 *   (a warning for rooms the repair pass reported as unrepairable)
 * - Tiles match a fresh compile of the exits
 * - Free cells hold no room
 * - Checksum matches recomputed value
 */
export function validateLayout(layout: DungeonLayout): LayoutValidationResult {
  const violations: Violation[] = [];

  checkCategoryCounts(layout, violations);
  checkExits(layout, violations);
  checkBossEntrance(layout, violations);
  checkConnectivity(layout, violations);
  checkTiles(layout, violations);
  checkAvailableCells(layout, violations);

  const checksum = calculateLayoutChecksum(
    layout.rows,
    layout.cols,
    layout.getAllRooms(),
  );
  if (checksum !== layout.checksum) {
    violations.push({
      type: "invariant.checksum",
      message:
        `Checksum mismatch: stored ${layout.checksum}, ` +
        `computed ${checksum}`,
      severity: "error",
    });
  }

  if (hasErrorViolations(violations)) {
    return { success: false, violations };
  }
  return { success: true, violations };
}
