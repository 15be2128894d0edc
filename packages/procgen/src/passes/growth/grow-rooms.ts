/**
 * Grow Rooms Pass
 *
 * Random walk from Start. Each step tries to attach a NORMAL room on a
 * free side of the current room, then either follows the new room (40%),
 * jumps to any room placed so far (next 30%) or stays put. A room with no
 * free side hands the walk to one of its grid neighbours.
 *
 * The walk stops after `targetFightRoomCount` placements or three times
 * that many steps, whichever comes first.
 */

import {
  type Direction,
  type GridCoordinate,
  step,
} from "../../core/geometry/types";
import type { RoomGrid } from "../../grid/room-grid";
import type { CountingRandom } from "../../pipeline/counting-random";
import type { LayoutStateArtifact, Pass } from "../../pipeline/types";
import type { Room } from "../../rooms/room";
import { RoomCategory } from "../../rooms/types";
import { reportDiagnostic } from "../common/diagnostics";

export const FOLLOW_NEW_ROOM_CHANCE = 0.4;
export const JUMP_TO_ANY_ROOM_THRESHOLD = 0.7;
export const ATTEMPTS_PER_ROOM = 3;

interface Attachment {
  readonly room: Room;
  readonly direction: Direction;
  readonly candidates: readonly Direction[];
}

/**
 * Try the free sides of `current` in shuffled order and place a connected
 * NORMAL room on the first one that takes it.
 */
export function attachRoom(
  grid: RoomGrid,
  current: Room,
  rng: CountingRandom,
): Attachment | undefined {
  const free = grid.availableDirections(current.coordinate);
  if (free.length === 0) return undefined;

  const candidates = rng.shuffle(free);
  for (const direction of candidates) {
    const placed = grid.place(
      step(current.coordinate, direction),
      RoomCategory.NORMAL,
    );
    if (!placed.isOk()) continue;
    grid.connect(current, direction);
    return { room: placed.value, direction, candidates };
  }
  return undefined;
}

const at = ({ row, col }: GridCoordinate): string => `[${row},${col}]`;

export function createGrowRoomsPass(): Pass<
  LayoutStateArtifact,
  LayoutStateArtifact
> {
  const passId = "layout.grow-rooms";

  return {
    id: passId,
    inputType: "layout-state",
    outputType: "layout-state",
    run(input, ctx) {
      const { grid, start } = input;
      if (!start) {
        throw new Error("grow-rooms requires a placed start room");
      }

      const target = ctx.config.targetFightRoomCount;
      const maxAttempts = target * ATTEMPTS_PER_ROOM;
      const placedRooms: Room[] = [start];
      let current = start;
      let placed = 0;
      let attempts = 0;

      while (placed < target && attempts < maxAttempts) {
        attempts++;
        const before = ctx.rng.draws;
        const attachment = attachRoom(grid, current, ctx.rng);

        if (attachment) {
          placedRooms.push(attachment.room);
          placed++;

          const roll = ctx.rng.next();
          const from = current;
          if (roll < FOLLOW_NEW_ROOM_CHANCE) {
            current = attachment.room;
          } else if (roll < JUMP_TO_ANY_ROOM_THRESHOLD) {
            current = ctx.rng.choice(placedRooms) ?? current;
          }

          ctx.trace.decision(passId, {
            system: "growth",
            question: `Attach room to ${at(from.coordinate)}`,
            options: attachment.candidates,
            chosen: attachment.direction,
            reason:
              `Placed ${at(attachment.room.coordinate)}, ` +
              `walk continues from ${at(current.coordinate)}`,
            rngConsumed: ctx.rng.draws - before,
          });
          continue;
        }

        // Boxed in: hand the walk to an occupied neighbour, else any room.
        const neighbors = grid
          .neighbors(current.coordinate)
          .map(({ room }) => room);
        current =
          ctx.rng.choice(neighbors) ?? ctx.rng.choice(placedRooms) ?? current;

        ctx.trace.decision(passId, {
          system: "growth",
          question: "Walk boxed in",
          options: neighbors.map((room) => room.coordinate),
          chosen: current.coordinate,
          reason: "No free side, moved to a neighbouring room",
          rngConsumed: ctx.rng.draws - before,
        });
      }

      if (placed < target) {
        return reportDiagnostic(
          input,
          ctx,
          passId,
          "EXHAUSTED_ATTEMPTS",
          `Placed ${placed} of ${target} rooms after ${attempts} attempts`,
          { placed, target, attempts },
        );
      }
      return input;
    },
  };
}
