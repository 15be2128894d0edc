/**
 * Assign Item Room Pass
 *
 * Turns one random NORMAL room into the ITEM room. Layouts without a
 * NORMAL room simply have none.
 */

import type { LayoutStateArtifact, Pass } from "../../pipeline/types";
import { RoomCategory } from "../../rooms/types";

export function createAssignItemRoomPass(): Pass<
  LayoutStateArtifact,
  LayoutStateArtifact
> {
  const passId = "layout.assign-item-room";

  return {
    id: passId,
    inputType: "layout-state",
    outputType: "layout-state",
    run(input, ctx) {
      const normals = input.grid
        .rooms()
        .filter((room) => room.category === RoomCategory.NORMAL);
      const before = ctx.rng.draws;
      const item = ctx.rng.choice(normals);

      ctx.trace.decision(passId, {
        system: "boss",
        question: "Item room",
        options: normals.map((room) => room.coordinate),
        chosen: item?.coordinate ?? null,
        reason: item ? "Random normal room" : "No normal room available",
        rngConsumed: ctx.rng.draws - before,
      });

      if (!item) return input;
      item.category = RoomCategory.ITEM;
      return { ...input, item };
    },
  };
}
