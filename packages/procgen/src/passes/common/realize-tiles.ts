/**
 * Realize Tiles Pass
 *
 * Compiles every room from its final exits and, when a writer is given,
 * paints the rooms into the shared tile layers. A room the palette cannot
 * paint is skipped and reported.
 */

import type { LayoutStateArtifact, Pass } from "../../pipeline/types";
import type { TileWriter } from "../../tiles/tile-writer";
import { reportDiagnostic } from "./diagnostics";

export function createRealizeTilesPass(
  writer?: TileWriter,
): Pass<LayoutStateArtifact, LayoutStateArtifact> {
  const passId = "layout.realize-tiles";

  return {
    id: passId,
    inputType: "layout-state",
    outputType: "layout-state",
    run(input, ctx) {
      let state = input;
      let written = 0;
      let skipped = 0;

      for (const room of input.grid.rooms()) {
        room.compile();
        if (!writer) continue;

        const result = writer.writeRoom(room);
        if (result.isOk()) {
          written++;
          continue;
        }
        skipped++;
        state = reportDiagnostic(
          state,
          ctx,
          passId,
          result.error.code,
          result.error.message,
          result.error.details,
        );
      }

      ctx.trace.decision(passId, {
        system: "tiles",
        question: "Realize rooms",
        options: [],
        chosen: writer ? written : 0,
        reason: writer
          ? `Painted ${written} rooms, skipped ${skipped}`
          : "Compiled tiles only, no writer attached",
        rngConsumed: 0,
      });

      return state;
    },
  };
}
