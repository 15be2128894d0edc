/**
 * Finalize Pass
 *
 * Seals the generation state into the published DungeonLayout and stamps
 * it with its checksum.
 */

import { calculateLayoutChecksum } from "../../core/hash";
import { DungeonLayout } from "../../layout/dungeon-layout";
import type {
  LayoutArtifact,
  LayoutStateArtifact,
  Pass,
} from "../../pipeline/types";

export function createFinalizePass(): Pass<
  LayoutStateArtifact,
  LayoutArtifact
> {
  const passId = "layout.finalize";

  return {
    id: passId,
    inputType: "layout-state",
    outputType: "layout",
    run(input, ctx) {
      const { grid } = input;
      const checksum = calculateLayoutChecksum(
        grid.rows,
        grid.cols,
        grid.rooms(),
      );

      ctx.trace.decision(passId, {
        system: "allocation",
        question: "Layout checksum",
        options: [],
        chosen: checksum,
        reason: `Checksum over ${grid.roomCount} rooms and their exits`,
        rngConsumed: 0,
      });

      return {
        type: "layout",
        id: "layout",
        layout: new DungeonLayout({
          grid,
          config: ctx.config,
          seed: ctx.seed,
          checksum,
          start: input.start,
          boss: input.boss,
          item: input.item,
          diagnostics: input.diagnostics,
        }),
      };
    },
  };
}
