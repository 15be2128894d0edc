import { z } from "zod";

export const MAX_GRID_DIMENSION = 64;

const TileSizeSchema = z.object({
  width: z.number().int("Width must be an integer").min(2).max(256),
  height: z.number().int("Height must be an integer").min(2).max(256),
});

export const LayoutConfigSchema = z
  .object({
    rows: z
      .number()
      .int("Rows must be an integer")
      .min(1)
      .max(MAX_GRID_DIMENSION),
    cols: z
      .number()
      .int("Columns must be an integer")
      .min(1)
      .max(MAX_GRID_DIMENSION),
    interiorSize: TileSizeSchema,
    roomSizeInTiles: TileSizeSchema,
    cellSize: z.number().positive({ error: "Cell size must be positive" }),
    targetFightRoomCount: z.number().int().min(0),
  })
  .superRefine((data, ctx) => {
    if (data.targetFightRoomCount > data.rows * data.cols - 1) {
      ctx.addIssue({
        code: "custom",
        message:
          "Too many rooms for grid size " +
          "(at most rows x cols - 1 besides Start)",
        path: ["targetFightRoomCount"],
      });
    }
    if (data.roomSizeInTiles.width < data.interiorSize.width + 2) {
      ctx.addIssue({
        code: "custom",
        message:
          "Room pitch must fit the interior plus its wall ring horizontally",
        path: ["roomSizeInTiles", "width"],
      });
    }
    if (data.roomSizeInTiles.height < data.interiorSize.height + 2) {
      ctx.addIssue({
        code: "custom",
        message:
          "Room pitch must fit the interior plus its wall ring vertically",
        path: ["roomSizeInTiles", "height"],
      });
    }
  });

export type ValidatedLayoutConfig = z.infer<typeof LayoutConfigSchema>;
