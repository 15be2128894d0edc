import { z } from "zod";

const UINT32_MAX = 0xffffffff;

export const LayoutSeedSchema = z
  .number()
  .int({ error: "Seed must be an integer" })
  .min(0, { error: "Seed must be non-negative" })
  .max(UINT32_MAX, { error: "Seed must fit in uint32" });

export const FloorProgressSchema = z.object({
  currentFloor: z
    .number()
    .int()
    .min(1, { error: "Floors are numbered from 1" }),
});
