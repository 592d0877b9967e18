import { z } from "zod";

const searchBoundsSchema = {
  maxDepth: z.number().int().min(1).max(5000).optional(),
  maxStates: z.number().int().min(1).max(1_000_000).optional()
};

export const carSetupSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("do-not-move") }),
  z.object({ type: z.literal("move-list"), moves: z.string() }),
  z.object({ type: z.literal("path-follower"), waypoints: z.string().min(1) }),
  z.object({ type: z.literal("path-search"), ...searchBoundsSchema })
]);

// Keyed by car id, i.e. the start marker character on the grid.
export const raceSetupSchema = z.record(z.string().min(1), carSetupSchema);

export type CarSetup = z.infer<typeof carSetupSchema>;
export type RaceSetup = z.infer<typeof raceSetupSchema>;
