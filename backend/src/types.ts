import { z } from "zod";
import { ACCELERATION_NAMES } from "../../src/game/systems/accelerations";
import { SEARCH_FAILURE_REASONS } from "../../src/game/systems/pathSearchSystem";
import type { RaceSummary, TurnRecord } from "../../src/game/systems/raceRunner";
import type { Vec2 } from "../../src/game/types/track";

export const planResponseSchema = z.discriminatedUnion("ok", [
  z.object({
    ok: z.literal(true),
    trackId: z.string(),
    carId: z.string(),
    plan: z.array(z.enum(ACCELERATION_NAMES)),
    statesExplored: z.number().int()
  }),
  z.object({
    ok: z.literal(false),
    trackId: z.string(),
    carId: z.string(),
    reason: z.enum(SEARCH_FAILURE_REASONS),
    statesExplored: z.number().int()
  })
]);

export type PlanResponse = z.infer<typeof planResponseSchema>;

export interface TrackSummary {
  trackId: string;
  width: number;
  height: number;
  cars: Array<{ carId: string; pos: Vec2 }>;
  rows: string[];
}

export interface SearchSummary {
  carId: string;
  ok: boolean;
  planLength?: number;
  reason?: string;
  statesExplored: number;
}

export interface SimulationResponse extends RaceSummary {
  trackId: string;
  searches: SearchSummary[];
  turns: TurnRecord[];
}
