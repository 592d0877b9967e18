import type { RaceState } from "./types/race";
import type { RaceSetup } from "../validation/raceSetupSchema";
import { buildMoveSources, type SearchReport } from "./systems/raceSetup";
import type { MoveSource } from "./systems/moveSources";
import type { SearchOptions } from "./systems/pathSearchSystem";
import { parseTrack } from "./systems/trackGrid";
import { createRace } from "./systems/turnSystem";

export interface RaceOptions {
  trackId?: string;
  search?: SearchOptions;
}

export interface PreparedRace {
  race: RaceState;
  sources: MoveSource[];
  searches: SearchReport[];
}

/** Parses the grid, places the cars and gives each one its move source. */
export function startRace(trackText: string, setup: RaceSetup = {}, options: RaceOptions = {}): PreparedRace {
  const { track, cars } = parseTrack(trackText, options.trackId);
  const race = createRace(track, cars);
  const { sources, searches } = buildMoveSources(race, setup, options.search);
  return { race, sources, searches };
}
