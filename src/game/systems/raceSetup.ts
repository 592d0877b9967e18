import type { RaceState } from "../types/race";
import type { CarSetup, RaceSetup } from "../../validation/raceSetupSchema";
import { parseMoveList, parseWaypoints } from "../../validation/moveFormats";
import {
  createDoNotMoveSource,
  createMoveListSource,
  createPathFollowerSource,
  createPathSearchSource,
  type MoveSource
} from "./moveSources";
import type { SearchOptions, SearchResult } from "./pathSearchSystem";
import { RaceRuleError } from "./turnSystem";

export interface SearchReport {
  carId: string;
  result: SearchResult;
}

export interface MoveSourceSet {
  sources: MoveSource[];
  searches: SearchReport[];
}

/**
 * One move source per car, in car order. Path searches run here, before the
 * first turn, against the starting grid; their outcomes come back in
 * `searches` so failures can be reported.
 */
export function buildMoveSources(race: RaceState, setup: RaceSetup, defaults: SearchOptions = {}): MoveSourceSet {
  const known = new Set(race.cars.map((car) => car.carId));
  const unknown = Object.keys(setup).filter((carId) => !known.has(carId));
  if (unknown.length > 0) {
    throw new RaceRuleError("unknown-car-id", `Unknown car id(s): ${unknown.join(", ")}`);
  }

  const searches: SearchReport[] = [];
  const sources = race.cars.map((car, index): MoveSource => {
    const carSetup: CarSetup = setup[car.carId] ?? { type: "do-not-move" };
    switch (carSetup.type) {
      case "do-not-move":
        return createDoNotMoveSource();
      case "move-list":
        return createMoveListSource(parseMoveList(carSetup.moves));
      case "path-follower":
        return createPathFollowerSource(parseWaypoints(carSetup.waypoints), car);
      case "path-search": {
        const { source, result } = createPathSearchSource(race, index, {
          maxDepth: carSetup.maxDepth ?? defaults.maxDepth,
          maxStates: carSetup.maxStates ?? defaults.maxStates
        });
        searches.push({ carId: car.carId, result });
        return source;
      }
    }
  });
  return { sources, searches };
}
