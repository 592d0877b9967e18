import type { RaceState } from "../types/race";
import type { Vec2 } from "../types/track";
import { DEFAULT_RACE_MAX_TURNS } from "../constants";
import { accelerationName, type AccelerationName } from "./accelerations";
import { createDoNotMoveSource, type MoveSource } from "./moveSources";
import { advanceActive, getActiveCar, getWinner, isRaceOver, takeTurn, type TurnOutcome } from "./turnSystem";

export type RaceStatus = "won" | "terminated" | "all-crashed" | "turn-limit";

export interface TurnRecord {
  turn: number;
  carId: string;
  acceleration: AccelerationName;
  outcome: TurnOutcome;
}

export interface CarSummary {
  carId: string;
  pos: Vec2;
  velocity: Vec2;
  crashed: boolean;
  moveCount: number;
}

export interface RaceSummary {
  status: RaceStatus;
  winnerCarId: string | null;
  turnsPlayed: number;
  cars: CarSummary[];
}

export interface RunRaceOptions {
  maxTurns?: number;
  onTurn?: (record: TurnRecord) => void;
}

export function summarizeRace(race: RaceState, status: RaceStatus, turnsPlayed: number): RaceSummary {
  return {
    status,
    winnerCarId: getWinner(race)?.carId ?? null,
    turnsPlayed,
    cars: race.cars.map((car) => ({
      carId: car.carId,
      pos: car.pos,
      velocity: car.velocity,
      crashed: car.crashed,
      moveCount: car.moveCount
    }))
  };
}

/**
 * Drives the race to its end: one acceleration from the active car's source
 * per turn, then the turn passes on. `sources` is indexed like `race.cars`;
 * a car without a source holds still.
 */
export function runRace(race: RaceState, sources: readonly MoveSource[], options: RunRaceOptions = {}): RaceSummary {
  const maxTurns = options.maxTurns ?? DEFAULT_RACE_MAX_TURNS;
  const idle = createDoNotMoveSource();
  let turnsPlayed = 0;

  while (!isRaceOver(race)) {
    if (turnsPlayed >= maxTurns) return summarizeRace(race, "turn-limit", turnsPlayed);

    const car = getActiveCar(race);
    if (!car) break;
    const carIndex = race.activeIndex;
    const acceleration = (sources[carIndex] ?? idle).nextAcceleration();
    if (acceleration === null) return summarizeRace(race, "terminated", turnsPlayed);

    const outcome = takeTurn(race, carIndex, acceleration);
    turnsPlayed += 1;
    options.onTurn?.({ turn: turnsPlayed, carId: car.carId, acceleration: accelerationName(acceleration), outcome });
    if (race.winnerIndex === null) advanceActive(race);
  }

  return summarizeRace(race, race.winnerIndex === null ? "all-crashed" : "won", turnsPlayed);
}
