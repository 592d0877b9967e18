import type { Car } from "../types/car";
import type { RaceState } from "../types/race";
import type { FinishKind, TrackGrid, Vec2 } from "../types/track";
import { accelerateCar, crashCar, moveCar } from "./carSystem";
import { rasterizeLine } from "./rasterSystem";
import { cellAt, isCorrectCrossing, isFinishKind } from "./trackGrid";
import { addVec, vecEquals } from "./vectorMath";

export type RaceRuleCode = "missing-acceleration" | "car-index-out-of-range" | "not-active-car" | "unknown-car-id";

export class RaceRuleError extends Error {
  constructor(
    public readonly code: RaceRuleCode,
    message: string
  ) {
    super(message);
    this.name = "RaceRuleError";
  }
}

export type PathEvent =
  | { type: "crash"; at: Vec2; cause: "wall" | "car" }
  | { type: "crossing"; at: Vec2; kind: FinishKind; correct: boolean };

export type TurnOutcome =
  | { type: "skipped"; reason: "race-finished" | "car-crashed" }
  | { type: "moved"; pos: Vec2 }
  | { type: "crashed"; at: Vec2; cause: "wall" | "car" }
  | { type: "won"; pos: Vec2 };

/**
 * Walks the cells of a move after the starting one and reports what the car
 * meets on the way: every finish crossing, and at most one crash, which ends
 * the list. Crossing correctness is judged against the move's velocity.
 */
export function scanMovePath(
  track: TrackGrid,
  from: Vec2,
  velocity: Vec2,
  isOccupied: (pos: Vec2) => boolean
): PathEvent[] {
  const to = addVec(from, velocity);
  const events: PathEvent[] = [];
  for (const cell of rasterizeLine(from, to).slice(1)) {
    const kind = cellAt(track, cell);
    if (kind === "WALL") {
      events.push({ type: "crash", at: cell, cause: "wall" });
      break;
    }
    if (kind === "OPEN") {
      if (isOccupied(cell)) {
        events.push({ type: "crash", at: cell, cause: "car" });
        break;
      }
      continue;
    }
    if (isFinishKind(kind)) {
      events.push({ type: "crossing", at: cell, kind, correct: isCorrectCrossing(kind, velocity) });
    }
  }
  return events;
}

export function createRace(track: TrackGrid, cars: Car[]): RaceState {
  return { track, cars, activeIndex: 0, winnerIndex: null };
}

export function getActiveCar(race: RaceState): Car | null {
  return race.cars[race.activeIndex] ?? null;
}

export function getWinner(race: RaceState): Car | null {
  if (race.winnerIndex === null) return null;
  return race.cars[race.winnerIndex] ?? null;
}

export function isRaceOver(race: RaceState): boolean {
  return race.winnerIndex !== null || race.cars.every((car) => car.crashed);
}

function isOccupiedByOther(race: RaceState, carIndex: number, pos: Vec2): boolean {
  return race.cars.some((car, index) => index !== carIndex && !car.crashed && vecEquals(car.pos, pos));
}

// A crash leaving a single car on the track hands that car the win.
function checkSoleSurvivor(race: RaceState) {
  const survivors = race.cars.flatMap((car, index) => (car.crashed ? [] : [index]));
  if (survivors.length === 1) race.winnerIndex = survivors[0] ?? null;
}

/**
 * Returns true when the crossing ends the race for this car. A car that once
 * crossed the wrong way needs two correct crossings in a row to win.
 */
function applyCrossing(car: Car, correct: boolean): boolean {
  const record = car.crossing;
  if (!correct) {
    record.hasIncorrectCrossing = true;
    record.consecutiveCorrect = 0;
    return false;
  }
  if (!record.hasIncorrectCrossing) return true;
  record.consecutiveCorrect += 1;
  return record.consecutiveCorrect >= 2;
}

export function takeTurn(race: RaceState, carIndex: number, acceleration: Vec2 | null | undefined): TurnOutcome {
  if (!acceleration) {
    throw new RaceRuleError("missing-acceleration", "Acceleration must be provided");
  }
  if (!Number.isInteger(carIndex) || carIndex < 0 || carIndex >= race.cars.length) {
    throw new RaceRuleError("car-index-out-of-range", `Invalid car index: ${carIndex}`);
  }
  if (race.winnerIndex !== null) return { type: "skipped", reason: "race-finished" };
  if (carIndex !== race.activeIndex) {
    throw new RaceRuleError("not-active-car", `Car ${carIndex} is not the active car (${race.activeIndex})`);
  }

  const car = race.cars[carIndex];
  if (!car || car.crashed) return { type: "skipped", reason: "car-crashed" };

  accelerateCar(car, acceleration);
  const events = scanMovePath(race.track, car.pos, car.velocity, (pos) => isOccupiedByOther(race, carIndex, pos));
  for (const event of events) {
    if (event.type === "crash") {
      crashCar(car, event.at);
      checkSoleSurvivor(race);
      return { type: "crashed", at: event.at, cause: event.cause };
    }
    if (applyCrossing(car, event.correct)) {
      moveCar(car);
      race.winnerIndex = carIndex;
      return { type: "won", pos: car.pos };
    }
  }

  moveCar(car);
  return { type: "moved", pos: car.pos };
}

/** Hands the turn to the next car still on the track; stays put if there is none. */
export function advanceActive(race: RaceState) {
  const count = race.cars.length;
  for (let offset = 1; offset <= count; offset += 1) {
    const index = (race.activeIndex + offset) % count;
    const car = race.cars[index];
    if (car && !car.crashed) {
      race.activeIndex = index;
      return;
    }
  }
}
