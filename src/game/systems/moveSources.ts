import type { Car } from "../types/car";
import type { RaceState } from "../types/race";
import type { Vec2 } from "../types/track";
import { NO_ACCELERATION } from "./accelerations";
import { planForCar, type SearchOptions, type SearchResult } from "./pathSearchSystem";
import { vec, vecEquals } from "./vectorMath";

/** What the driver asks once per turn; `null` ends the race for everyone. */
export interface MoveSource {
  nextAcceleration(): Vec2 | null;
}

export function createDoNotMoveSource(): MoveSource {
  return { nextAcceleration: () => NO_ACCELERATION };
}

function replay(moves: readonly Vec2[]): MoveSource {
  let index = 0;
  return {
    nextAcceleration() {
      const move = moves[index];
      if (!move) return NO_ACCELERATION;
      index += 1;
      return move;
    }
  };
}

export function createMoveListSource(moves: readonly Vec2[]): MoveSource {
  return replay([...moves]);
}

export function createPlanSource(plan: readonly Vec2[]): MoveSource {
  return replay([...plan]);
}

function clampUnit(value: number): number {
  return Math.max(-1, Math.min(1, value));
}

/**
 * Steers toward each waypoint in turn, reading the car's live state: the
 * acceleration that would land on the waypoint next turn, clamped to ±1.
 */
export function createPathFollowerSource(waypoints: readonly Vec2[], car: Car): MoveSource {
  const targets = [...waypoints];
  let index = 0;
  return {
    nextAcceleration() {
      let target = targets[index];
      if (target && vecEquals(car.pos, target)) {
        index += 1;
        target = targets[index];
      }
      if (!target) return NO_ACCELERATION;
      return vec(
        clampUnit(target.x - car.pos.x - car.velocity.x),
        clampUnit(target.y - car.pos.y - car.velocity.y)
      );
    }
  };
}

export interface PathSearchSource {
  source: MoveSource;
  result: SearchResult;
}

/**
 * Plans once, up front. When no plan is found the car holds still and the
 * failure is handed back for the caller to report or replace.
 */
export function createPathSearchSource(race: RaceState, carIndex: number, options: SearchOptions = {}): PathSearchSource {
  const result = planForCar(race, carIndex, options);
  return {
    source: result.ok ? createPlanSource(result.plan) : createDoNotMoveSource(),
    result
  };
}
