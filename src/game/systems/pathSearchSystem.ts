import type { RaceState } from "../types/race";
import type { TrackGrid, Vec2 } from "../types/track";
import { DEFAULT_SEARCH_MAX_DEPTH, DEFAULT_SEARCH_MAX_STATES } from "../constants";
import { ACCELERATIONS, ACCELERATION_NAMES } from "./accelerations";
import { RaceRuleError, scanMovePath, type PathEvent } from "./turnSystem";
import { addVec, vecKey } from "./vectorMath";

export interface SearchOptions {
  maxDepth?: number;
  maxStates?: number;
}

export interface SearchStart {
  pos: Vec2;
  velocity: Vec2;
}

export interface SearchState {
  pos: Vec2;
  velocity: Vec2;
  parent: SearchState | null;
  acceleration: Vec2 | null;
  depth: number;
  // Set when the move into this state crosses a finish line the right way.
  finished: boolean;
}

export const SEARCH_FAILURE_REASONS = ["depth-limit", "state-limit", "unreachable", "incorrect-crossing-recorded", "car-crashed"] as const;

export type SearchFailureReason = (typeof SEARCH_FAILURE_REASONS)[number];

export type SearchResult =
  | { ok: true; plan: Vec2[]; statesExplored: number }
  | { ok: false; reason: SearchFailureReason; statesExplored: number };

const DEFAULTS: Required<SearchOptions> = {
  maxDepth: DEFAULT_SEARCH_MAX_DEPTH,
  maxStates: DEFAULT_SEARCH_MAX_STATES
};

const STEP_ORDER: readonly Vec2[] = ACCELERATION_NAMES.map((name) => ACCELERATIONS[name]);

/** (position, velocity) pairs already queued, keyed without string building. */
class VisitedStates {
  private byPos = new Map<number, Set<number>>();

  add(pos: Vec2, velocity: Vec2): boolean {
    const posKey = vecKey(pos);
    const velocities = this.byPos.get(posKey) ?? new Set<number>();
    const velKey = vecKey(velocity);
    if (velocities.has(velKey)) return false;
    velocities.add(velKey);
    this.byPos.set(posKey, velocities);
    return true;
  }
}

type MoveVerdict = "blocked" | "finish" | "clear";

// Stricter than the turn rule: a wrong-way crossing is treated like a wall.
function judgeMove(events: readonly PathEvent[]): MoveVerdict {
  const first = events[0];
  if (!first) return "clear";
  if (first.type === "crash" || !first.correct) return "blocked";
  return "finish";
}

function buildPlan(goal: SearchState): Vec2[] {
  const plan: Vec2[] = [];
  let current: SearchState | null = goal;
  while (current?.acceleration) {
    plan.push(current.acceleration);
    current = current.parent;
  }
  return plan.reverse();
}

/**
 * Breadth-first search over (position, velocity) for the fewest accelerations
 * that make the car cross a finish line the right way. Only direct wins are
 * planned: a move whose first finish crossing goes the wrong way is treated
 * like a wall. Cells past a winning crossing are never judged.
 * `obstacles` are the cells of the other cars still racing.
 */
export function findPlan(
  track: TrackGrid,
  start: SearchStart,
  obstacles: readonly Vec2[],
  options: SearchOptions = {}
): SearchResult {
  const maxDepth = options.maxDepth ?? DEFAULTS.maxDepth;
  const maxStates = options.maxStates ?? DEFAULTS.maxStates;
  const blocked = new Set(obstacles.map(vecKey));
  const isOccupied = (pos: Vec2) => blocked.has(vecKey(pos));

  const root: SearchState = {
    pos: start.pos,
    velocity: start.velocity,
    parent: null,
    acceleration: null,
    depth: 0,
    finished: false
  };
  const visited = new VisitedStates();
  visited.add(root.pos, root.velocity);
  const queue: SearchState[] = [root];
  let queueIndex = 0;
  let statesExplored = 0;
  let depthCut = false;

  while (queueIndex < queue.length) {
    if (statesExplored >= maxStates) {
      return { ok: false, reason: "state-limit", statesExplored };
    }
    const state = queue[queueIndex++];
    if (!state) break;
    statesExplored += 1;

    if (state.finished) {
      return { ok: true, plan: buildPlan(state), statesExplored };
    }
    if (state.depth >= maxDepth) {
      depthCut = true;
      continue;
    }

    for (const acceleration of STEP_ORDER) {
      const velocity = addVec(state.velocity, acceleration);
      const verdict = judgeMove(scanMovePath(track, state.pos, velocity, isOccupied));
      if (verdict === "blocked") continue;
      const pos = addVec(state.pos, velocity);
      // Finishing moves are kept even if a plain move already reached the same state.
      if (!visited.add(pos, velocity) && verdict !== "finish") continue;
      queue.push({
        pos,
        velocity,
        parent: state,
        acceleration,
        depth: state.depth + 1,
        finished: verdict === "finish"
      });
    }
  }

  return { ok: false, reason: depthCut ? "depth-limit" : "unreachable", statesExplored };
}

export function planForCar(race: RaceState, carIndex: number, options: SearchOptions = {}): SearchResult {
  const car = race.cars[carIndex];
  if (!car) {
    throw new RaceRuleError("car-index-out-of-range", `Invalid car index: ${carIndex}`);
  }
  if (car.crashed) {
    return { ok: false, reason: "car-crashed", statesExplored: 0 };
  }
  if (car.crossing.hasIncorrectCrossing) {
    return { ok: false, reason: "incorrect-crossing-recorded", statesExplored: 0 };
  }
  const obstacles = race.cars
    .filter((other, index) => index !== carIndex && !other.crashed)
    .map((other) => other.pos);
  return findPlan(race.track, { pos: car.pos, velocity: car.velocity }, obstacles, options);
}
