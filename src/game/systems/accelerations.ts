import type { Vec2 } from "../types/track";
import { signVec, vec } from "./vectorMath";

export const ACCELERATION_NAMES = [
  "UP_LEFT",
  "UP",
  "UP_RIGHT",
  "LEFT",
  "NONE",
  "RIGHT",
  "DOWN_LEFT",
  "DOWN",
  "DOWN_RIGHT"
] as const;

export type AccelerationName = (typeof ACCELERATION_NAMES)[number];

// y grows downward, matching row order on the board.
export const ACCELERATIONS: Readonly<Record<AccelerationName, Vec2>> = {
  UP_LEFT: vec(-1, -1),
  UP: vec(0, -1),
  UP_RIGHT: vec(1, -1),
  LEFT: vec(-1, 0),
  NONE: vec(0, 0),
  RIGHT: vec(1, 0),
  DOWN_LEFT: vec(-1, 1),
  DOWN: vec(0, 1),
  DOWN_RIGHT: vec(1, 1)
};

export const NO_ACCELERATION = ACCELERATIONS.NONE;

export function isAccelerationName(name: string): name is AccelerationName {
  return ACCELERATION_NAMES.some((known) => known === name);
}

export function accelerationByName(name: string): Vec2 | null {
  return isAccelerationName(name) ? ACCELERATIONS[name] : null;
}

export function isAcceleration(v: Vec2): boolean {
  return Number.isInteger(v.x) && Number.isInteger(v.y) && Math.abs(v.x) <= 1 && Math.abs(v.y) <= 1;
}

/** Name of the direction a vector points in, i.e. of its component signs. */
export function accelerationName(v: Vec2): AccelerationName {
  const s = signVec(v);
  const found = ACCELERATION_NAMES.find((name) => ACCELERATIONS[name].x === s.x && ACCELERATIONS[name].y === s.y);
  return found ?? "NONE";
}
