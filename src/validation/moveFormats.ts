import type { Vec2 } from "../game/types/track";
import { ACCELERATION_NAMES, accelerationByName } from "../game/systems/accelerations";
import { parseVec } from "../game/systems/vectorMath";
import { TrackFormatError, isBlankLine, splitLines } from "./trackValidation";

/** One acceleration name per line, e.g. `UP_RIGHT`; blank lines are skipped. */
export function parseMoveList(text: string): Vec2[] {
  const moves: Vec2[] = [];
  splitLines(text).forEach((raw, index) => {
    if (isBlankLine(raw)) return;
    const name = raw.trim();
    const move = accelerationByName(name);
    if (!move) {
      throw new TrackFormatError({
        code: "invalid-move-format",
        message: `Invalid move at line ${index + 1}: '${name}'. Must be one of ${ACCELERATION_NAMES.join(", ")}`,
        line: index + 1
      });
    }
    moves.push(move);
  });
  return moves;
}

/** One `(X:<int>, Y:<int>)` per line; at least one waypoint is required. */
export function parseWaypoints(text: string): Vec2[] {
  const waypoints: Vec2[] = [];
  splitLines(text).forEach((raw, index) => {
    if (isBlankLine(raw)) return;
    const point = parseVec(raw);
    if (!point) {
      throw new TrackFormatError({
        code: "invalid-waypoint-format",
        message: `Invalid waypoint at line ${index + 1}: '${raw.trim()}'`,
        line: index + 1
      });
    }
    waypoints.push(point);
  });
  if (waypoints.length === 0) {
    throw new TrackFormatError({ code: "invalid-waypoint-format", message: "Waypoint list is empty" });
  }
  return waypoints;
}
