import type { Car } from "../types/car";
import type { CellKind, FinishKind, TrackGrid, Vec2 } from "../types/track";
import { CELL_CHARS, CRASH_INDICATOR } from "../constants";
import {
  TrackFormatError,
  extractTrackBlock,
  lineCells,
  validateTrackLines
} from "../../validation/trackValidation";
import { createCar } from "./carSystem";
import { vec } from "./vectorMath";

export interface ParsedTrack {
  track: TrackGrid;
  cars: Car[];
}

const CELL_KINDS: readonly CellKind[] = ["WALL", "OPEN", "FINISH_LEFT", "FINISH_RIGHT", "FINISH_UP", "FINISH_DOWN"];
const KIND_BY_CHAR = new Map<string, CellKind>(CELL_KINDS.map((kind) => [CELL_CHARS[kind], kind]));

// Sign a velocity component must have for a crossing to count as correct.
const FINISH_RULES: Readonly<Record<FinishKind, { axis: "x" | "y"; sign: -1 | 1 }>> = {
  FINISH_LEFT: { axis: "x", sign: -1 },
  FINISH_RIGHT: { axis: "x", sign: 1 },
  FINISH_UP: { axis: "y", sign: -1 },
  FINISH_DOWN: { axis: "y", sign: 1 }
};

/**
 * Builds the board and one car per start marker, in row-major order.
 * Throws a {@link TrackFormatError} for the first problem found; nothing is
 * returned for a malformed grid.
 */
export function parseTrack(text: string, trackId = "track"): ParsedTrack {
  const lines = extractTrackBlock(text);
  const issue = validateTrackLines(lines)[0];
  if (issue) throw new TrackFormatError(issue);

  const rows = lines.map(lineCells);
  const width = rows[0]?.length ?? 0;
  const cells: CellKind[] = [];
  const cars: Car[] = [];
  rows.forEach((row, y) => {
    row.forEach((char, x) => {
      const kind = KIND_BY_CHAR.get(char);
      if (kind) {
        cells.push(kind);
        return;
      }
      cells.push("OPEN");
      cars.push(createCar(char, vec(x, y)));
    });
  });

  return {
    track: { trackId, width, height: rows.length, cells: Object.freeze(cells) },
    cars
  };
}

export function inBounds(track: TrackGrid, pos: Vec2): boolean {
  return pos.x >= 0 && pos.x < track.width && pos.y >= 0 && pos.y < track.height;
}

export function cellAt(track: TrackGrid, pos: Vec2): CellKind {
  if (!inBounds(track, pos)) return "WALL";
  return track.cells[pos.y * track.width + pos.x] ?? "WALL";
}

export function isFinishKind(kind: CellKind): kind is FinishKind {
  return kind in FINISH_RULES;
}

export function isCorrectCrossing(kind: FinishKind, velocity: Vec2): boolean {
  const rule = FINISH_RULES[kind];
  return Math.sign(velocity[rule.axis]) === rule.sign;
}

export function renderTrack(track: TrackGrid, cars: readonly Car[]): string {
  const rows: string[] = [];
  for (let y = 0; y < track.height; y += 1) {
    let row = "";
    for (let x = 0; x < track.width; x += 1) {
      const car = cars.find((c) => c.pos.x === x && c.pos.y === y);
      if (car) {
        row += car.crashed ? CRASH_INDICATOR : car.carId;
      } else {
        row += CELL_CHARS[cellAt(track, vec(x, y))];
      }
    }
    rows.push(row);
  }
  return rows.join("\n");
}
