import type { CellKind } from "./types/track";

export const MAX_CARS = 9;
export const CRASH_INDICATOR = "X";
export const DEFAULT_SEARCH_MAX_DEPTH = 500;
export const DEFAULT_SEARCH_MAX_STATES = 50_000;
export const DEFAULT_RACE_MAX_TURNS = 1000;
export const CELL_CHARS = {
  WALL: "#",
  OPEN: " ",
  FINISH_LEFT: "<",
  FINISH_RIGHT: ">",
  FINISH_UP: "^",
  FINISH_DOWN: "v"
} as const satisfies Record<CellKind, string>;
