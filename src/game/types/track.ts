export type CellKind = "WALL" | "OPEN" | "FINISH_LEFT" | "FINISH_RIGHT" | "FINISH_UP" | "FINISH_DOWN";

export type FinishKind = Extract<CellKind, `FINISH_${string}`>;

export interface Vec2 {
  readonly x: number;
  readonly y: number;
}

export interface TrackGrid {
  trackId: string;
  width: number;
  height: number;
  cells: readonly CellKind[]; // row-major, width * height
}
