import type { Vec2 } from "./track";

// Finish-line bookkeeping, only touched by the crossing rule in the turn system.
export interface CrossingRecord {
  hasIncorrectCrossing: boolean;
  consecutiveCorrect: number;
}

export interface Car {
  carId: string;
  pos: Vec2;
  velocity: Vec2;
  crashed: boolean;
  moveCount: number;
  crossing: CrossingRecord;
}
