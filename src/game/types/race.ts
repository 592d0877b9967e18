import type { Car } from "./car";
import type { TrackGrid } from "./track";

export interface RaceState {
  track: TrackGrid;
  cars: Car[];
  activeIndex: number;
  winnerIndex: number | null;
}
