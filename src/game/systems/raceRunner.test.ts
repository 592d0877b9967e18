import { describe, expect, it } from "vitest";
import type { RaceState } from "../types/race";
import { ACCELERATIONS } from "./accelerations";
import { createDoNotMoveSource, createMoveListSource, createPlanSource, type MoveSource } from "./moveSources";
import { planForCar } from "./pathSearchSystem";
import { runRace, type TurnRecord } from "./raceRunner";
import { parseTrack } from "./trackGrid";
import { createRace } from "./turnSystem";

const { RIGHT } = ACCELERATIONS;

const SPRINT = ["###########", "#a      > #", "#b      > #", "###########"];

function setup(rows: readonly string[]): RaceState {
  const { track, cars } = parseTrack(rows.join("\n"));
  return createRace(track, cars);
}

describe("runRace", () => {
  it("alternates turns until a planned car wins", () => {
    const race = setup(SPRINT);
    const result = planForCar(race, 0);
    if (!result.ok) throw new Error(`search failed: ${result.reason}`);

    const summary = runRace(race, [createPlanSource(result.plan), createDoNotMoveSource()]);
    expect(summary.status).toBe("won");
    expect(summary.winnerCarId).toBe("a");
    expect(summary.turnsPlayed).toBe(7);
    expect(summary.cars.map((car) => [car.carId, car.moveCount])).toEqual([
      ["a", 4],
      ["b", 3]
    ]);
    expect(summary.cars[1]?.pos).toEqual({ x: 1, y: 2 });
  });

  it("reports every turn in order", () => {
    const race = setup(["######", "#a  b#", "######"]);
    const records: TurnRecord[] = [];
    runRace(race, [createMoveListSource([RIGHT, RIGHT]), createDoNotMoveSource()], {
      onTurn: (record) => records.push(record)
    });
    expect(records).toEqual([
      { turn: 1, carId: "a", acceleration: "RIGHT", outcome: { type: "moved", pos: { x: 2, y: 1 } } },
      { turn: 2, carId: "b", acceleration: "NONE", outcome: { type: "moved", pos: { x: 4, y: 1 } } },
      { turn: 3, carId: "a", acceleration: "RIGHT", outcome: { type: "crashed", at: { x: 4, y: 1 }, cause: "car" } }
    ]);
  });

  it("declares the sole survivor the winner", () => {
    const race = setup(["######", "#a  b#", "######"]);
    const summary = runRace(race, [createMoveListSource([RIGHT, RIGHT]), createDoNotMoveSource()]);
    expect(summary).toMatchObject({ status: "won", winnerCarId: "b", turnsPlayed: 3 });
    expect(summary.cars[0]).toMatchObject({ crashed: true, pos: { x: 4, y: 1 } });
  });

  it("ends when every car has crashed", () => {
    const race = setup(["####", "#a #", "####"]);
    const summary = runRace(race, [createMoveListSource([RIGHT, RIGHT])]);
    expect(summary).toMatchObject({ status: "all-crashed", winnerCarId: null, turnsPlayed: 2 });
    expect(summary.cars[0]?.pos).toEqual({ x: 3, y: 1 });
  });

  it("stops when a source gives up", () => {
    const race = setup(SPRINT);
    const quitter: MoveSource = { nextAcceleration: () => null };
    expect(runRace(race, [quitter, createDoNotMoveSource()])).toMatchObject({
      status: "terminated",
      winnerCarId: null,
      turnsPlayed: 0
    });
  });

  it("stops at the turn limit and idles cars without a source", () => {
    const race = setup(SPRINT);
    const summary = runRace(race, [], { maxTurns: 5 });
    expect(summary.status).toBe("turn-limit");
    expect(summary.turnsPlayed).toBe(5);
    expect(summary.cars.map((car) => car.moveCount)).toEqual([3, 2]);
  });
});
