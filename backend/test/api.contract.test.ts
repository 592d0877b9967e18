import assert from "node:assert/strict";
import test from "node:test";
import { fileURLToPath } from "node:url";
import type { BackendConfig } from "../src/config.js";
import { MemoryPlanCache } from "../src/planCache.js";
import { createApp } from "../src/server.js";
import type { PlanResponse, SimulationResponse, TrackSummary } from "../src/types.js";

const TEST_CONFIG: BackendConfig = {
  HOST: "127.0.0.1",
  PORT: 3001,
  REDIS_URL: "redis://127.0.0.1:6399",
  PLAN_CACHE_TTL_SECONDS: 120,
  TRACKS_DIR: fileURLToPath(new URL("../../public/tracks/", import.meta.url)),
  SEARCH_MAX_DEPTH: 200,
  SEARCH_MAX_STATES: 20_000,
  RACE_MAX_TURNS: 200
};

const UNREACHABLE_GRID = "#####\n#a  #\n#####";

async function createTestApp(planCache = new MemoryPlanCache<PlanResponse>()) {
  return createApp(TEST_CONFIG, { logger: false, planCache, redis: null });
}

test("reports health and the bundled tracks", async (t) => {
  const app = await createTestApp();
  t.after(async () => {
    await app.close();
  });

  const healthRes = await app.inject({ method: "GET", url: "/health" });
  assert.equal(healthRes.statusCode, 200);
  assert.deepEqual(healthRes.json(), { ok: true, redis: false, tracks: 2 });

  const listRes = await app.inject({ method: "GET", url: "/api/v1/tracks" });
  assert.deepEqual(listRes.json(), { tracks: ["loop", "sprint"] });
});

test("describes a stored track", async (t) => {
  const app = await createTestApp();
  t.after(async () => {
    await app.close();
  });

  const res = await app.inject({ method: "GET", url: "/api/v1/tracks/sprint" });
  assert.equal(res.statusCode, 200);
  const body: TrackSummary = res.json();
  assert.equal(body.trackId, "sprint");
  assert.equal(body.width, 11);
  assert.equal(body.height, 4);
  assert.deepEqual(body.cars, [
    { carId: "a", pos: { x: 1, y: 1 } },
    { carId: "b", pos: { x: 1, y: 2 } }
  ]);
  assert.deepEqual(body.rows, ["###########", "#a      > #", "#b      > #", "###########"]);

  const missingRes = await app.inject({ method: "GET", url: "/api/v1/tracks/nowhere" });
  assert.equal(missingRes.statusCode, 404);
  assert.deepEqual(missingRes.json(), { error: "Track nowhere not found." });
});

test("validates inline grids and reports the first format problem", async (t) => {
  const app = await createTestApp();
  t.after(async () => {
    await app.close();
  });

  const okRes = await app.inject({
    method: "POST",
    url: "/api/v1/tracks/validate",
    payload: { grid: UNREACHABLE_GRID }
  });
  assert.equal(okRes.statusCode, 200);
  const okBody: TrackSummary = okRes.json();
  assert.equal(okBody.trackId, "inline");

  const badRes = await app.inject({
    method: "POST",
    url: "/api/v1/tracks/validate",
    payload: { grid: "#####\n#a #\n#####" }
  });
  assert.equal(badRes.statusCode, 422);
  assert.deepEqual(badRes.json(), {
    error: "Line 2 has length 4, expected 5",
    code: "inconsistent-line-length",
    line: 2
  });
});

test("plans a route and serves repeats from the cache", async (t) => {
  const planCache = new MemoryPlanCache<PlanResponse>();
  const app = await createTestApp(planCache);
  t.after(async () => {
    await app.close();
  });

  const payload = { trackId: "sprint", carId: "a" };
  const firstRes = await app.inject({ method: "POST", url: "/api/v1/plans", payload });
  assert.equal(firstRes.statusCode, 200);
  const first: PlanResponse = firstRes.json();
  assert.equal(first.ok, true);
  if (first.ok) {
    assert.equal(first.plan.length, 4);
    assert.equal(first.trackId, "sprint");
  }
  assert.equal(planCache.size, 1);

  const secondRes = await app.inject({ method: "POST", url: "/api/v1/plans", payload });
  assert.deepEqual(secondRes.json(), first);
  assert.equal(planCache.size, 1);
});

test("returns search failures as results", async (t) => {
  const app = await createTestApp();
  t.after(async () => {
    await app.close();
  });

  const res = await app.inject({
    method: "POST",
    url: "/api/v1/plans",
    payload: { grid: UNREACHABLE_GRID, carId: "a" }
  });
  assert.equal(res.statusCode, 200);
  const body: PlanResponse = res.json();
  assert.equal(body.ok, false);
  if (!body.ok) {
    assert.equal(body.reason, "unreachable");
    assert.equal(body.trackId, "inline");
  }
});

test("rejects malformed plan requests", async (t) => {
  const app = await createTestApp();
  t.after(async () => {
    await app.close();
  });

  const bothRes = await app.inject({
    method: "POST",
    url: "/api/v1/plans",
    payload: { trackId: "sprint", grid: UNREACHABLE_GRID, carId: "a" }
  });
  assert.equal(bothRes.statusCode, 400);
  const bothBody: { error: string } = bothRes.json();
  assert.equal(bothBody.error, "invalid_request");

  const unknownCarRes = await app.inject({
    method: "POST",
    url: "/api/v1/plans",
    payload: { trackId: "sprint", carId: "z" }
  });
  assert.equal(unknownCarRes.statusCode, 404);
  assert.deepEqual(unknownCarRes.json(), { error: "Car z not found on track sprint." });
});

test("simulates a race to the finish", async (t) => {
  const app = await createTestApp();
  t.after(async () => {
    await app.close();
  });

  const res = await app.inject({
    method: "POST",
    url: "/api/v1/races/simulate",
    payload: { trackId: "sprint", cars: { a: { type: "path-search" } } }
  });
  assert.equal(res.statusCode, 200);
  const body: SimulationResponse = res.json();
  assert.equal(body.trackId, "sprint");
  assert.equal(body.status, "won");
  assert.equal(body.winnerCarId, "a");
  assert.equal(body.turnsPlayed, 7);
  assert.equal(body.turns.length, 7);
  assert.equal(body.turns[6]?.outcome.type, "won");
  assert.equal(body.searches.length, 1);
  assert.equal(body.searches[0]?.planLength, 4);
});

test("rejects race setups for cars missing from the grid", async (t) => {
  const app = await createTestApp();
  t.after(async () => {
    await app.close();
  });

  const res = await app.inject({
    method: "POST",
    url: "/api/v1/races/simulate",
    payload: { grid: UNREACHABLE_GRID, cars: { q: { type: "do-not-move" } } }
  });
  assert.equal(res.statusCode, 400);
  assert.deepEqual(res.json(), { error: "Unknown car id(s): q", code: "unknown-car-id" });
});
