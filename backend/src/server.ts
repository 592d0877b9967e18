import Fastify, { type FastifyBaseLogger } from "fastify";
import { createHash } from "node:crypto";
import { pathToFileURL } from "node:url";
import { createClient } from "redis";
import { ZodError, z } from "zod";
import { startRace } from "../../src/game/index";
import { accelerationName } from "../../src/game/systems/accelerations";
import { planForCar } from "../../src/game/systems/pathSearchSystem";
import { runRace, type TurnRecord } from "../../src/game/systems/raceRunner";
import { parseTrack, renderTrack, type ParsedTrack } from "../../src/game/systems/trackGrid";
import { RaceRuleError, createRace } from "../../src/game/systems/turnSystem";
import { raceSetupSchema } from "../../src/validation/raceSetupSchema";
import { TrackFormatError } from "../../src/validation/trackValidation";
import { loadConfig, type BackendConfig } from "./config.js";
import { MemoryPlanCache, RedisPlanCache, type PlanCache } from "./planCache.js";
import { ServiceError } from "./serviceError.js";
import { TrackLibrary } from "./trackLibrary.js";
import { planResponseSchema, type PlanResponse, type SimulationResponse, type TrackSummary } from "./types.js";

const API_V1_PREFIX = "/api/v1";
const INLINE_TRACK_ID = "inline";

type RedisClient = ReturnType<typeof createClient>;

type CreateAppOptions = {
  logger?: boolean;
  planCache?: PlanCache<PlanResponse>;
  redis?: RedisClient | null;
};

const searchBounds = {
  maxDepth: z.number().int().min(1).max(5000).optional(),
  maxStates: z.number().int().min(1).max(1_000_000).optional()
};

const trackSource = {
  trackId: z.string().min(1).optional(),
  grid: z.string().min(1).optional()
};

function hasOneTrackSource(body: { trackId?: string; grid?: string }): boolean {
  return (body.trackId === undefined) !== (body.grid === undefined);
}

const TRACK_SOURCE_MESSAGE = "Provide exactly one of trackId or grid.";

const TrackPathSchema = z.object({
  trackId: z.string().min(1)
});

const ValidateTrackSchema = z.object({
  grid: z.string()
});

const PlanRequestSchema = z
  .object({
    ...trackSource,
    carId: z.string().min(1),
    ...searchBounds
  })
  .refine(hasOneTrackSource, TRACK_SOURCE_MESSAGE);

const SimulateRequestSchema = z
  .object({
    ...trackSource,
    cars: raceSetupSchema.optional(),
    maxTurns: z.number().int().min(1).max(100_000).optional()
  })
  .refine(hasOneTrackSource, TRACK_SOURCE_MESSAGE);

async function createPlanCache(
  redisUrl: string,
  log: FastifyBaseLogger
): Promise<{ planCache: PlanCache<PlanResponse>; redis: RedisClient | null }> {
  const redis = createClient({ url: redisUrl, socket: { connectTimeout: 2000, reconnectStrategy: false } });
  redis.on("error", (error: unknown) => {
    log.warn({ err: error }, "redis_error");
  });
  try {
    await redis.connect();
    return {
      planCache: new RedisPlanCache<PlanResponse>(redis, (raw) => planResponseSchema.parse(raw)),
      redis
    };
  } catch (error) {
    log.warn({ err: error }, "redis unavailable, caching plans in memory");
    await redis.disconnect().catch((disconnectError: unknown) => {
      log.debug({ err: disconnectError }, "redis disconnect after failed connect");
    });
    return { planCache: new MemoryPlanCache<PlanResponse>(), redis: null };
  }
}

function summarizeTrack({ track, cars }: ParsedTrack): TrackSummary {
  return {
    trackId: track.trackId,
    width: track.width,
    height: track.height,
    cars: cars.map((car) => ({ carId: car.carId, pos: car.pos })),
    rows: renderTrack(track, cars).split("\n")
  };
}

export async function createApp(config: BackendConfig, options: CreateAppOptions = {}) {
  const app = Fastify({ logger: options.logger ?? true });
  const library = new TrackLibrary(config.TRACKS_DIR);
  const { planCache, redis } = options.planCache
    ? { planCache: options.planCache, redis: options.redis ?? null }
    : await createPlanCache(config.REDIS_URL, app.log);

  function logRace(event: string, context: Record<string, unknown>) {
    app.log.info({ event, ...context }, "race_event");
  }

  async function resolveTrackText(body: { trackId?: string; grid?: string }): Promise<{ trackId: string; text: string }> {
    if (body.grid !== undefined) {
      return { trackId: INLINE_TRACK_ID, text: body.grid };
    }
    const trackId = body.trackId ?? "";
    const text = await library.load(trackId);
    if (text === null) {
      throw new ServiceError(404, `Track ${trackId} not found.`);
    }
    return { trackId, text };
  }

  app.setErrorHandler((error, _request, reply) => {
    if (error instanceof ServiceError) {
      reply.code(error.statusCode).send({ error: error.message });
      return;
    }
    if (error instanceof TrackFormatError) {
      reply.code(422).send({ error: error.message, code: error.code, line: error.line });
      return;
    }
    if (error instanceof RaceRuleError) {
      reply.code(400).send({ error: error.message, code: error.code });
      return;
    }
    if (error instanceof ZodError) {
      reply.code(400).send({ error: "invalid_request", issues: error.issues });
      return;
    }
    if (error.statusCode !== undefined && error.statusCode < 500) {
      reply.code(error.statusCode).send({ error: error.message });
      return;
    }
    app.log.error(error);
    reply.code(500).send({ error: "internal_error" });
  });

  app.get("/health", async () => ({
    ok: true,
    redis: redis?.isReady ?? false,
    tracks: (await library.list()).length
  }));

  app.get(`${API_V1_PREFIX}/tracks`, async () => ({
    tracks: await library.list()
  }));

  app.get(`${API_V1_PREFIX}/tracks/:trackId`, async (request) => {
    const params = TrackPathSchema.parse(request.params);
    const { trackId, text } = await resolveTrackText({ trackId: params.trackId });
    return summarizeTrack(parseTrack(text, trackId));
  });

  app.post(`${API_V1_PREFIX}/tracks/validate`, async (request) => {
    const body = ValidateTrackSchema.parse(request.body);
    return summarizeTrack(parseTrack(body.grid, INLINE_TRACK_ID));
  });

  app.post(`${API_V1_PREFIX}/plans`, async (request) => {
    const body = PlanRequestSchema.parse(request.body);
    const { trackId, text } = await resolveTrackText(body);
    const { track, cars } = parseTrack(text, trackId);
    const carIndex = cars.findIndex((car) => car.carId === body.carId);
    if (carIndex < 0) {
      throw new ServiceError(404, `Car ${body.carId} not found on track ${trackId}.`);
    }

    const maxDepth = body.maxDepth ?? config.SEARCH_MAX_DEPTH;
    const maxStates = body.maxStates ?? config.SEARCH_MAX_STATES;
    const cacheKey = `plan:${createHash("sha256")
      .update(JSON.stringify([trackId, text, body.carId, maxDepth, maxStates]))
      .digest("hex")}`;
    const cached = await planCache.get(cacheKey);
    if (cached) {
      logRace("plan.cache_hit", { trackId, carId: body.carId });
      return cached;
    }

    const startedAt = Date.now();
    const result = planForCar(createRace(track, cars), carIndex, { maxDepth, maxStates });
    const response: PlanResponse = result.ok
      ? {
          ok: true,
          trackId,
          carId: body.carId,
          plan: result.plan.map(accelerationName),
          statesExplored: result.statesExplored
        }
      : {
          ok: false,
          trackId,
          carId: body.carId,
          reason: result.reason,
          statesExplored: result.statesExplored
        };
    await planCache.set(cacheKey, response, config.PLAN_CACHE_TTL_SECONDS);
    logRace(result.ok ? "plan.found" : "plan.failed", {
      trackId,
      carId: body.carId,
      planLength: result.ok ? result.plan.length : null,
      reason: result.ok ? null : result.reason,
      statesExplored: result.statesExplored,
      elapsedMs: Date.now() - startedAt
    });
    return response;
  });

  app.post(`${API_V1_PREFIX}/races/simulate`, async (request) => {
    const body = SimulateRequestSchema.parse(request.body);
    const { trackId, text } = await resolveTrackText(body);
    const { race, sources, searches } = startRace(text, body.cars ?? {}, {
      trackId,
      search: { maxDepth: config.SEARCH_MAX_DEPTH, maxStates: config.SEARCH_MAX_STATES }
    });
    for (const search of searches) {
      if (!search.result.ok) {
        logRace("plan.failed", { trackId, carId: search.carId, reason: search.result.reason });
      }
    }

    const turns: TurnRecord[] = [];
    const summary = runRace(race, sources, {
      maxTurns: body.maxTurns ?? config.RACE_MAX_TURNS,
      onTurn: (record) => {
        turns.push(record);
      }
    });
    logRace("race.end", {
      trackId,
      status: summary.status,
      winnerCarId: summary.winnerCarId,
      turnsPlayed: summary.turnsPlayed
    });

    const response: SimulationResponse = {
      trackId,
      ...summary,
      searches: searches.map(({ carId, result }) =>
        result.ok
          ? { carId, ok: true, planLength: result.plan.length, statesExplored: result.statesExplored }
          : { carId, ok: false, reason: result.reason, statesExplored: result.statesExplored }
      ),
      turns
    };
    return response;
  });

  app.addHook("onClose", async () => {
    if (redis) {
      await redis.disconnect();
    }
  });

  return app;
}

async function bootstrap() {
  const config = loadConfig();
  const app = await createApp(config);
  await app.listen({ host: config.HOST, port: config.PORT });
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  bootstrap().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}
