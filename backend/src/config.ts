import { z } from "zod";

const ConfigSchema = z.object({
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().positive().default(3001),
  REDIS_URL: z.string().default("redis://redis:6379"),
  PLAN_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(3600),
  TRACKS_DIR: z.string().min(1).default("public/tracks"),
  SEARCH_MAX_DEPTH: z.coerce.number().int().positive().default(500),
  SEARCH_MAX_STATES: z.coerce.number().int().positive().default(50_000),
  RACE_MAX_TURNS: z.coerce.number().int().positive().default(1000)
});

export type BackendConfig = z.infer<typeof ConfigSchema>;

type ProcessEnv = Record<string, string | undefined>;

export function loadConfig(env: ProcessEnv = process.env): BackendConfig {
  return ConfigSchema.parse(env);
}
