import { z } from "zod";

const ConfigSchema = z.object({
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().positive().default(3000),
  // Empty keeps records in process memory.
  REDIS_URL: z.string().default(""),
  CORS_ALLOWED_ORIGINS: z.string().default("*"),
  LOBBY_LIST_MODE: z.enum(["per_user", "all"]).default("per_user"),
  COUNTDOWN_INTERVAL_MS: z.coerce.number().int().positive().default(1000),
  RACE_TICK_MS: z.coerce.number().int().positive().default(500),
  RANDOM_SEED: z.coerce.number().int().optional()
});

export type BackendConfig = z.infer<typeof ConfigSchema>;

type ProcessEnv = Record<string, string | undefined>;

export function loadConfig(env: ProcessEnv = process.env): BackendConfig {
  return ConfigSchema.parse(env);
}
