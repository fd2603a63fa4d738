import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import type { Language, TrackerPolicy } from "./tracking/types.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export interface Config {
  host: string;
  port: number;
  /** Bearer token for the API and socket handshake; empty disables auth */
  authToken: string;
  allowedOrigins: string[];
  /** Path to the claude CLI; empty means look it up on startup */
  claudeBin: string;
  /** Model passed to `claude --model` (default: CLI default) */
  claudeModel?: string;
  /** Language for sessions that don't ask for one (default: en) */
  defaultLanguage: Language;
  /** Max time in ms to wait for sessions to stop during shutdown (default: 10000) */
  gracefulTimeoutMs: number;
  tracker: TrackerPolicy;
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().min(1).max(65535).default(3460),
  AUTH_TOKEN: z.string().default(""),
  ALLOWED_ORIGINS: z.string().default("http://localhost:3000,http://localhost:5173"),
  CLAUDE_BIN: z.string().default(""),
  CLAUDE_MODEL: z.string().optional(),
  DEFAULT_LANGUAGE: z.enum(["en", "ru", "fr"]).default("en"),
  GRACEFUL_TIMEOUT_MS: positiveInt(10_000),
  SILENCE_THRESHOLD_MS: positiveInt(180_000),
  HEALTH_POLL_INTERVAL_MS: positiveInt(30_000),
  GENERATION_LATENCY_ESTIMATE_MS: positiveInt(180_000),
  INITIAL_WAIT_FLOOR_MS: positiveInt(30_000),
  CYCLE_FLOOR_MS: positiveInt(15_000),
  GENERATION_TIMEOUT_MS: positiveInt(240_000),
  DELIVERY_TIMEOUT_MS: positiveInt(30_000),
  HISTORY_LIMIT: positiveInt(10),
  EXCLUSION_WINDOW: positiveInt(5),
});

/** Build the config from an environment map. Throws on invalid values. */
export function loadConfig(env: NodeJS.ProcessEnv): Config {
  const parsed = EnvSchema.parse(env);
  return {
    host: parsed.HOST,
    port: parsed.PORT,
    authToken: parsed.AUTH_TOKEN,
    allowedOrigins: parsed.ALLOWED_ORIGINS.split(",").map((o) => o.trim()).filter(Boolean),
    claudeBin: parsed.CLAUDE_BIN,
    claudeModel: parsed.CLAUDE_MODEL || undefined,
    defaultLanguage: parsed.DEFAULT_LANGUAGE,
    gracefulTimeoutMs: parsed.GRACEFUL_TIMEOUT_MS,
    tracker: {
      silenceThresholdMs: parsed.SILENCE_THRESHOLD_MS,
      healthPollIntervalMs: parsed.HEALTH_POLL_INTERVAL_MS,
      generationLatencyEstimateMs: parsed.GENERATION_LATENCY_ESTIMATE_MS,
      initialWaitFloorMs: parsed.INITIAL_WAIT_FLOOR_MS,
      cycleFloorMs: parsed.CYCLE_FLOOR_MS,
      generationTimeoutMs: parsed.GENERATION_TIMEOUT_MS,
      deliveryTimeoutMs: parsed.DELIVERY_TIMEOUT_MS,
      historyLimit: parsed.HISTORY_LIMIT,
      exclusionWindow: parsed.EXCLUSION_WINDOW,
    },
  };
}

dotenv.config({ path: path.resolve(__dirname, "../.env") });

const config: Config = loadConfig(process.env);

export default config;
