import { z } from "zod";
import { logger } from "./logger";

const LeaderModeSchema = z.enum(["refresh", "snapshot"]);

export type LeaderMode = z.infer<typeof LeaderModeSchema>;

// Environment variables, all optional
const EnvSchema = z.object({
  NODE_ENV: z.string().default("development"),
  LOG_LEVEL: z.string().optional(),

  // Elasticsearch
  ELASTICSEARCH_URL: z.string().url().default("http://localhost:9200"),
  ELASTICSEARCH_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  ELASTIC_CHECK_RUN_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
  ELASTIC_CHECK_LEADER_MODE: LeaderModeSchema.default("refresh"),

  // Scheduling
  CHECK_INTERVAL_SECONDS: z.coerce.number().int().positive().default(10),
  CHECK_JITTER_PERCENT: z.coerce.number().min(0).max(100).default(10),

  // Metrics server
  METRICS_PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  METRICS_HOST: z.string().default("0.0.0.0"),
});

export interface AgentConfig {
  env: string;
  isDev: boolean;
  logLevel: string;
  elasticsearch: {
    url: string;
    requestTimeoutMs?: number;
    runDelayMs: number;
    leaderMode: LeaderMode;
  };
  scheduler: {
    intervalSeconds: number;
    jitterPercent: number;
  };
  metrics: {
    port: number;
    host: string;
  };
}

/**
 * Build the agent configuration from an environment map.
 * Empty strings count as unset.
 */
export function loadConfig(env: Record<string, string | undefined>): AgentConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== "") {
      cleaned[key] = value;
    }
  }

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join("; ")}`);
  }

  const vars = parsed.data;
  const isDev = vars.NODE_ENV !== "production";

  return {
    env: vars.NODE_ENV,
    isDev,
    logLevel: vars.LOG_LEVEL || (isDev ? "debug" : "info"),
    elasticsearch: {
      url: vars.ELASTICSEARCH_URL,
      ...(vars.ELASTICSEARCH_REQUEST_TIMEOUT_MS !== undefined && {
        requestTimeoutMs: vars.ELASTICSEARCH_REQUEST_TIMEOUT_MS,
      }),
      runDelayMs: vars.ELASTIC_CHECK_RUN_DELAY_MS,
      leaderMode: vars.ELASTIC_CHECK_LEADER_MODE,
    },
    scheduler: {
      intervalSeconds: vars.CHECK_INTERVAL_SECONDS,
      jitterPercent: vars.CHECK_JITTER_PERCENT,
    },
    metrics: {
      port: vars.METRICS_PORT,
      host: vars.METRICS_HOST,
    },
  };
}

/**
 * Load config from process.env and log the result.
 * Throws when a variable is malformed.
 */
export function validateConfig(env: Record<string, string | undefined> = process.env): AgentConfig {
  let loaded: AgentConfig;
  try {
    loaded = loadConfig(env);
  } catch (error) {
    logger.error({ error }, "Configuration errors");
    throw error;
  }

  logger.info(
    {
      env: loaded.env,
      elasticsearch: loaded.elasticsearch.url,
      leaderMode: loaded.elasticsearch.leaderMode,
      intervalSeconds: loaded.scheduler.intervalSeconds,
      metricsPort: loaded.metrics.port,
    },
    "Configuration loaded",
  );

  return loaded;
}
