import { ConfigError } from "./errors";

export interface Config {
  port: number;
  spotify: {
    clientId: string;
    clientSecret: string;
    redirectUri: string;
  };
  googleApiKey?: string;
  sampleIntervalMs: number;
  heartbeatIntervalMs: number;
  heartbeatTimeoutMs: number;
  driftThresholdSeconds: number;
  cacheMaxEntries: number;
  cacheFailureTtlMs: number;
  computeTimeoutMs: number;
}

const REQUIRED_ENV_VARS = ["SPOTIFY_CLIENT_ID", "SPOTIFY_CLIENT_SECRET", "SPOTIFY_REDIRECT_URI"] as const;

function readNumber(env: NodeJS.ProcessEnv, name: string, fallback: number, problems: string[]): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    problems.push(`  - ${name} must be a positive number (got "${raw}")`);
    return fallback;
  }
  return value;
}

/**
 * Build the server configuration from environment variables. Collects every
 * problem before throwing so they can be fixed in one go.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const problems: string[] = [];

  const missingVars = REQUIRED_ENV_VARS.filter((name) => !env[name]);
  missingVars.forEach((name) => problems.push(`  - ${name} is required`));

  const config: Config = {
    port: readNumber(env, "PORT", 3000, problems),
    spotify: {
      clientId: env.SPOTIFY_CLIENT_ID ?? "",
      clientSecret: env.SPOTIFY_CLIENT_SECRET ?? "",
      redirectUri: env.SPOTIFY_REDIRECT_URI ?? "",
    },
    googleApiKey: env.GOOGLE_GENERATIVE_AI_API_KEY || undefined,
    sampleIntervalMs: readNumber(env, "SAMPLE_INTERVAL_MS", 1000, problems),
    heartbeatIntervalMs: readNumber(env, "HEARTBEAT_INTERVAL_MS", 30000, problems),
    heartbeatTimeoutMs: readNumber(env, "HEARTBEAT_TIMEOUT_MS", 35000, problems),
    driftThresholdSeconds: readNumber(env, "DRIFT_THRESHOLD_SECONDS", 1, problems),
    cacheMaxEntries: readNumber(env, "CACHE_MAX_ENTRIES", 500, problems),
    cacheFailureTtlMs: readNumber(env, "CACHE_FAILURE_TTL_MS", 60000, problems),
    computeTimeoutMs: readNumber(env, "COMPUTE_TIMEOUT_MS", 60000, problems),
  };

  if (!Number.isInteger(config.port) || config.port > 65535) {
    problems.push(`  - PORT must be an integer between 1 and 65535 (got "${env.PORT}")`);
  }
  if (!Number.isInteger(config.cacheMaxEntries)) {
    problems.push(`  - CACHE_MAX_ENTRIES must be an integer (got "${env.CACHE_MAX_ENTRIES}")`);
  }
  if (config.heartbeatTimeoutMs <= config.heartbeatIntervalMs) {
    problems.push("  - HEARTBEAT_TIMEOUT_MS must be greater than HEARTBEAT_INTERVAL_MS");
  }

  if (problems.length > 0) {
    throw new ConfigError(`Invalid configuration:\n${problems.join("\n")}`);
  }

  return config;
}
