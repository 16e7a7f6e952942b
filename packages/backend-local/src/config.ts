import { createDuelConfig, type DuelConfig } from "./core.js";
import { parseLogLevel, type LogLevel } from "./logger.js";

export const DEFAULT_SECRET_KEY = "change-me-in-production-min-32-bytes-key";

const NON_PRODUCTION_ENVS = new Set(["development", "dev", "test", "testing"]);

export interface OracleSettings {
  readonly enabled: boolean;
  readonly url: string;
  readonly apiKey: string;
}

export interface BackendSettings {
  readonly env: string;
  readonly port: number;
  readonly secretKey: string;
  readonly tokenTtlMinutes: number;
  readonly corsOrigin: string;
  readonly httpRequestsPerMinute: number;
  readonly wsMessagesPerMinute: number;
  readonly keepaliveMs: number;
  readonly wordsFile: string | undefined;
  readonly logLevel: LogLevel;
  readonly oracle: OracleSettings;
  readonly duel: DuelConfig;
}

export type Environment = Readonly<Record<string, string | undefined>>;

function asInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : fallback;
}

function asBool(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

function asList(value: string | undefined, fallback: readonly string[]): string[] {
  if (value === undefined) return [...fallback];
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function isProduction(env: string): boolean {
  return !NON_PRODUCTION_ENVS.has(env.toLowerCase());
}

/**
 * Read settings from environment variables. Unparsable numbers fall back to
 * defaults; a production environment must provide its own `SECRET_KEY`.
 */
export function loadBackendSettings(env: Environment): BackendSettings {
  const nodeEnv = env["NODE_ENV"]?.trim() || "development";
  const secretKey = env["SECRET_KEY"]?.trim() || DEFAULT_SECRET_KEY;

  if (isProduction(nodeEnv) && secretKey === DEFAULT_SECRET_KEY) {
    throw new Error("SECRET_KEY must be explicitly set in production");
  }

  const oracleUrl = env["ORACLE_URL"]?.trim() ?? "";

  const duel = createDuelConfig({
    turnTimeoutSeconds: Math.max(1, asInt(env["TURN_TIMEOUT_SECONDS"], 30)),
    roomCodeLength: Math.max(4, asInt(env["ROOM_CODE_LENGTH"], 8)),
    roomCodeAttempts: Math.max(3, asInt(env["ROOM_CODE_ATTEMPTS"], 12)),
    defaultRating: asInt(env["DEFAULT_RATING"], 1000),
    kFactor: asInt(env["K_FACTOR"], 32),
    defaultTargetScore: asInt(env["TARGET_SCORE_DEFAULT"], 10),
    banSeconds: asInt(env["BAN_SECONDS"], 300),
    maxJoinFailuresPerMinute: asInt(env["MAX_JOIN_FAILURES_PER_MIN"], 12),
    suspiciousAttemptsPerMinute: asInt(env["SUSPICIOUS_ATTEMPTS_PER_MIN"], 8),
    submitsPerMinute: asInt(env["RATE_LIMIT_SUBMITS_PER_MIN"], 40),
    farmWinsPerMinuteThreshold: asInt(env["FARM_WINS_PER_MIN_THRESHOLD"], 5),
    scoreCacheTtlSeconds: asInt(env["SCORE_CACHE_TTL_SECONDS"], 60 * 60 * 24),
    oracleTimeoutMs: Math.max(300, asInt(env["ORACLE_TIMEOUT_MS"], 1_500)),
    adminDisplayNames: asList(env["ADMIN_DISPLAY_NAMES"], ["admin"]),
  });

  return {
    env: nodeEnv,
    port: asInt(env["PORT"], 8787),
    secretKey,
    tokenTtlMinutes: asInt(env["TOKEN_TTL_MINUTES"], 60 * 12),
    corsOrigin: env["CORS_ORIGIN"]?.trim() || "*",
    httpRequestsPerMinute: asInt(env["RATE_LIMIT_REQUESTS_PER_MIN"], 60),
    wsMessagesPerMinute: asInt(env["RATE_LIMIT_WS_MESSAGES_PER_MIN"], 120),
    keepaliveMs: asInt(env["KEEPALIVE_MS"], 45_000),
    wordsFile: env["WORDS_FILE"]?.trim() || undefined,
    logLevel: parseLogLevel(env["LOG_LEVEL"]),
    oracle: {
      enabled: asBool(env["ENABLE_ORACLE"], true) && oracleUrl.length > 0,
      url: oracleUrl,
      apiKey: env["ORACLE_API_KEY"]?.trim() ?? "",
    },
    duel,
  };
}
