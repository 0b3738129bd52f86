/**
 * Environment Configuration
 * Builds an immutable, type-safe config from environment variables.
 * Fails fast at startup if required variables are missing or malformed.
 */

export interface AppConfig {
  readonly port: number;
  readonly nodeEnv: string;
  /** Static key every protected route compares `?apikey=` against. */
  readonly apiKey: string;
  /** Longest video (seconds) the service will resolve. */
  readonly maxDurationSeconds: number;
  readonly ytdlpPath: string;
  /** Per-call ceiling for a single extractor run. */
  readonly extractionTimeoutMs: number;
  /** Optional Netscape cookie file handed to yt-dlp. */
  readonly cookiesPath?: string;
  /** Reported by /health to tell instances apart. */
  readonly serviceInstanceId: string;
}

export const DEFAULT_MAX_DURATION_SECONDS = 3600;
export const DEFAULT_EXTRACTION_TIMEOUT_MS = 60_000;

/**
 * Reads the config from an environment map (process.env by default).
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return Object.freeze({
    port: getIntegerEnv(env, "PORT", 3000),
    nodeEnv: env.NODE_ENV || "development",
    apiKey: getRequiredEnv(env, "API_KEY"),
    maxDurationSeconds: getIntegerEnv(env, "MAX_DURATION_SECONDS", DEFAULT_MAX_DURATION_SECONDS),
    ytdlpPath: env.YTDLP_PATH || "yt-dlp",
    extractionTimeoutMs: getIntegerEnv(env, "EXTRACTION_TIMEOUT_MS", DEFAULT_EXTRACTION_TIMEOUT_MS),
    cookiesPath: env.YTDLP_COOKIES_PATH || undefined,
    serviceInstanceId: env.SERVICE_INSTANCE_ID || env.RENDER_SERVICE_ID || "local",
  });
}

/**
 * Helper to safely retrieve required environment variables.
 * Throws immediately if variable is missing.
 */
function getRequiredEnv(env: NodeJS.ProcessEnv, key: string): string {
  const value = env[key];
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getIntegerEnv(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const value = env[key];
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Environment variable ${key} must be a positive integer, got '${value}'`);
  }
  return parsed;
}
