import * as dotenv from "dotenv";
import { ChannelSettings } from "./types.js";

dotenv.config();

function parseNumber(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const parsed = Number.parseFloat(raw);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

function optional(raw: string | undefined): string | undefined {
  return raw === undefined || raw === "" ? undefined : raw;
}

/**
 * Network-level configuration shared by every downloader in the process.
 *
 * Invariant: `CONCURRENCY` must be positive.
 */
export const NET = {
  CONCURRENCY: Math.max(1, Math.floor(parseNumber(process.env.CHANNEL_CONCURRENCY, 6))),
  RETRY_ATTEMPTS: 3,
  RETRY_BASE_DELAY_MS: 500
} as const;

/**
 * Defaults applied when neither the environment nor the caller provides a value.
 */
export const DEFAULT_SETTINGS: ChannelSettings = {
  cacheLength: 300,
  debug: false,
  timeout: 30,
  userAgent: "ChannelResolver/1.0"
};

/**
 * Build provider settings from the environment, then apply explicit overrides.
 *
 * @param overrides - Values that win over anything read from the environment.
 * @param env - Environment to read, `process.env` unless given.
 */
export function loadSettings(
  overrides: Partial<ChannelSettings> = {},
  env: NodeJS.ProcessEnv = process.env
): ChannelSettings {
  const fromEnv: ChannelSettings = {
    cacheLength: parseNumber(env.CHANNEL_CACHE_LENGTH, DEFAULT_SETTINGS.cacheLength),
    debug: (env.CHANNEL_DEBUG ?? "false").toLowerCase() === "true",
    timeout: parseNumber(env.CHANNEL_TIMEOUT, DEFAULT_SETTINGS.timeout),
    userAgent: optional(env.CHANNEL_USER_AGENT) ?? DEFAULT_SETTINGS.userAgent,
    httpProxy: optional(env.HTTP_PROXY),
    httpsProxy: optional(env.HTTPS_PROXY),
    proxyUsername: optional(env.PROXY_USERNAME),
    proxyPassword: optional(env.PROXY_PASSWORD)
  };
  return { ...fromEnv, ...overrides };
}
