import "dotenv/config";
import { z } from "zod";

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.string().optional(),
  // Schedule source and deep-link provider
  SCHEDULE_SOURCE_BASE_URL: z.string().url().optional(),
  DEEP_LINK_BASE_URL: z.string().url().optional(),
  // Web scraping configuration
  SCRAPER_USER_AGENT: z.string().optional(),
  SCRAPER_REQUEST_DELAY_MS: z.string().optional(),
  SCRAPER_TIMEOUT_MS: z.string().optional(),
  SCRAPER_RESPECT_ROBOTS: z.string().optional(),
  // Week cache in the schedule store
  SCHEDULE_CACHE_ENABLED: z.string().optional(),
});

const parsed = EnvSchema.safeParse(process.env);

if (!parsed.success) {
  throw new Error(`Invalid environment variables: ${parsed.error.message}`);
}

const env = parsed.data;

const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_10_1) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/39.0.2171.95 Safari/537.36";

function toPort(val: string | undefined, fallback: number): number {
  const parsedPort = parseInt(val ?? "", 10);
  return Number.isFinite(parsedPort) ? parsedPort : fallback;
}

function toFlag(val: string | undefined, fallback: boolean): boolean {
  if (val === undefined || val.trim() === "") return fallback;
  return ["1", "true", "yes"].includes(val.trim().toLowerCase());
}

const DELAY_BOUNDS = {
  MIN_MS: 0,
  MAX_MS: 60_000,
} as const;

function parseDelayMs(val: string | undefined, name: string): number {
  const raw = parseInt(val ?? "", 10);
  if (!Number.isFinite(raw)) return 0;
  if (raw < DELAY_BOUNDS.MIN_MS) {
    console.warn(`${name} below zero (${raw}ms). Clamping to ${DELAY_BOUNDS.MIN_MS}ms.`);
    return DELAY_BOUNDS.MIN_MS;
  }
  if (raw > DELAY_BOUNDS.MAX_MS) {
    console.warn(`${name} too high (${raw}ms). Clamping to maximum ${DELAY_BOUNDS.MAX_MS}ms.`);
    return DELAY_BOUNDS.MAX_MS;
  }
  return raw;
}

function withTrailingSlash(url: string): string {
  return url.endsWith("/") ? url : `${url}/`;
}

function withoutTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

export const config = {
  nodeEnv: env.NODE_ENV,
  isDev: env.NODE_ENV === "development",
  port: toPort(env.PORT, 5000),
  sourceBaseUrl: withoutTrailingSlash(env.SCHEDULE_SOURCE_BASE_URL ?? "https://www.pro-football-reference.com"),
  // Provider game pages live directly under this prefix
  deepLinkBaseUrl: withTrailingSlash(env.DEEP_LINK_BASE_URL ?? "https://www.nfl.com/games/"),
  scraperUserAgent: env.SCRAPER_USER_AGENT ?? DEFAULT_USER_AGENT,
  scraperRequestDelayMs: parseDelayMs(env.SCRAPER_REQUEST_DELAY_MS, "SCRAPER_REQUEST_DELAY_MS"),
  scraperTimeoutMs: parseInt(env.SCRAPER_TIMEOUT_MS ?? "10000", 10) || 10000,
  scraperRespectRobots: toFlag(env.SCRAPER_RESPECT_ROBOTS, false),
  scheduleCacheEnabled: toFlag(env.SCHEDULE_CACHE_ENABLED, true),
} as const;
