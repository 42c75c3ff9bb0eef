import z from "zod";
import type { LogChunking, LogMode } from "@/logging";
import { Err, Ok, type Result } from "@/utils/result";

export interface RateLimitSettings {
  /** Request header identifying the client */
  header: string;
  max: number;
  windowMs: number;
}

export interface AppConfig {
  host: string;
  port: number;
  mode: LogMode;
  logChunking: LogChunking;
  /** Empty means any origin */
  allowedOrigins: string[];
  /** Present only when RATE_LIMIT_HEADER is set */
  rateLimit?: RateLimitSettings;
  shutdownTimeoutMs: number;
  diagnostics: boolean;
}

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  SERVER_HOST: z.string().min(1).default("localhost"),
  SERVER_PORT: z.coerce.number().int().min(1).max(65_535).default(8080),
  MODE: z.enum(["dev", "prod", "agentic"]).default("dev"),
  LOG_CHUNKING: z.enum(["none", "daily", "weekly", "monthly"]).default("none"),
  ALLOWED_ORIGINS: z.string().default(""),
  RATE_LIMIT_HEADER: z.string().optional(),
  RATE_LIMIT_MAX: positiveInt(100),
  RATE_LIMIT_WINDOW_MS: positiveInt(15 * 60 * 1000),
  SHUTDOWN_TIMEOUT_MS: positiveInt(30_000),
  DIAGNOSTICS: z.enum(["true", "false", "1", "0"]).default("false"),
});

export type EnvSource = Record<string, string | undefined>;

/** Splits a comma-separated list, dropping blanks */
export const splitList = (value: string): string[] =>
  value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item !== "");

/**
 * Reads and validates the service configuration from environment variables.
 * Unset and empty variables take their defaults. On failure the error lists
 * every offending variable.
 */
export function loadConfig(
  env: EnvSource = process.env
): Result<AppConfig, string> {
  // Empty strings count as unset so `FOO=` in a .env file falls back to the default
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    return Err(`Invalid configuration:\n${z.prettifyError(parsed.error)}`);
  }

  const vars = parsed.data;
  const rateLimitHeader = vars.RATE_LIMIT_HEADER?.trim();

  return Ok({
    host: vars.SERVER_HOST,
    port: vars.SERVER_PORT,
    mode: vars.MODE,
    logChunking: vars.LOG_CHUNKING,
    allowedOrigins: splitList(vars.ALLOWED_ORIGINS),
    rateLimit: rateLimitHeader
      ? {
          header: rateLimitHeader,
          max: vars.RATE_LIMIT_MAX,
          windowMs: vars.RATE_LIMIT_WINDOW_MS,
        }
      : undefined,
    shutdownTimeoutMs: vars.SHUTDOWN_TIMEOUT_MS,
    diagnostics: vars.DIAGNOSTICS === "true" || vars.DIAGNOSTICS === "1",
  });
}
