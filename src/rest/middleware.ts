import type { Hono } from "hono";
import { rateLimiter } from "hono-rate-limiter";
import type { AppLogger } from "@/logging";
import type { RestConfig } from "./types";

const DEFAULT_RATE_LIMIT_WINDOW_MS = 15 * 60 * 1000; // 15 minutes
const DEFAULT_RATE_LIMIT_MAX = 100;
const UNKNOWN_CLIENT_KEY = "__unknown_client__";

/**
 * Applies rate limiting middleware when a limiting header is configured.
 * The client key comes from that request header; requests without it share
 * one bucket.
 */
export function applyRateLimiting(
  app: Hono,
  config: RestConfig,
  log: (msg: string, data?: unknown) => void
): void {
  if (!config.rateLimiting?.limitingHeader) {
    return;
  }

  const { rateLimiting } = config;
  const windowMs = rateLimiting.windowMs ?? DEFAULT_RATE_LIMIT_WINDOW_MS;
  const limit = rateLimiting.limit ?? DEFAULT_RATE_LIMIT_MAX;

  app.use(
    rateLimiter({
      windowMs,
      limit,
      standardHeaders: true,
      keyGenerator: (c) => {
        const key = c.req.header(rateLimiting.limitingHeader);
        if (!key) {
          log(
            `Rate limiting header '${rateLimiting.limitingHeader}' missing from request`
          );
          return UNKNOWN_CLIENT_KEY;
        }
        return key;
      },
    })
  );

  log(`Rate limiting enabled: ${limit} requests per ${windowMs}ms window`);
}

/**
 * Writes one info record per request once the response is ready:
 * method, path, status and duration in milliseconds.
 */
export function applyRequestLogging(app: Hono, logger?: AppLogger): void {
  if (!logger) {
    return;
  }

  app.use(async (c, next) => {
    const startedAt = performance.now();
    await next();

    logger.info({
      atFunction: "REST.request",
      message: `${c.req.method} ${c.req.path}`,
      data: {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        duration_ms: Math.round(performance.now() - startedAt),
      },
    });
  });
}
