import { Hono } from "hono";
import { applyCorsConfig } from "@/cors/cors";
import type { AppLogger } from "@/logging";
import type { TaskService } from "@/tasks/types";
import { createDiagnosticsLog } from "@/utils/diagnostics-log";
import { toInternalError } from "@/utils/handle-error";
import { applyRateLimiting, applyRequestLogging } from "./middleware";
import { errorBody, respondWithError } from "./responses";
import { registerTaskRoutes } from "./task-routes";
import type { RestConfig } from "./types";

// --- Factory ---

interface CreateRestAppParams {
  config: RestConfig;
  service: TaskService;
  logger?: AppLogger;
}

/**
 * Creates the Hono REST app exposing the task service over HTTP,
 * plus GET /health for liveness checks.
 *
 * Middleware order: request logging, CORS, rate limiting, then routes.
 * Thrown errors are answered with a 500 and a generic message.
 */
export function createRestApp(params: CreateRestAppParams): Hono {
  const { config, service, logger } = params;
  const app = new Hono();

  const log = createDiagnosticsLog("REST", {
    diagnostics: config.diagnostics,
    logger,
  });

  applyRequestLogging(app, logger);

  // Apply CORS
  applyCorsConfig(app, config);

  // Apply rate limiting when a limiting header is configured
  applyRateLimiting(app, config, log);

  registerTaskRoutes(app, { service, logger });

  // Health check endpoint
  app.get("/health", (c) => c.text("OK"));

  // 404 handler
  app.notFound((c) => c.json(errorBody("route not found"), 404));

  app.onError((error, c) => {
    const internal = toInternalError(error, {
      logger,
      atFunction: `REST ${c.req.method} ${c.req.path}`,
    });
    return respondWithError(c, internal.error);
  });

  log("REST interface ready");

  return app;
}
