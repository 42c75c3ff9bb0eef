import type { AppConfig } from "@/config/config";
import { createLogger } from "@/logging";
import { createRestApp } from "@/rest/rest";
import type { RestConfig } from "@/rest/types";
import { createTaskService } from "@/tasks/service";
import { createTaskStore } from "@/tasks/store";
import { createDiagnosticsLog } from "@/utils/diagnostics-log";
import type { TaskServer, TaskServerOverrides } from "./types";

export const APP_NAME = "task-service";

export function toRestConfig(config: AppConfig): RestConfig {
  return {
    diagnostics: config.diagnostics,
    allowedOrigins: config.allowedOrigins,
    rateLimiting: config.rateLimit
      ? {
          limitingHeader: config.rateLimit.header,
          limit: config.rateLimit.max,
          windowMs: config.rateLimit.windowMs,
        }
      : undefined,
  };
}

/**
 * Bootstraps the task service.
 *
 * Wires the logger, the in-memory store, the task service and the REST app.
 * Nothing listens yet; hand the result to startServer for that.
 *
 * @param config - Validated configuration, usually from loadConfig
 * @param overrides - Replacement logger, clock or ID source
 */
export function createTaskServer(
  config: AppConfig,
  overrides: TaskServerOverrides = {}
): TaskServer {
  const logger =
    overrides.logger ??
    createLogger(APP_NAME, { mode: config.mode, chunking: config.logChunking });

  const log = createDiagnosticsLog("TaskServer", {
    diagnostics: config.diagnostics,
    logger,
  });

  const store = createTaskStore({ logger, now: overrides.now });
  const service = createTaskService({
    store,
    logger,
    now: overrides.now,
    nextId: overrides.nextId,
  });
  log("Store and task service initialized");

  const app = createRestApp({ config: toRestConfig(config), service, logger });

  log(`${APP_NAME} ready`, {
    rate_limiting: Boolean(config.rateLimit),
    allowed_origins: config.allowedOrigins,
  });

  return { config, store, service, app, logger };
}
