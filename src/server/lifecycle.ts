import { serve } from "@hono/node-server";
import { createDiagnosticsLog } from "@/utils/diagnostics-log";
import type { RunningServer, ServeFn, TaskServer } from "./types";

/** Serves through @hono/node-server */
export const nodeServe: ServeFn = (options, onListening) =>
  serve(options, onListening);

interface StartServerOptions {
  serve?: ServeFn;
}

/**
 * Starts listening on the configured host and port.
 *
 * @returns A handle whose shutdown closes the listener, bounded by
 * config.shutdownTimeoutMs
 */
export function startServer(
  server: TaskServer,
  options: StartServerOptions = {}
): RunningServer {
  const { config, app, logger, store } = server;
  const serveFn = options.serve ?? nodeServe;

  const log = createDiagnosticsLog("TaskServer", {
    diagnostics: config.diagnostics,
    logger,
  });

  const listener = serveFn(
    { fetch: app.fetch, hostname: config.host, port: config.port },
    (info) => {
      logger.info({
        atFunction: "startServer",
        message: `listening on http://${config.host}:${info.port}`,
        data: { host: config.host, port: info.port },
      });
    }
  );

  let closing: Promise<void> | null = null;

  const shutdown = (signal: string) => {
    if (closing) {
      return closing;
    }

    logger.info({
      atFunction: "startServer.shutdown",
      message: "shutting down",
      data: { signal, timeout_ms: config.shutdownTimeoutMs },
    });

    closing = new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(
          new Error(`shutdown timed out after ${config.shutdownTimeoutMs}ms`)
        );
      }, config.shutdownTimeoutMs);

      listener.close((error) => {
        clearTimeout(timer);
        if (error) {
          reject(error);
          return;
        }
        log("Server stopped", { tasks_discarded: store.count() });
        resolve();
      });
    });

    return closing;
  };

  return { shutdown };
}
