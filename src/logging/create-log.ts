import { createLog, type Log, type LoggerConfig } from "./logger";

type LogInput = Omit<Log, "appName" | "level">;

/**
 * Structured logger used across the service. Each method writes one record
 * and returns its log ID, so callers can hand the ID back to clients.
 */
export interface AppLogger {
  info: (input: LogInput) => string;
  warn: (input: LogInput) => string;
  error: (input: LogInput) => string;
}

/**
 * Creates a logger instance bound to a specific app name.
 * @param appName - The application name (determines log file/directory)
 * @param config - Optional mode, directory and chunking settings
 */
export const createLogger = (
  appName: string,
  config?: LoggerConfig
): AppLogger => {
  return {
    info: (input) => createLog({ ...input, appName, level: "info" }, config),
    warn: (input) => createLog({ ...input, appName, level: "warn" }, config),
    error: (input) => createLog({ ...input, appName, level: "error" }, config),
  };
};
