import { appendFileSync, existsSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import { nanoid } from "nanoid";
import pino, { type Logger } from "pino";

export type LogLevel = "info" | "warn" | "error";

export type LogMode = "dev" | "prod" | "agentic";

export type LogChunking = "monthly" | "daily" | "weekly" | "none";

export interface Log {
  atFunction: string;
  appName: string;
  message: string;
  data?: unknown;
  level?: LogLevel;
  log_id?: string;
}

/** Configuration for where and how log records are written */
export interface LoggerConfig {
  /** Time-based chunking strategy. Default: 'none' (single file per app) */
  chunking?: LogChunking;
  /** Output mode. Falls back to the MODE environment variable */
  mode?: LogMode;
  /** Root directory for log files. Default: <cwd>/logs */
  dir?: string;
}

const LOG_MODES: readonly LogMode[] = ["dev", "prod", "agentic"];

function isLogMode(value: string): value is LogMode {
  return LOG_MODES.some((mode) => mode === value);
}

// Lazy evaluation of MODE - only check when logging is actually used
const getMode = (config?: LoggerConfig): LogMode => {
  if (config?.mode) {
    return config.mode;
  }
  const mode = process.env.MODE;
  if (!mode) {
    throw new Error("Missing MODE environment variable");
  }
  if (!isLogMode(mode)) {
    throw new Error(`Unknown MODE '${mode}', expected dev, prod or agentic`);
  }
  return mode;
};

const resolveLogDir = (config?: LoggerConfig) =>
  config?.dir ?? join(process.cwd(), "logs");

/**
 * Resolves the correct log file path based on app name and chunking config.
 * - 'none' (default): logs/{appName}.log
 * - 'monthly': logs/{appName}/YYYY-MM.log
 * - 'daily': logs/{appName}/YYYY-MM-DD.log
 * - 'weekly': logs/{appName}/YYYY-WNN.log (ISO week number)
 */
export function resolveLogPath(appName: string, config?: LoggerConfig): string {
  const chunking = config?.chunking ?? "none";
  const logDir = resolveLogDir(config);

  if (chunking === "none") {
    if (!existsSync(logDir)) {
      mkdirSync(logDir, { recursive: true });
    }
    return join(logDir, `${appName}.log`);
  }

  const appDir = join(logDir, appName);
  if (!existsSync(appDir)) {
    mkdirSync(appDir, { recursive: true });
  }

  const chunk = formatChunkName(new Date(), chunking);
  return join(appDir, `${chunk}.log`);
}

/**
 * Formats a date into the chunk filename for the given strategy.
 */
export function formatChunkName(
  date: Date,
  chunking: Exclude<LogChunking, "none">
): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");

  if (chunking === "monthly") {
    return `${year}-${month}`;
  }

  if (chunking === "daily") {
    const day = String(date.getDate()).padStart(2, "0");
    return `${year}-${month}-${day}`;
  }

  const weekNum = getISOWeekNumber(date);
  return `${year}-W${String(weekNum).padStart(2, "0")}`;
}

/** Returns the ISO 8601 week number for a given date */
function getISOWeekNumber(date: Date): number {
  const target = new Date(date.valueOf());
  // Nearest Thursday, Sunday counted as 7
  const dayNum = target.getDay() || 7;
  target.setDate(target.getDate() + 4 - dayNum);
  const yearStart = new Date(target.getFullYear(), 0, 1);
  return Math.ceil(
    ((target.getTime() - yearStart.getTime()) / 86_400_000 + 1) / 7
  );
}

/** One pino instance per destination file, created on first use */
const fileLoggers = new Map<string, Logger>();

function getFileLogger(logFile: string): Logger {
  const cached = fileLoggers.get(logFile);
  if (cached) {
    return cached;
  }

  const destination = pino.destination({ dest: logFile, mkdir: true });
  const fileLogger = pino(
    {
      base: null,
      timestamp: false,
      formatters: {
        level(label) {
          return { level: label };
        },
      },
    },
    destination
  );

  fileLoggers.set(logFile, fileLogger);
  return fileLogger;
}

type LogRecord = {
  log_id: string;
  appName: string;
  atFunction: string;
  message: string;
  data: unknown;
  level: LogLevel;
  time: string;
};

const buildLogRecord = (log: Log): LogRecord => {
  if (!log.appName) {
    throw new Error(`Missing appName in log: ${JSON.stringify(log)}`);
  }

  return {
    log_id: log.log_id ?? nanoid(6),
    appName: log.appName,
    atFunction: log.atFunction,
    message: log.message,
    data: log.data ?? null,
    level: log.level ?? "info",
    time: new Date().toISOString(),
  };
};

/**
 * Serializes a log into the single-line JSON record agentic mode emits.
 * Nothing is written.
 */
export const formatAgenticLog = (log: Log): string =>
  JSON.stringify(buildLogRecord(log));

/**
 * Writes a log record and returns its ID. The return value is always the
 * ID, never the record, so it is safe to hand to clients.
 * - prod: NDJSON line through pino into the resolved log file
 * - agentic: one JSON line per record on stdout
 * - dev: record printed to the console
 * Under NODE_ENV=test the record is appended synchronously so tests can read it back.
 *
 * @throws {Error} If appName is missing, or no mode is configured
 */
export const createLog = (log: Log, config?: LoggerConfig): string => {
  const logRecord = buildLogRecord(log);
  const { log_id, level } = logRecord;

  const mode = getMode(config);

  if (process.env.NODE_ENV === "test") {
    const logFile = resolveLogPath(logRecord.appName, config);
    appendFileSync(logFile, `${JSON.stringify(logRecord)}\n`, "utf-8");
    return log_id;
  }

  if (mode === "prod") {
    getFileLogger(resolveLogPath(logRecord.appName, config))[level](logRecord);
    return log_id;
  }

  if (mode === "agentic") {
    console.log(JSON.stringify(logRecord));
    return log_id;
  }

  console.log({
    ...logRecord,
    data: JSON.stringify(logRecord.data, null, 2),
  });
  return log_id;
};
