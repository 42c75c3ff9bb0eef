// Configuration: environment loading and validation
export {
  type AppConfig,
  type EnvSource,
  loadConfig,
  type RateLimitSettings,
} from "./config/config";
// CORS: options built from the allowed origins
export type { CorsOptions } from "./cors/types";
// Logging: structured log persistence with chunking support
export {
  type AppLogger,
  createLog,
  createLogger,
  formatAgenticLog,
  type Log,
  type LogChunking,
  type LoggerConfig,
  type LogMode,
} from "./logging";
// REST: Hono app factory, wire types and rate limiting configuration
export { createRestApp } from "./rest/rest";
export type {
  ErrorResponse,
  RateLimitConfig,
  RestConfig,
  TaskResponse,
} from "./rest/types";
// Server: bootstrap and lifecycle, the main entry point
export { startServer } from "./server/lifecycle";
export { createTaskServer } from "./server/server";
export type {
  RunningServer,
  ServeFn,
  TaskServer,
  TaskServerOverrides,
} from "./server/types";
// Tasks: store, service and domain types
export { createIdGenerator } from "./tasks/id";
export { createTaskService, mergeTaskChanges } from "./tasks/service";
export { createTaskStore } from "./tasks/store";
export {
  type Task,
  type TaskChanges,
  type TaskResult,
  type TaskService,
  type TaskStore,
  TASK_STATUSES,
} from "./tasks/types";
// Utilities: error handling and results
export {
  type AppError,
  type ErrorKind,
  handleError,
} from "./utils/handle-error";
export { Err, Ok, type Result, safeTry } from "./utils/result";
