import type { AppLogger } from "@/logging";
import { Err, type ErrType } from "./result";

/**
 * Error kinds surfaced to callers. Anything that is not one of the three
 * domain kinds is reported as Internal.
 */
export type ErrorKind = "NotFound" | "InvalidID" | "Validation" | "Internal";

export interface AppError {
  kind: ErrorKind;
  message: string;
  /** ID of the log record written for this error, when a logger was available */
  logId?: string;
}

/**
 * Parameters for the handleError utility.
 *
 * @property kind - Error classification, drives the HTTP status at the REST boundary
 * @property message - Human-readable error description, returned to the caller as-is
 * @property data - Optional structured data logged alongside the error for debugging
 * @property logger - Logger to write the error to; when omitted nothing is logged
 * @property atFunction - Name of the calling function, recorded with the log entry
 */
export interface HandleErrorParams {
  kind: ErrorKind;
  message: string;
  data?: unknown;
  logger?: AppLogger;
  atFunction: string;
}

/**
 * Logs an error via the given logger and returns a typed Err result.
 * The log ID is attached to the error so the REST layer can hand it to clients.
 *
 * @example
 * ```typescript
 * if (!task) {
 *   return handleError({
 *     kind: "NotFound",
 *     message: "task not found",
 *     data: { task_id: id },
 *     logger,
 *     atFunction: "TaskStore.getById",
 *   });
 * }
 * ```
 */
export function handleError(params: HandleErrorParams): ErrType<AppError> {
  const { kind, message, data, logger } = params;

  if (!logger) {
    return Err({ kind, message });
  }

  const logId = logger.error({
    atFunction: params.atFunction,
    message,
    data,
  });
  return Err({ kind, message, logId });
}

/** Wraps an unexpected thrown value as an Internal error, keeping the detail out of the message */
export function toInternalError(
  error: unknown,
  params: Omit<HandleErrorParams, "kind" | "message" | "data">
): ErrType<AppError> {
  return handleError({
    ...params,
    kind: "Internal",
    message: "internal server error",
    data: { error: error instanceof Error ? error.message : String(error) },
  });
}
