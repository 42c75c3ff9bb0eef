import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { INVALID_TASK_ID } from "@/tasks/errors";
import type { Task } from "@/tasks/types";
import type { AppError, ErrorKind } from "@/utils/handle-error";
import { Err, Ok, type Result } from "@/utils/result";
import type { ErrorResponse, TaskResponse } from "./types";

export const INTERNAL_ERROR_MESSAGE = "internal server error";

const ERROR_STATUS: Record<ErrorKind, ContentfulStatusCode> = {
  NotFound: 404,
  InvalidID: 400,
  Validation: 400,
  Internal: 500,
};

const TASK_ID_PATTERN = /^[+-]?\d+$/;

export function toTaskResponse(task: Task): TaskResponse {
  return {
    id: task.id,
    title: task.title,
    description: task.description,
    status: task.status,
    created_at: task.createdAt.toISOString(),
    updated_at: task.updatedAt.toISOString(),
  };
}

/** Parses a base-10 path ID; anything else is an invalid task ID */
export function parseTaskId(raw: string): Result<number, string> {
  if (!TASK_ID_PATTERN.test(raw)) {
    return Err(INVALID_TASK_ID);
  }
  const id = Number(raw);
  return Number.isSafeInteger(id) ? Ok(id) : Err(INVALID_TASK_ID);
}

export function errorBody(message: string, logId?: string): ErrorResponse {
  return { status: false, message, data: logId ? { log_id: logId } : {} };
}

/**
 * Maps an error kind to its HTTP status. Internal errors are answered with a
 * generic message; their detail stays in the logs.
 */
export function respondWithError(c: Context, error: AppError) {
  const message =
    error.kind === "Internal" ? INTERNAL_ERROR_MESSAGE : error.message;
  return c.json(errorBody(message, error.logId), ERROR_STATUS[error.kind]);
}
