import type { Context, Hono } from "hono";
import z from "zod";
import type { AppLogger } from "@/logging";
import type { TaskService } from "@/tasks/types";
import { Err, Ok, type Result, safeTry } from "@/utils/result";
import {
  errorBody,
  parseTaskId,
  respondWithError,
  toTaskResponse,
} from "./responses";

// --- Zod schemas for incoming bodies ---

/** Missing or null text fields read as "" (meaning "not provided") */
const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? "");

const createTaskRequestSchema = z.object({
  title: optionalText,
  description: optionalText,
});

const updateTaskRequestSchema = z.object({
  title: optionalText,
  description: optionalText,
  status: optionalText,
});

const INVALID_BODY_MESSAGE = "invalid request body";

/**
 * Reads the JSON body and shapes it with the given schema.
 * Fails on malformed JSON, a non-object body, or fields of the wrong type.
 */
async function readJsonBody<S extends z.ZodType>(
  c: Context,
  schema: S
): Promise<Result<z.output<S>, string>> {
  const body = await safeTry<unknown>(() => c.req.json());
  if (body.isErr) {
    return Err("malformed JSON");
  }

  const parsed = schema.safeParse(body.value);
  if (!parsed.success) {
    return Err(z.prettifyError(parsed.error));
  }

  return Ok(parsed.data);
}

interface TaskRoutesParams {
  service: TaskService;
  logger?: AppLogger;
}

/**
 * Registers the task CRUD routes:
 * POST /tasks, GET /tasks, GET /tasks/:id, PUT /tasks/:id, DELETE /tasks/:id
 */
export function registerTaskRoutes(app: Hono, params: TaskRoutesParams): void {
  const { service, logger } = params;

  /** Logs a rejected request and answers 400 with the log reference */
  const badRequest = (
    c: Context,
    message: string,
    atFunction: string,
    data: Record<string, unknown>
  ) => {
    const logId = logger?.warn({ atFunction, message, data });
    return c.json(errorBody(message, logId), 400);
  };

  app.post("/tasks", async (c) => {
    const body = await readJsonBody(c, createTaskRequestSchema);
    if (body.isErr) {
      return badRequest(c, INVALID_BODY_MESSAGE, "REST.createTask", {
        reason: body.error,
      });
    }

    const result = service.createTask(body.value.title, body.value.description);
    if (result.isErr) {
      return respondWithError(c, result.error);
    }

    return c.json(toTaskResponse(result.value), 201);
  });

  app.get("/tasks", (c) => {
    const statusFilter = c.req.query("status") ?? "";

    const result = service.listTasks(statusFilter);
    if (result.isErr) {
      return respondWithError(c, result.error);
    }

    return c.json(result.value.map(toTaskResponse));
  });

  app.get("/tasks/:id", (c) => {
    const id = parseTaskId(c.req.param("id"));
    if (id.isErr) {
      return badRequest(c, id.error, "REST.getTask", {
        id: c.req.param("id"),
      });
    }

    const result = service.getTask(id.value);
    if (result.isErr) {
      return respondWithError(c, result.error);
    }

    return c.json(toTaskResponse(result.value));
  });

  app.put("/tasks/:id", async (c) => {
    const id = parseTaskId(c.req.param("id"));
    if (id.isErr) {
      return badRequest(c, id.error, "REST.updateTask", {
        id: c.req.param("id"),
      });
    }

    const body = await readJsonBody(c, updateTaskRequestSchema);
    if (body.isErr) {
      return badRequest(c, INVALID_BODY_MESSAGE, "REST.updateTask", {
        id: id.value,
        reason: body.error,
      });
    }

    const result = service.updateTask(id.value, body.value);
    if (result.isErr) {
      return respondWithError(c, result.error);
    }

    return c.json(toTaskResponse(result.value));
  });

  app.delete("/tasks/:id", (c) => {
    const id = parseTaskId(c.req.param("id"));
    if (id.isErr) {
      return badRequest(c, id.error, "REST.deleteTask", {
        id: c.req.param("id"),
      });
    }

    const result = service.deleteTask(id.value);
    if (result.isErr) {
      return respondWithError(c, result.error);
    }

    return c.body(null, 204);
  });
}
