import type { AppLogger } from "@/logging";
import { handleError } from "@/utils/handle-error";
import { Ok } from "@/utils/result";
import { validationMessage } from "./errors";
import { createIdGenerator } from "./id";
import type { Clock, Task, TaskChanges, TaskService, TaskStore } from "./types";
import { checkTaskDescription, checkTaskTitle } from "./validate";

export interface TaskServiceOptions {
  store: TaskStore;
  logger?: AppLogger;
  now?: Clock;
  /** ID source for new tasks. Defaults to a clock-derived generator */
  nextId?: () => number;
}

/**
 * Applies a partial update onto an existing task. Empty or missing fields keep
 * the existing value; a non-empty status is taken as-is, known or not.
 */
export function mergeTaskChanges(
  existing: Task,
  changes: TaskChanges,
  updatedAt: Date
): Task {
  return {
    ...existing,
    title: changes.title || existing.title,
    description: changes.description || existing.description,
    status: changes.status || existing.status,
    updatedAt,
  };
}

/**
 * Task use cases on top of a store: validation, ID assignment, timestamps and
 * partial-update merging. Store errors are returned unchanged.
 */
export function createTaskService(options: TaskServiceOptions): TaskService {
  const { store, logger } = options;
  const now = options.now ?? (() => new Date());
  const nextId = options.nextId ?? createIdGenerator(now);

  const rejectInvalid = (
    detail: string,
    atFunction: string,
    data: Record<string, unknown>
  ) =>
    handleError({
      kind: "Validation",
      message: validationMessage(detail),
      data,
      logger,
      atFunction,
    });

  const createTask = (title: string, description: string) => {
    const titleCheck = checkTaskTitle(title);
    if (titleCheck.isErr) {
      return rejectInvalid(titleCheck.error, "TaskService.createTask", {
        title,
      });
    }

    const descriptionCheck = checkTaskDescription(description);
    if (descriptionCheck.isErr) {
      return rejectInvalid(descriptionCheck.error, "TaskService.createTask", {
        description_length: description.length,
      });
    }

    const timestamp = now();
    const created = store.create({
      id: nextId(),
      title,
      description,
      status: "pending",
      createdAt: timestamp,
      updatedAt: timestamp,
    });
    if (created.isErr) {
      return created;
    }

    logger?.info({
      atFunction: "TaskService.createTask",
      message: "task created successfully",
      data: { task_id: created.value.id },
    });

    return created;
  };

  const getTask = (id: number) => store.getById(id);

  const listTasks = (statusFilter: string) => {
    const tasks = store.listAll(statusFilter);

    logger?.info({
      atFunction: "TaskService.listTasks",
      message: "tasks listed",
      data: { count: tasks.length, status_filter: statusFilter },
    });

    return Ok(tasks);
  };

  const updateTask = (id: number, changes: TaskChanges) => {
    const existing = store.getById(id);
    if (existing.isErr) {
      return existing;
    }

    if (changes.title) {
      const titleCheck = checkTaskTitle(changes.title);
      if (titleCheck.isErr) {
        return rejectInvalid(titleCheck.error, "TaskService.updateTask", {
          task_id: id,
          title: changes.title,
        });
      }
    }

    if (changes.description) {
      const descriptionCheck = checkTaskDescription(changes.description);
      if (descriptionCheck.isErr) {
        return rejectInvalid(
          descriptionCheck.error,
          "TaskService.updateTask",
          { task_id: id, description_length: changes.description.length }
        );
      }
    }

    const merged = mergeTaskChanges(existing.value, changes, now());
    const updated = store.update(merged);
    if (updated.isErr) {
      return updated;
    }

    logger?.info({
      atFunction: "TaskService.updateTask",
      message: "task updated",
      data: { task_id: id },
    });

    return updated;
  };

  const deleteTask = (id: number) => store.delete(id);

  return { createTask, getTask, listTasks, updateTask, deleteTask };
}
