import type { AppLogger } from "@/logging";
import { handleError } from "@/utils/handle-error";
import { Ok } from "@/utils/result";
import { INVALID_TASK_ID, TASK_NOT_FOUND } from "./errors";
import type { Clock, Task, TaskStore } from "./types";

export interface TaskStoreOptions {
  logger?: AppLogger;
  now?: Clock;
}

const snapshot = (task: Task): Task => ({
  ...task,
  createdAt: new Date(task.createdAt),
  updatedAt: new Date(task.updatedAt),
});

/**
 * In-memory task store keyed by ID.
 *
 * Every operation is synchronous and runs to completion on the event loop,
 * so no caller can observe the map mid-mutation. Entries are owned by the
 * store: reads return snapshots and writes copy the fields they accept.
 */
export function createTaskStore(options: TaskStoreOptions = {}): TaskStore {
  const { logger } = options;
  const now = options.now ?? (() => new Date());
  const tasks = new Map<number, Task>();

  const create = (task: Task) => {
    if (!Number.isSafeInteger(task.id) || task.id < 0) {
      return handleError({
        kind: "InvalidID",
        message: INVALID_TASK_ID,
        data: { task_id: task.id },
        logger,
        atFunction: "TaskStore.create",
      });
    }

    const timestamp = now();
    const stored: Task = {
      ...task,
      createdAt: timestamp,
      updatedAt: new Date(timestamp),
    };

    // Same ID overwrites the previous entry
    tasks.set(stored.id, stored);

    logger?.info({
      atFunction: "TaskStore.create",
      message: "task created",
      data: { task_id: stored.id },
    });

    return Ok(snapshot(stored));
  };

  const getById = (id: number) => {
    const task = tasks.get(id);
    if (!task) {
      return handleError({
        kind: "NotFound",
        message: TASK_NOT_FOUND,
        data: { task_id: id },
        logger,
        atFunction: "TaskStore.getById",
      });
    }

    logger?.info({
      atFunction: "TaskStore.getById",
      message: "task retrieved",
      data: { task_id: id },
    });

    return Ok(snapshot(task));
  };

  const listAll = (statusFilter: string) => {
    const result: Task[] = [];
    for (const task of tasks.values()) {
      if (statusFilter === "" || task.status === statusFilter) {
        result.push(snapshot(task));
      }
    }

    logger?.info({
      atFunction: "TaskStore.listAll",
      message: "tasks list retrieved",
      data: { count: result.length, status_filter: statusFilter },
    });

    return result;
  };

  const update = (task: Task) => {
    const existing = tasks.get(task.id);
    if (!existing) {
      return handleError({
        kind: "NotFound",
        message: TASK_NOT_FOUND,
        data: { task_id: task.id },
        logger,
        atFunction: "TaskStore.update",
      });
    }

    existing.title = task.title;
    existing.description = task.description;
    existing.status = task.status;
    // Wall clocks can step backwards; updatedAt never precedes createdAt
    const timestamp = now();
    existing.updatedAt =
      timestamp < existing.createdAt ? new Date(existing.createdAt) : timestamp;

    logger?.info({
      atFunction: "TaskStore.update",
      message: "task updated",
      data: { task_id: task.id },
    });

    return Ok(snapshot(existing));
  };

  const remove = (id: number) => {
    if (!tasks.delete(id)) {
      return handleError({
        kind: "NotFound",
        message: TASK_NOT_FOUND,
        data: { task_id: id },
        logger,
        atFunction: "TaskStore.delete",
      });
    }

    logger?.info({
      atFunction: "TaskStore.delete",
      message: "task deleted",
      data: { task_id: id },
    });

    return Ok({ id });
  };

  return {
    create,
    getById,
    listAll,
    update,
    delete: remove,
    count: () => tasks.size,
  };
}
