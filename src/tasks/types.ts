import type { AppError } from "@/utils/handle-error";
import type { Result } from "@/utils/result";

export const TASK_STATUSES = ["pending", "in_progress", "completed"] as const;

export type KnownTaskStatus = (typeof TASK_STATUSES)[number];

export interface Task {
  id: number;
  title: string;
  description: string;
  /**
   * One of TASK_STATUSES on creation. Updates store any non-empty string
   * unchecked, so this stays a plain string.
   */
  status: string;
  createdAt: Date;
  updatedAt: Date;
}

/** Partial update. A missing or empty field leaves the stored value unchanged. */
export interface TaskChanges {
  title?: string;
  description?: string;
  status?: string;
}

export type TaskResult<T> = Result<T, AppError>;

export interface TaskStore {
  create: (task: Task) => TaskResult<Task>;
  getById: (id: number) => TaskResult<Task>;
  listAll: (statusFilter: string) => Task[];
  update: (task: Task) => TaskResult<Task>;
  delete: (id: number) => TaskResult<{ id: number }>;
  count: () => number;
}

export interface TaskService {
  createTask: (title: string, description: string) => TaskResult<Task>;
  getTask: (id: number) => TaskResult<Task>;
  listTasks: (statusFilter: string) => TaskResult<Task[]>;
  updateTask: (id: number, changes: TaskChanges) => TaskResult<Task>;
  deleteTask: (id: number) => TaskResult<{ id: number }>;
}

/** Source of the current time, injectable for tests */
export type Clock = () => Date;
