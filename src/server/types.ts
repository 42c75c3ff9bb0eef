import type { Hono } from "hono";
import type { AppConfig } from "@/config/config";
import type { AppLogger } from "@/logging";
import type { Clock, TaskService, TaskStore } from "@/tasks/types";

/** Collaborators that can be swapped out, mainly for tests */
export interface TaskServerOverrides {
  logger?: AppLogger;
  now?: Clock;
  nextId?: () => number;
}

/** A fully wired service, ready to be served */
export interface TaskServer {
  config: AppConfig;
  store: TaskStore;
  service: TaskService;
  app: Hono;
  logger: AppLogger;
}

export interface ServeOptions {
  fetch: (request: Request) => Response | Promise<Response>;
  hostname: string;
  port: number;
}

export interface ListeningInfo {
  address: string;
  port: number;
}

/** The part of a Node HTTP server the lifecycle needs */
export interface ClosableServer {
  close: (callback?: (error?: Error) => void) => unknown;
}

export type ServeFn = (
  options: ServeOptions,
  onListening: (info: ListeningInfo) => void
) => ClosableServer;

export interface RunningServer {
  /**
   * Stops accepting connections and resolves once open requests finish.
   * Rejects when that takes longer than the configured shutdown timeout.
   * Repeated calls return the same promise.
   */
  shutdown: (signal: string) => Promise<void>;
}
