import { Hono } from "hono";
import { describe, expect, it, vi } from "vitest";
import type { AppLogger } from "@/logging";
import { applyRateLimiting, applyRequestLogging } from "../middleware";
import type { RestConfig } from "../types";

/** Minimal RestConfig factory */
const makeConfig = (overrides?: Partial<RestConfig>): RestConfig => ({
  allowedOrigins: [],
  ...overrides,
});

/** Capture log calls for assertions */
const makeLogSpy = () => {
  const calls: string[] = [];
  const log = (msg: string, _data?: unknown) => {
    calls.push(msg);
  };
  return { log, calls };
};

describe("applyRateLimiting", () => {
  it("should not apply rate limiting when no limitingHeader is configured", async () => {
    const app = new Hono();
    const { log, calls } = makeLogSpy();

    applyRateLimiting(app, makeConfig(), log);
    app.get("/tasks", (c) => c.json([]));

    expect(calls).toHaveLength(0);
    const res = await app.request("/tasks");
    expect(res.status).toBe(200);
  });

  it("should answer 429 once a client exceeds the limit", async () => {
    const app = new Hono();
    const { log } = makeLogSpy();

    applyRateLimiting(
      app,
      makeConfig({
        rateLimiting: { limitingHeader: "x-client-id", limit: 2, windowMs: 60_000 },
      }),
      log
    );
    app.get("/tasks", (c) => c.json([]));

    const send = (client: string) =>
      app.request("/tasks", { headers: { "x-client-id": client } });

    expect((await send("client-a")).status).toBe(200);
    expect((await send("client-a")).status).toBe(200);
    expect((await send("client-a")).status).toBe(429);
    expect((await send("client-b")).status).toBe(200);
  });

  it("should share one bucket for requests without the header", async () => {
    const app = new Hono();
    const { log, calls } = makeLogSpy();

    applyRateLimiting(
      app,
      makeConfig({
        rateLimiting: { limitingHeader: "x-client-id", limit: 1, windowMs: 60_000 },
      }),
      log
    );
    app.get("/tasks", (c) => c.json([]));

    expect((await app.request("/tasks")).status).toBe(200);
    expect((await app.request("/tasks")).status).toBe(429);
    expect(calls).toContain(
      "Rate limiting header 'x-client-id' missing from request"
    );
  });

  it("should log the default window and limit", () => {
    const app = new Hono();
    const { log, calls } = makeLogSpy();

    applyRateLimiting(
      app,
      makeConfig({ rateLimiting: { limitingHeader: "x-client-id" } }),
      log
    );

    expect(calls).toEqual([
      "Rate limiting enabled: 100 requests per 900000ms window",
    ]);
  });
});

describe("applyRequestLogging", () => {
  it("should record method, path and status after the handler runs", async () => {
    const logger: AppLogger = {
      info: vi.fn(() => "info-id"),
      warn: vi.fn(() => "warn-id"),
      error: vi.fn(() => "error-id"),
    };
    const app = new Hono();
    applyRequestLogging(app, logger);
    app.post("/tasks", (c) => c.json({}, 201));

    await app.request("/tasks", { method: "POST" });

    expect(logger.info).toHaveBeenCalledTimes(1);
    expect(logger.info).toHaveBeenCalledWith({
      atFunction: "REST.request",
      message: "POST /tasks",
      data: {
        method: "POST",
        path: "/tasks",
        status: 201,
        duration_ms: expect.any(Number),
      },
    });
  });

  it("should do nothing without a logger", async () => {
    const app = new Hono();
    applyRequestLogging(app);
    app.get("/health", (c) => c.text("OK"));

    const res = await app.request("/health");
    expect(await res.text()).toBe("OK");
  });
});
