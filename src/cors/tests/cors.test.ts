import { Hono } from "hono";
import { describe, expect, it } from "vitest";
import type { RestConfig } from "@/rest/types";
import { applyCorsConfig, buildCorsOptions } from "../cors";
import type { CorsOptions } from "../types";

/** Minimal RestConfig factory for tests */
const makeConfig = (overrides?: Partial<RestConfig>): RestConfig => ({
  allowedOrigins: [],
  ...overrides,
});

/** Create a Hono app with CORS applied and a couple of task routes */
const makeApp = (config: RestConfig) => {
  const app = new Hono();
  applyCorsConfig(app, config);
  app.post("/tasks", (c) => c.json({ ok: true }, 201));
  app.delete("/tasks/1", (c) => c.body(null, 204));
  return app;
};

/** Send an OPTIONS preflight request */
const preflight = (app: Hono, path: string, origin: string, method = "PUT") =>
  app.request(path, {
    method: "OPTIONS",
    headers: {
      Origin: origin,
      "Access-Control-Request-Method": method,
    },
  });

/** Send a POST request with origin header */
const postWithOrigin = (app: Hono, path: string, origin: string) =>
  app.request(path, {
    method: "POST",
    headers: {
      Origin: origin,
      "Content-Type": "application/json",
    },
    body: JSON.stringify({}),
  });

/** Origin option as the function form built from allowedOrigins */
const originFnOf = (opts: CorsOptions) => {
  if (typeof opts.origin !== "function") {
    throw new Error("expected origin to be a function");
  }
  return opts.origin;
};

describe("buildCorsOptions", () => {
  it("should return wildcard origin when allowedOrigins is empty", async () => {
    const opts = buildCorsOptions(makeConfig({ allowedOrigins: [] }));
    const app = new Hono();
    app.get("/probe", (c) =>
      c.text(String(originFnOf(opts)("https://x.dev", c)))
    );

    const res = await app.request("/probe");
    expect(await res.text()).toBe("*");
  });

  it("should allow listed origins and reject unlisted ones", async () => {
    const opts = buildCorsOptions(
      makeConfig({ allowedOrigins: ["https://a.com", "https://b.com"] })
    );
    const app = new Hono();
    app.get("/probe", (c) => {
      const originFn = originFnOf(opts);
      return c.json(
        ["https://a.com", "https://b.com", "https://evil.com", ""].map(
          (origin) => String(originFn(origin, c))
        )
      );
    });

    const res = await app.request("/probe");
    expect(await res.json()).toEqual(["https://a.com", "https://b.com", "", ""]);
  });

  it("should allow the methods the task routes use", () => {
    const opts = buildCorsOptions(makeConfig());

    expect(opts.credentials).toBe(true);
    expect(opts.allowHeaders).toEqual(["Content-Type", "Authorization"]);
    expect(opts.allowMethods).toEqual([
      "GET",
      "POST",
      "PUT",
      "DELETE",
      "OPTIONS",
    ]);
    expect(opts.exposeHeaders).toEqual(["Content-Length"]);
    expect(opts.maxAge).toBe(600);
  });
});

describe("applyCorsConfig", () => {
  it("should add a wildcard origin when no allowedOrigins are configured", async () => {
    const app = makeApp(makeConfig());

    const res = await postWithOrigin(app, "/tasks", "https://any.com");

    expect(res.status).toBe(201);
    expect(res.headers.get("Access-Control-Allow-Origin")).toBe("*");
  });

  it("should reflect an allowed origin", async () => {
    const app = makeApp(makeConfig({ allowedOrigins: ["https://trusted.com"] }));

    const res = await postWithOrigin(app, "/tasks", "https://trusted.com");

    expect(res.headers.get("Access-Control-Allow-Origin")).toBe(
      "https://trusted.com"
    );
  });

  it("should omit the origin header for an unlisted origin", async () => {
    const app = makeApp(makeConfig({ allowedOrigins: ["https://trusted.com"] }));

    const res = await postWithOrigin(app, "/tasks", "https://evil.com");

    expect(res.headers.get("Access-Control-Allow-Origin")).toBeNull();
  });

  it("should allow PUT and DELETE in preflight", async () => {
    const app = makeApp(makeConfig());

    const res = await preflight(app, "/tasks", "https://any.com");
    const methods = res.headers.get("Access-Control-Allow-Methods");

    expect(res.headers.get("Access-Control-Allow-Credentials")).toBe("true");
    expect(methods).toContain("PUT");
    expect(methods).toContain("DELETE");
  });
});
