import type { Hono } from "hono";
import { cors } from "hono/cors";
import type { RestConfig } from "@/rest/types";
import type { CorsOptions } from "./types";

/**
 * Build CORS options from REST config. With no allowed origins every origin
 * is accepted; otherwise only listed origins are echoed back.
 */
export const buildCorsOptions = (config: RestConfig): CorsOptions => {
  const resolveOrigin = (reqOrigin: string) => {
    if (config.allowedOrigins.length > 0) {
      return config.allowedOrigins.includes(reqOrigin) ? reqOrigin : "";
    }
    return "*";
  };

  return {
    origin: resolveOrigin,
    credentials: true,
    allowHeaders: ["Content-Type", "Authorization"],
    allowMethods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
    exposeHeaders: ["Content-Length"],
    maxAge: 600,
  };
};

/**
 * Apply CORS to every route of a Hono app
 */
export const applyCorsConfig = (app: Hono, config: RestConfig): void => {
  app.use("*", cors(buildCorsOptions(config)));
};
