import type { cors } from "hono/cors";

/** Options accepted by Hono's cors middleware */
export type CorsOptions = NonNullable<Parameters<typeof cors>[0]>;
