export interface RateLimitConfig {
  windowMs?: number;
  limit?: number;
  /** Request header whose value identifies the client */
  limitingHeader: string;
}

export interface RestConfig {
  diagnostics?: boolean;
  rateLimiting?: RateLimitConfig;
  /** Empty allows any origin */
  allowedOrigins: string[];
}

/** Body of every non-2xx JSON response */
export interface ErrorResponse {
  status: false;
  message: string;
  data: { log_id?: string };
}

/** Wire shape of a task */
export interface TaskResponse {
  id: number;
  title: string;
  description: string;
  status: string;
  created_at: string;
  updated_at: string;
}
