// backend/shared/src/svc/types.ts
/**
 * Purpose:
 * - Minimal contracts for calls from the ops tools to the model server.
 */

export type HttpMethod = "GET" | "POST";

export interface ServerCallOptions {
  path: string; // e.g. "/" or "/api/v1/mcp/execute"
  method?: HttpMethod; // default: "GET"
  headers?: Record<string, string>;
  body?: unknown; // JSON-serializable
  /** bound on establishing the connection; the answer itself may take any time */
  connectTimeoutMs?: number;
  /** optional bound on the whole request (connect + response) */
  responseTimeoutMs?: number;
}

export type ServerErrorCode = "network_error" | "timeout" | "upstream_error";

export interface ServerResponse<T = unknown> {
  ok: boolean;
  /** 0 when no HTTP response arrived */
  status: number;
  url: string;
  method: HttpMethod;
  durationMs: number;
  data?: T;
  error?: { code: ServerErrorCode; message: string };
}
