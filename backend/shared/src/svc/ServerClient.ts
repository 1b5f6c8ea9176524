// backend/shared/src/svc/ServerClient.ts
/**
 * Purpose:
 * - Tiny HTTP client bound to one model server base URL.
 * - Returns a uniform envelope; never throws on non-2xx, timeouts or
 *   connection failures. ok ⇔ status in [200, 300).
 * - `connectTimeoutMs` bounds only the connect; a connected server may take
 *   as long as it needs unless the caller sets `responseTimeoutMs`.
 */

import axios, { type AxiosInstance } from "axios";
import { normalizeBaseUrl } from "../config";
import { connectTimeoutTransport } from "./connectTimeout";
import type { ServerCallOptions, ServerResponse } from "./types";

// ECONNABORTED: axios `timeout` (whole request); ETIMEDOUT: connect phase
const TIMEOUT_CODES = new Set(["ECONNABORTED", "ETIMEDOUT"]);

export class ServerClient {
  private readonly http: AxiosInstance;
  public readonly baseUrl: string;

  constructor(
    baseUrl: string,
    private readonly defaults: { connectTimeoutMs?: number } = {}
  ) {
    this.baseUrl = normalizeBaseUrl(baseUrl);
    this.http = axios.create({
      headers: { accept: "application/json" },
      validateStatus: () => true,
      maxRedirects: 0,
    });
  }

  public urlFor(path: string): string {
    return path === "/" ? this.baseUrl : this.baseUrl + "/" + path.replace(/^\/+/, "");
  }

  public async call<T = unknown>(opts: ServerCallOptions): Promise<ServerResponse<T>> {
    const method = opts.method ?? "GET";
    const url = this.urlFor(opts.path);
    const connectTimeoutMs = opts.connectTimeoutMs ?? this.defaults.connectTimeoutMs ?? 60_000;
    const responseTimeoutMs = opts.responseTimeoutMs ?? 0;
    const headers: Record<string, string> = { ...(opts.headers ?? {}) };
    if (opts.body !== undefined && headers["content-type"] == null) {
      headers["content-type"] = "application/json";
    }

    const t0 = Date.now();
    try {
      const res = await this.http.request<T>({
        url,
        method,
        headers,
        data: opts.body === undefined ? undefined : JSON.stringify(opts.body),
        timeout: responseTimeoutMs,
        transport: connectTimeoutTransport(connectTimeoutMs),
      });
      const durationMs = Date.now() - t0;
      const ok = res.status >= 200 && res.status < 300;
      return {
        ok,
        status: res.status,
        url,
        method,
        durationMs,
        data: res.data,
        error: ok
          ? undefined
          : { code: "upstream_error", message: `HTTP ${res.status} ${res.statusText}`.trim() },
      };
    } catch (err) {
      const durationMs = Date.now() - t0;
      const code = axios.isAxiosError(err) ? err.code ?? "" : "";
      const timedOut = TIMEOUT_CODES.has(code);
      return {
        ok: false,
        status: 0,
        url,
        method,
        durationMs,
        error: {
          code: timedOut ? "timeout" : "network_error",
          message: !timedOut
            ? describe(err)
            : code === "ECONNABORTED"
              ? `no response within ${responseTimeoutMs}ms`
              : `no connection within ${connectTimeoutMs}ms`,
        },
      };
    }
  }
}

// AggregateError (dual-stack connect) carries an empty message; fall back to the code.
function describe(err: unknown): string {
  if (axios.isAxiosError(err)) return err.message || err.code || "request failed";
  return err instanceof Error ? err.message : String(err);
}
