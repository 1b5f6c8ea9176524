// backend/shared/src/health/checks/HttpProbeCheck.ts
/**
 * Purpose:
 * - One outbound HTTP request against the model server; ok iff 2xx.
 * - No retry: a failure is reported as-is.
 */

import type { IHealthCheck, HealthCheckResult } from "../types";
import type { ServerClient } from "../../svc/ServerClient";
import type { HttpMethod, ServerResponse } from "../../svc/types";

export interface HttpProbeSpec {
  name: string;
  label: string;
  critical: boolean;
  path: string;
  method?: HttpMethod;
  body?: unknown;
  connectTimeoutMs?: number;
}

export class HttpProbeCheck implements IHealthCheck {
  public readonly name: string;
  public readonly label: string;
  public readonly critical: boolean;

  constructor(
    protected readonly client: ServerClient,
    protected readonly spec: HttpProbeSpec
  ) {
    this.name = spec.name;
    this.label = spec.label;
    this.critical = spec.critical;
  }

  async check(): Promise<HealthCheckResult> {
    const res = await this.client.call({
      path: this.spec.path,
      method: this.spec.method ?? "GET",
      body: this.spec.body,
      connectTimeoutMs: this.spec.connectTimeoutMs,
    });
    return this.toResult(res);
  }

  protected toResult(res: ServerResponse): HealthCheckResult {
    return {
      name: this.name,
      label: this.label,
      critical: this.critical,
      ok: res.ok,
      durationMs: res.durationMs,
      details: {
        url: res.url,
        method: res.method,
        status: res.status,
        bodyMasked: this.spec.body !== undefined ? true : undefined,
        response: res.data,
      },
      errorCode: res.error?.code,
      error: res.error?.message,
    };
  }
}
