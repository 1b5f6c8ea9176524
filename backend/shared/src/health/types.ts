// backend/shared/src/health/types.ts
/**
 * Purpose:
 * - Contracts for health probes and the aggregate report.
 */

import type { HttpMethod } from "../svc/types";
import type { TaskState } from "../contracts/modelServer.contract";

export type HealthStatus = "ok" | "degraded" | "down";

export interface ProbeDetails {
  url: string;
  method: HttpMethod;
  /** 0 when no HTTP response arrived */
  status: number;
  /** request body was sent but must not be echoed */
  bodyMasked?: boolean;
  response?: unknown;
  task?: { id: string; state?: TaskState; polls: number };
}

export interface HealthCheckResult {
  name: string;
  label: string;
  ok: boolean;
  critical: boolean;
  durationMs: number;
  details?: ProbeDetails;
  /** e.g. "network_error", "timeout", "upstream_error", "task_failed" */
  errorCode?: string;
  error?: string;
}

export interface IHealthCheck {
  readonly name: string;
  readonly label: string;
  readonly critical: boolean;
  check(): Promise<HealthCheckResult>;
}

export interface HealthReport {
  status: HealthStatus;
  target: string;
  startedAt: string;
  durationMs: number;
  checks: HealthCheckResult[];
}
