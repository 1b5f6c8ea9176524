// backend/shared/src/health/HealthService.ts
/**
 * Purpose:
 * - Execute health checks one after another; compute overall status.
 * - A check that throws is recorded as failed, never rethrown.
 */

import type {
  IHealthCheck,
  HealthCheckResult,
  HealthReport,
  HealthStatus,
} from "./types";
import { errorMessage } from "../errors";

export type ResultListener = (result: HealthCheckResult) => void;

export class HealthService {
  private readonly target: string;
  private readonly checks: IHealthCheck[] = [];

  constructor(target: string) {
    this.target = target;
  }

  public add(check: IHealthCheck): this {
    this.checks.push(check);
    return this;
  }

  public async run(onResult?: ResultListener): Promise<HealthReport> {
    const startedAt = new Date();
    const results: HealthCheckResult[] = [];
    for (const c of this.checks) {
      const t0 = Date.now();
      let result: HealthCheckResult;
      try {
        const r = await c.check();
        result = { ...r, name: c.name, label: c.label, critical: c.critical };
      } catch (err) {
        result = {
          name: c.name,
          label: c.label,
          critical: c.critical,
          durationMs: Date.now() - t0,
          ok: false,
          errorCode: "check_threw",
          error: errorMessage(err),
        };
      }
      results.push(result);
      onResult?.(result);
    }

    return {
      status: HealthService.computeStatus(results),
      target: this.target,
      startedAt: startedAt.toISOString(),
      durationMs: Date.now() - startedAt.getTime(),
      checks: results,
    };
  }

  public static computeStatus(results: HealthCheckResult[]): HealthStatus {
    const anyCriticalFail = results.some((r) => r.critical && !r.ok);
    if (anyCriticalFail) return "down";
    const anyNonCriticalFail = results.some((r) => !r.critical && !r.ok);
    return anyNonCriticalFail ? "degraded" : "ok";
  }
}
