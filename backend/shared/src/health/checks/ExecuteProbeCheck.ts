// backend/shared/src/health/checks/ExecuteProbeCheck.ts
/**
 * Purpose:
 * - POST {"INPUT", "polling"} to the MCP execute endpoint.
 * - polling=false: plain 2xx check.
 * - polling=true: the 2xx body must be { task_id }; the task is then followed
 *   until completed (ok) or failed / deadline (not ok).
 */

import { HttpProbeCheck } from "./HttpProbeCheck";
import type { HealthCheckResult } from "../types";
import type { TaskPoller } from "../TaskPoller";
import type { ServerClient } from "../../svc/ServerClient";
import {
  ExecuteRequestSchema,
  MODEL_SERVER_PATHS,
  TaskCreationSchema,
  type ExecuteRequest,
} from "../../contracts/modelServer.contract";

export class ExecuteProbeCheck extends HttpProbeCheck {
  constructor(
    client: ServerClient,
    private readonly payload: ExecuteRequest,
    private readonly poller: TaskPoller,
    opts: { connectTimeoutMs?: number } = {}
  ) {
    super(client, {
      name: "execute",
      label: "API功能测试",
      critical: true,
      path: MODEL_SERVER_PATHS.mcpExecute,
      method: "POST",
      body: ExecuteRequestSchema.parse(payload),
      connectTimeoutMs: opts.connectTimeoutMs,
    });
  }

  async check(): Promise<HealthCheckResult> {
    const t0 = Date.now();
    const result = await super.check();
    if (!result.ok || !this.payload.polling || !result.details) return result;

    const created = TaskCreationSchema.safeParse(result.details.response);
    if (!created.success) {
      return {
        ...result,
        ok: false,
        errorCode: "bad_payload",
        error: "unexpected task creation payload",
      };
    }

    const outcome = await this.poller.waitFor(created.data.task_id, this.spec.connectTimeoutMs);
    return {
      ...result,
      ok: outcome.ok,
      durationMs: Date.now() - t0,
      details: {
        ...result.details,
        task: { id: outcome.taskId, state: outcome.state, polls: outcome.polls },
      },
      errorCode: outcome.errorCode,
      error: outcome.error,
    };
  }
}
