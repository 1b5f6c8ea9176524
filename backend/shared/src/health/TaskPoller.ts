// backend/shared/src/health/TaskPoller.ts
/**
 * Purpose:
 * - Follow a polling-mode task on GET /api/v1/tasks/{id} until it settles.
 *
 * Back-off: first read after `initialMs`, each wait multiplied by `factor`
 * and capped at `maxMs`; gives up once `deadlineMs` has elapsed. Any non-2xx
 * (404 = unknown/expired task) or unreadable payload ends polling as failed.
 */

import type { TaskPollSettings } from "../config";
import {
  MODEL_SERVER_PATHS,
  TaskStatusSchema,
  taskErrorText,
  type TaskState,
} from "../contracts/modelServer.contract";
import { logger } from "../logger";
import type { ServerClient } from "../svc/ServerClient";

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

export interface TaskPollOutcome {
  ok: boolean;
  taskId: string;
  state?: TaskState;
  polls: number;
  errorCode?: "timeout" | "task_failed" | "network_error" | "upstream_error" | "bad_payload";
  error?: string;
}

export class TaskPoller {
  constructor(
    private readonly client: ServerClient,
    private readonly settings: TaskPollSettings,
    private readonly sleep: Sleep = defaultSleep,
    private readonly now: () => number = Date.now
  ) {}

  public async waitFor(taskId: string, connectTimeoutMs?: number): Promise<TaskPollOutcome> {
    const deadline = this.now() + this.settings.deadlineMs;
    let delay = this.settings.initialMs;
    let polls = 0;

    for (;;) {
      const remaining = deadline - this.now();
      if (remaining <= 0) {
        return {
          ok: false,
          taskId,
          polls,
          errorCode: "timeout",
          error: `task not settled within ${this.settings.deadlineMs}ms`,
        };
      }
      await this.sleep(Math.min(delay, remaining));

      polls++;
      const res = await this.client.call({
        path: MODEL_SERVER_PATHS.task(taskId),
        connectTimeoutMs,
      });
      if (!res.ok) {
        return {
          ok: false,
          taskId,
          polls,
          errorCode: res.error?.code ?? "upstream_error",
          error: res.error?.message ?? `HTTP ${res.status}`,
        };
      }

      const parsed = TaskStatusSchema.safeParse(res.data);
      if (!parsed.success) {
        return {
          ok: false,
          taskId,
          polls,
          errorCode: "bad_payload",
          error: "unexpected task status payload",
        };
      }

      const state = parsed.data.status;
      logger.debug({ taskId, state, polls }, "task poll");
      if (state === "completed") return { ok: true, taskId, state, polls };
      if (state === "failed") {
        return {
          ok: false,
          taskId,
          state,
          polls,
          errorCode: "task_failed",
          error: taskErrorText(parsed.data),
        };
      }

      delay = Math.min(delay * this.settings.factor, this.settings.maxMs);
    }
  }
}
