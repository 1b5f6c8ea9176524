// backend/shared/src/contracts/modelServer.contract.ts
/**
 * Purpose:
 * - Wire shapes of the model server endpoints the probes touch.
 * - Zod only at edges; callers import the inferred types.
 *
 * Invariants:
 * - The execute body keys are literally "INPUT" and "polling".
 * - In polling mode the server answers 2xx with { task_id } and the task is
 *   then read from GET /api/v1/tasks/{task_id}.
 */

import { z } from "zod";

export const MODEL_SERVER_PATHS = {
  root: "/",
  docs: "/docs",
  mcpExecute: "/api/v1/mcp/execute",
  task: (taskId: string) => `/api/v1/tasks/${encodeURIComponent(taskId)}`,
} as const;

export const ExecuteRequestSchema = z.object({
  INPUT: z.string(),
  polling: z.boolean(),
});
export type ExecuteRequest = z.infer<typeof ExecuteRequestSchema>;

export const TaskCreationSchema = z.object({
  task_id: z.string().min(1),
});
export type TaskCreation = z.infer<typeof TaskCreationSchema>;

export const TaskStateSchema = z.enum([
  "pending",
  "processing",
  "completed",
  "failed",
]);
export type TaskState = z.infer<typeof TaskStateSchema>;

export const TaskStatusSchema = z.object({
  task_id: z.string().min(1),
  status: TaskStateSchema,
  result: z.unknown().optional(),
});
export type TaskStatus = z.infer<typeof TaskStatusSchema>;

const FailedResultSchema = z.object({ error: z.unknown() });

/** Error text of a failed task ({ result: { error } }), if present. */
export function taskErrorText(status: TaskStatus): string {
  const parsed = FailedResultSchema.safeParse(status.result);
  if (!parsed.success) return "unknown error";
  return typeof parsed.data.error === "string"
    ? parsed.data.error
    : JSON.stringify(parsed.data.error);
}
