// backend/tools/preload/Preloader.ts
/**
 * Purpose:
 * - Warm the package caches of every MCP server (npx / uvx / deno downloads)
 *   so the model server's first MCP request does not pay for them.
 * - All targets run concurrently. Output is discarded.
 *
 * Outcomes:
 * - ok      → command exited 0
 * - timeout → process group killed after timeoutMs; a server that is already cached often
 *             keeps running instead of exiting on --help, so not a failure
 * - failed  → spawn error or non-zero exit
 */

import type { CommandRunner } from "../../shared/src/proc/CommandRunner";
import { formatCommand } from "../../shared/src/proc/CommandRunner";
import { errorMessage } from "../../shared/src/errors";
import { logger } from "../../shared/src/logger";
import type { PreloadTarget } from "./catalog";

export type PreloadStatus = "ok" | "timeout" | "failed";

export interface PreloadOutcome {
  name: string;
  command: string;
  status: PreloadStatus;
  exitCode?: number;
  message?: string;
  durationMs: number;
}

export interface PreloadSummary {
  outcomes: PreloadOutcome[];
  ok: PreloadOutcome[];
  timedOut: PreloadOutcome[];
  failed: PreloadOutcome[];
}

export interface PreloadListener {
  onStart?(target: PreloadTarget, command: string): void;
  onDone?(outcome: PreloadOutcome): void;
}

export class Preloader {
  constructor(
    private readonly run: CommandRunner,
    private readonly opts: { timeoutMs: number; env?: Record<string, string> }
  ) {}

  public async preloadAll(
    targets: readonly PreloadTarget[],
    listener: PreloadListener = {}
  ): Promise<PreloadSummary> {
    const outcomes = await Promise.all(
      targets.map((t) => this.preloadOne(t, listener))
    );
    return {
      outcomes,
      ok: outcomes.filter((o) => o.status === "ok"),
      timedOut: outcomes.filter((o) => o.status === "timeout"),
      failed: outcomes.filter((o) => o.status === "failed"),
    };
  }

  private async preloadOne(
    target: PreloadTarget,
    listener: PreloadListener
  ): Promise<PreloadOutcome> {
    const command = formatCommand(target.command, target.args);
    listener.onStart?.(target, command);

    let outcome: PreloadOutcome;
    const t0 = Date.now();
    try {
      const res = await this.run({
        command: target.command,
        args: target.args,
        env: this.opts.env,
        timeoutMs: this.opts.timeoutMs,
        stdio: "ignore",
        killTree: true,
      });
      outcome = {
        name: target.name,
        command,
        status: res.kind === "ok" ? "ok" : res.kind === "timeout" ? "timeout" : "failed",
        exitCode: res.exitCode,
        message: res.message,
        durationMs: res.durationMs,
      };
    } catch (err) {
      outcome = {
        name: target.name,
        command,
        status: "failed",
        message: errorMessage(err),
        durationMs: Date.now() - t0,
      };
    }

    logger.debug({ ...outcome }, "preload outcome");
    listener.onDone?.(outcome);
    return outcome;
  }
}
