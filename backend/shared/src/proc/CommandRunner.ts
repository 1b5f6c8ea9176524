// backend/shared/src/proc/CommandRunner.ts
/**
 * Purpose:
 * - Swappable subprocess runner. Returns a uniform outcome; never throws for
 *   non-zero exits, timeouts or spawn failures (ENOENT etc.).
 * - `killTree`: the command runs in its own process group and a timeout
 *   signals the whole group (npx / uvx start grandchildren), SIGTERM first,
 *   SIGKILL after FORCE_KILL_AFTER_MS or once the leader has exited.
 */

import { execa, type ExecaError } from "execa";
import { errorMessage } from "../errors";
import { logger } from "../logger";

export type CommandOutcomeKind = "ok" | "exit" | "timeout" | "error";

export interface CommandOutcome {
  kind: CommandOutcomeKind;
  command: string;
  exitCode?: number;
  stdout?: string;
  message?: string;
  durationMs: number;
}

export interface CommandSpec {
  command: string;
  args: string[];
  /** Merged over process.env. */
  env?: Record<string, string>;
  timeoutMs?: number;
  cwd?: string;
  /** default "ignore" */
  stdio?: "ignore" | "pipe" | "inherit";
  killTree?: boolean;
}

export type CommandRunner = (spec: CommandSpec) => Promise<CommandOutcome>;

export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args].join(" ");
}

const FORCE_KILL_AFTER_MS = 5000;

function isExecaError(err: unknown): err is ExecaError {
  return err instanceof Error && "timedOut" in err && "shortMessage" in err;
}

function killGroup(pid: number, signal: NodeJS.Signals): void {
  try {
    process.kill(-pid, signal);
  } catch (err) {
    // ESRCH once the group is gone
    logger.debug({ pid, signal, err: errorMessage(err) }, "process group kill skipped");
  }
}

interface GroupTimeout {
  readonly timedOut: boolean;
  settle(): void;
}

function watchGroup(pid: number | undefined, timeoutMs: number | undefined): GroupTimeout {
  let timedOut = false;
  let force: NodeJS.Timeout | undefined;
  const timer =
    pid === undefined || timeoutMs === undefined
      ? undefined
      : setTimeout(() => {
          timedOut = true;
          killGroup(pid, "SIGTERM");
          force = setTimeout(() => killGroup(pid, "SIGKILL"), FORCE_KILL_AFTER_MS);
        }, timeoutMs);

  return {
    get timedOut() {
      return timedOut;
    },
    settle() {
      clearTimeout(timer);
      clearTimeout(force);
      if (timedOut && pid !== undefined) killGroup(pid, "SIGKILL");
    },
  };
}

export const execaRunner: CommandRunner = async (spec) => {
  const command = formatCommand(spec.command, spec.args);
  const t0 = Date.now();
  const groupKill = spec.killTree === true && process.platform !== "win32";
  const timeoutOutcome = (): CommandOutcome => ({
    kind: "timeout",
    command,
    message: `timed out after ${spec.timeoutMs ?? 0}ms`,
    durationMs: Date.now() - t0,
  });

  const child = execa(spec.command, spec.args, {
    env: spec.env,
    cwd: spec.cwd,
    timeout: groupKill ? undefined : spec.timeoutMs,
    detached: groupKill,
    stdio: spec.stdio ?? "ignore",
  });
  const group = groupKill ? watchGroup(child.pid, spec.timeoutMs) : undefined;

  try {
    const res = await child;
    if (group?.timedOut) return timeoutOutcome();
    return {
      kind: "ok",
      command,
      exitCode: 0,
      stdout: typeof res.stdout === "string" ? res.stdout : undefined,
      durationMs: Date.now() - t0,
    };
  } catch (err) {
    const durationMs = Date.now() - t0;
    if (group?.timedOut) return timeoutOutcome();
    if (!isExecaError(err)) {
      return { kind: "error", command, message: String(err), durationMs };
    }
    if (err.timedOut) return timeoutOutcome();
    if (typeof err.exitCode === "number") {
      return {
        kind: "exit",
        command,
        exitCode: err.exitCode,
        message: err.shortMessage,
        durationMs,
      };
    }
    return { kind: "error", command, message: err.shortMessage, durationMs };
  } finally {
    group?.settle();
  }
};
