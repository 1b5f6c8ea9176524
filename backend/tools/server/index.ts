// backend/tools/server/index.ts
/**
 * Tool: server:start
 *
 * Purpose:
 * - Run the model server in the foreground with the mirror environment, so
 *   MCP servers it launches through npx/uvx resolve against the mirrors.
 * - Optionally wait until GET / answers 2xx and report readiness.
 * - Ctrl+C forwards SIGINT to the server; the server's exit code is ours.
 *
 * Flags:
 *   --command "<cmd line>"  (default SERVER_COMMAND or uv run uvicorn …)
 *   --wait-healthy
 *   --wait-timeout <sec>    (default SERVER_WAIT_TIMEOUT_SEC, 120)
 *   --no-mirror             do not inject UV_INDEX_URL / npm_config_registry
 *   --env-file <path>
 */

import { assertKnownFlags, flagBool, flagSeconds, flagString, parseArgs } from "../../shared/src/cli/args";
import type { CliIo } from "../../shared/src/cli/io";
import { bootstrapTool } from "../../shared/src/bootstrap";
import { MODEL_SERVER_PATHS } from "../../shared/src/contracts/modelServer.contract";
import { defaultSleep, type Sleep } from "../../shared/src/health/TaskPoller";
import { logger } from "../../shared/src/logger";
import { ServerClient } from "../../shared/src/svc/ServerClient";
import { mirrorEnv } from "../preload/mirror";
import { execaLauncher, type ServerLauncher } from "./launcher";

const KNOWN_FLAGS = ["command", "wait-healthy", "wait-timeout", "mirror", "env-file"] as const;
const POLL_INTERVAL_MS = 2000;

export interface SignalSource {
  once(event: "SIGINT", listener: () => void): unknown;
  removeListener(event: "SIGINT", listener: () => void): unknown;
}

export interface ServerStartDeps {
  env?: Record<string, string | undefined>;
  launch?: ServerLauncher;
  sleep?: Sleep;
  now?: () => number;
  /** SIGINT source; defaults to process */
  signals?: SignalSource;
}

/**
 * Poll GET / until 2xx. Gives up at the deadline or as soon as `stopped()`
 * reports that the server process is gone.
 */
export async function waitUntilHealthy(
  client: ServerClient,
  opts: { timeoutMs: number; intervalMs?: number },
  stopped: () => boolean,
  sleep: Sleep = defaultSleep,
  now: () => number = Date.now
): Promise<boolean> {
  const deadline = now() + opts.timeoutMs;
  const interval = opts.intervalMs ?? POLL_INTERVAL_MS;
  while (!stopped() && now() < deadline) {
    const windowMs = Math.max(1, Math.min(interval, deadline - now()));
    const res = await client.call({
      path: MODEL_SERVER_PATHS.root,
      connectTimeoutMs: windowMs,
      responseTimeoutMs: windowMs,
    });
    if (res.ok) return true;
    await sleep(interval);
  }
  return false;
}

export async function runServerStart(
  args: string[],
  io: CliIo,
  deps: ServerStartDeps = {}
): Promise<number> {
  const { flags } = parseArgs(args);
  assertKnownFlags(flags, KNOWN_FLAGS);
  const cfg = bootstrapTool(flagString(flags, "env-file"), deps.env);

  const command = flagString(flags, "command") ?? cfg.serverCommand;
  const env = flagBool(flags, "mirror", true) ? mirrorEnv(cfg.mirrors) : {};
  const launch = deps.launch ?? execaLauncher;
  const signals: SignalSource = deps.signals ?? process;

  io.out(`▶ 启动服务器: ${command}`);
  io.out("按 Ctrl+C 停止服务器");
  logger.info({ command, mirror: Object.keys(env).length > 0 }, "server start");

  const handle = launch(command, env);
  let exited = false;
  const exitCode = handle.exited.then((code) => {
    exited = true;
    return code;
  });

  const onSigint = () => handle.kill("SIGINT");
  signals.once("SIGINT", onSigint);

  try {
    if (flagBool(flags, "wait-healthy")) {
      const timeoutMs = flagSeconds(flags, "wait-timeout") ?? cfg.serverWaitTimeoutMs;
      const client = new ServerClient(cfg.serverUrl);
      const healthy = await waitUntilHealthy(
        client,
        { timeoutMs },
        () => exited,
        deps.sleep,
        deps.now
      );
      if (healthy) {
        io.out(`✅ 服务器已就绪: ${client.baseUrl} (文档: ${client.urlFor(MODEL_SERVER_PATHS.docs)})`);
      } else if (!exited) {
        io.out(`⚠️ 服务器在 ${Math.round(timeoutMs / 1000)} 秒内未就绪, 继续运行`);
      }
    }

    const code = await exitCode;
    io.out(`服务器已退出 (退出码 ${code})`);
    return code;
  } finally {
    signals.removeListener("SIGINT", onSigint);
  }
}
