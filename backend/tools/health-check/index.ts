// backend/tools/health-check/index.ts
/**
 * Tool: model server health check
 *
 * Purpose:
 * - Probe GET / and POST /api/v1/mcp/execute (optionally GET /docs) and print
 *   a pass/fail report. Exit 0 iff every critical probe passed, else 1.
 *
 * Flags:
 *   --url <base>        (default SERVER_URL or http://127.0.0.1:${SERVER_PORT})
 *   --timeout <sec>     connect timeout (default HEALTH_TIMEOUT_SEC, 60)
 *   --input <text>      (default HEALTH_INPUT, "Hello!")
 *   --polling           follow the created task until it settles
 *   --docs              also probe /docs (non-critical)
 *   --json              print the report as JSON
 *   --env-file <path>   (default ENV_FILE or .env; optional)
 */

import { assertKnownFlags, flagBool, flagSeconds, flagString, parseArgs } from "../../shared/src/cli/args";
import type { CliIo } from "../../shared/src/cli/io";
import { bootstrapTool } from "../../shared/src/bootstrap";
import { EXIT } from "../../shared/src/errors";
import { HealthService } from "../../shared/src/health/HealthService";
import { TaskPoller, type Sleep } from "../../shared/src/health/TaskPoller";
import { ExecuteProbeCheck } from "../../shared/src/health/checks/ExecuteProbeCheck";
import { HttpProbeCheck } from "../../shared/src/health/checks/HttpProbeCheck";
import { MODEL_SERVER_PATHS } from "../../shared/src/contracts/modelServer.contract";
import { logger } from "../../shared/src/logger";
import { ServerClient } from "../../shared/src/svc/ServerClient";
import { formatHeader, formatProbe, formatSummary } from "./report";

const KNOWN_FLAGS = ["url", "timeout", "input", "polling", "docs", "json", "env-file"] as const;

export interface HealthCheckDeps {
  env?: Record<string, string | undefined>;
  sleep?: Sleep;
  now?: () => Date;
}

export async function runHealthCheck(
  args: string[],
  io: CliIo,
  deps: HealthCheckDeps = {}
): Promise<number> {
  const { flags } = parseArgs(args);
  assertKnownFlags(flags, KNOWN_FLAGS);

  const cfg = bootstrapTool(flagString(flags, "env-file"), deps.env);

  const timeoutMs = flagSeconds(flags, "timeout") ?? cfg.healthTimeoutMs;
  const polling = flagBool(flags, "polling");
  const asJson = flagBool(flags, "json");

  const client = new ServerClient(flagString(flags, "url") ?? cfg.serverUrl, {
    connectTimeoutMs: timeoutMs,
  });
  const poller = new TaskPoller(client, cfg.taskPoll, deps.sleep);

  const service = new HealthService(client.baseUrl)
    .add(
      new HttpProbeCheck(client, {
        name: "root",
        label: "基础连接测试",
        critical: true,
        path: MODEL_SERVER_PATHS.root,
      })
    )
    .add(
      new ExecuteProbeCheck(
        client,
        { INPUT: flagString(flags, "input") ?? cfg.healthInput, polling },
        poller,
        { connectTimeoutMs: timeoutMs }
      )
    );
  if (flagBool(flags, "docs")) {
    service.add(
      new HttpProbeCheck(client, {
        name: "docs",
        label: "文档页面测试",
        critical: false,
        path: MODEL_SERVER_PATHS.docs,
      })
    );
  }

  logger.info({ target: client.baseUrl, timeoutMs, polling }, "health check start");
  if (!asJson) io.out(formatHeader(deps.now?.() ?? new Date()));

  const report = await service.run(asJson ? undefined : (r) => io.out(formatProbe(r)));
  io.out(asJson ? JSON.stringify(report, null, 2) : formatSummary(report));

  logger.info(
    { status: report.status, durationMs: report.durationMs },
    "health check done"
  );
  return report.status === "down" ? EXIT.Failed : EXIT.Ok;
}
