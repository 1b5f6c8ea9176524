// backend/tools/preload/index.ts
/**
 * Tool: MCP dependency preloader (through package mirrors)
 *
 * Purpose:
 * - Point uv / npm at the configured mirrors, then warm every MCP server in
 *   the catalog concurrently. Exit 0 only when nothing failed.
 *
 * Flags:
 *   --uv-index-url <url>   (default UV_INDEX_URL)
 *   --npm-registry <url>   (default NPM_REGISTRY)
 *   --no-persist           do not run `npm config set registry`
 *   --timeout <sec>        per command (default PRELOAD_TIMEOUT_SEC, 30)
 *   --only <name>          repeatable; restrict to these catalog entries
 *   --catalog <path>       (default MCP_CATALOG_FILE, config/mcp-servers.json)
 *   --env-file <path>
 */

import { assertKnownFlags, flagBool, flagList, flagSeconds, flagString, parseArgs } from "../../shared/src/cli/args";
import type { CliIo } from "../../shared/src/cli/io";
import { bootstrapTool } from "../../shared/src/bootstrap";
import { EXIT } from "../../shared/src/errors";
import { logger } from "../../shared/src/logger";
import { execaRunner, type CommandRunner } from "../../shared/src/proc/CommandRunner";
import { loadMcpCatalog, preloadTargets } from "./catalog";
import { applyMirrors } from "./mirror";
import { Preloader, type PreloadOutcome } from "./Preloader";

const KNOWN_FLAGS = ["uv-index-url", "npm-registry", "persist", "timeout", "only", "catalog", "env-file"] as const;

export interface PreloadDeps {
  env?: Record<string, string | undefined>;
  run?: CommandRunner;
}

function outcomeLine(o: PreloadOutcome): string {
  switch (o.status) {
    case "ok":
      return `✔ Preloaded ${o.name} (${o.durationMs}ms)`;
    case "timeout":
      return `⚠️ Timeout for ${o.name} - 可能已缓存`;
    case "failed":
      return `❌ Failed to preload ${o.name}: ${o.message ?? `exit code ${o.exitCode ?? "?"}`}`;
  }
}

export async function runPreload(
  args: string[],
  io: CliIo,
  deps: PreloadDeps = {}
): Promise<number> {
  const { flags } = parseArgs(args);
  assertKnownFlags(flags, KNOWN_FLAGS);

  const cfg = bootstrapTool(flagString(flags, "env-file"), deps.env);
  const run = deps.run ?? execaRunner;

  const catalog = loadMcpCatalog(flagString(flags, "catalog") ?? cfg.mcpCatalogPath);
  const targets = preloadTargets(catalog, flagList(flags, "only"));

  io.out("🚀 设置镜像源...");
  const mirror = await applyMirrors(
    {
      uvIndexUrl: flagString(flags, "uv-index-url") ?? cfg.mirrors.uvIndexUrl,
      npmRegistry: flagString(flags, "npm-registry") ?? cfg.mirrors.npmRegistry,
      persistNpmRegistry: flagBool(flags, "persist", true),
    },
    run
  );
  io.out(`UV_INDEX_URL=${mirror.env.UV_INDEX_URL}`);
  io.out(`npm registry=${mirror.env.npm_config_registry}`);

  const mirrorFailed = mirror.persisted !== undefined && mirror.persisted.kind !== "ok";
  if (mirror.persisted && mirrorFailed) {
    io.out(`❌ npm 镜像设置失败: ${mirror.persisted.message ?? mirror.persisted.kind}`);
  }

  io.out("📦 开始预加载 MCP 依赖...");
  io.out("提示: 已缓存的服务器在重复预加载时可能超时, 超时不计为失败。");

  const preloader = new Preloader(run, {
    timeoutMs: flagSeconds(flags, "timeout") ?? cfg.preloadTimeoutMs,
    env: mirror.env,
  });
  const summary = await preloader.preloadAll(targets, {
    onStart: (_t, command) => io.out(`Preloading: ${command}`),
    onDone: (o) => io.out(outcomeLine(o)),
  });

  logger.info(
    {
      ok: summary.ok.length,
      timedOut: summary.timedOut.length,
      failed: summary.failed.length,
      mirrorFailed,
    },
    "preload done"
  );

  const failures = summary.failed.length + (mirrorFailed ? 1 : 0);
  if (failures > 0) {
    io.out(`❌ 预加载未完成: ${failures} 个命令失败`);
    return EXIT.Failed;
  }
  io.out("✅ 预加载完成，MCP 启动将更快！");
  return EXIT.Ok;
}
