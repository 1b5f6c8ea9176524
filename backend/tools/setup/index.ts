// backend/tools/setup/index.ts
/**
 * Tool: setup (environment bootstrap)
 *
 * Sequential steps, stopping at the first failing required step:
 *   1. uv --version            required
 *   2. npm --version           required
 *   3. deno --version          optional (one MCP server runs on deno)
 *   4. uv sync                 install server dependencies (--skip-install)
 *   5. .env from .env.example  never overwrites
 *
 * System packages and the repository clone stay manual.
 */

import { assertKnownFlags, flagBool, flagString, parseArgs } from "../../shared/src/cli/args";
import type { CliIo } from "../../shared/src/cli/io";
import { loadOpsConfig } from "../../shared/src/config";
import { EXIT, errorMessage } from "../../shared/src/errors";
import { logger } from "../../shared/src/logger";
import { execaRunner, type CommandOutcome, type CommandRunner } from "../../shared/src/proc/CommandRunner";
import { initEnvFile } from "../env/envInit";

const KNOWN_FLAGS = ["skip-install", "env-file", "template"] as const;
const VERSION_TIMEOUT_MS = 30_000;

export interface StepResult {
  ok: boolean;
  skipped?: boolean;
  detail?: string;
}

export interface SetupStep {
  label: string;
  optional?: boolean;
  run(): Promise<StepResult>;
}

export interface SetupDeps {
  env?: Record<string, string | undefined>;
  run?: CommandRunner;
  cwd?: string;
}

function fromOutcome(o: CommandOutcome): StepResult {
  if (o.kind === "ok") return { ok: true, detail: o.stdout?.split("\n")[0]?.trim() || undefined };
  return { ok: false, detail: o.message ?? o.kind };
}

function versionStep(run: CommandRunner, tool: string, optional = false): SetupStep {
  return {
    label: `检查 ${tool}`,
    optional,
    run: async () =>
      fromOutcome(
        await run({
          command: tool,
          args: ["--version"],
          stdio: "pipe",
          timeoutMs: VERSION_TIMEOUT_MS,
        })
      ),
  };
}

export function buildSetupSteps(opts: {
  run: CommandRunner;
  skipInstall: boolean;
  envFile: string;
  template: string;
  cwd?: string;
}): SetupStep[] {
  return [
    versionStep(opts.run, "uv"),
    versionStep(opts.run, "npm"),
    versionStep(opts.run, "deno", true),
    {
      label: "安装服务器依赖 (uv sync)",
      run: async () => {
        if (opts.skipInstall) return { ok: true, skipped: true };
        return fromOutcome(
          await opts.run({ command: "uv", args: ["sync"], stdio: "inherit", cwd: opts.cwd })
        );
      },
    },
    {
      label: `创建 ${opts.envFile}`,
      run: async () => {
        const result = initEnvFile({
          template: opts.template,
          target: opts.envFile,
          cwd: opts.cwd,
        });
        return {
          ok: true,
          detail: result === "exists" ? "已存在, 保留原文件" : `已从 ${opts.template} 创建`,
        };
      },
    },
  ];
}

export async function runSteps(steps: readonly SetupStep[], io: CliIo): Promise<string | undefined> {
  for (const [i, step] of steps.entries()) {
    io.out(`[${i + 1}/${steps.length}] ${step.label}`);
    let r: StepResult;
    try {
      r = await step.run();
    } catch (err) {
      r = { ok: false, detail: errorMessage(err) };
    }
    logger.debug({ step: step.label, ...r }, "setup step");

    if (r.skipped) {
      io.out("  ↷ 已跳过");
    } else if (r.ok) {
      io.out(r.detail ? `  ✔ ${r.detail}` : "  ✔");
    } else if (step.optional) {
      io.out(`  ⚠️ 可选步骤失败: ${r.detail ?? "unknown"}`);
    } else {
      io.out(`  ❌ ${r.detail ?? "failed"}`);
      return step.label;
    }
  }
  return undefined;
}

export async function runSetup(
  args: string[],
  io: CliIo,
  deps: SetupDeps = {}
): Promise<number> {
  const { flags } = parseArgs(args);
  assertKnownFlags(flags, KNOWN_FLAGS);
  const cfg = loadOpsConfig(deps.env);

  const steps = buildSetupSteps({
    run: deps.run ?? execaRunner,
    skipInstall: flagBool(flags, "skip-install"),
    envFile: flagString(flags, "env-file") ?? cfg.envFile,
    template: flagString(flags, "template") ?? cfg.envTemplateFile,
    cwd: deps.cwd,
  });

  const failedAt = await runSteps(steps, io);
  if (failedAt) {
    io.out(`❌ 环境初始化失败: ${failedAt}`);
    return EXIT.Failed;
  }
  io.out("✅ 环境初始化完成");
  io.out("下一步: 编辑 .env → npm run env:check → npm run preload → npm run server:start → npm run health-check");
  return EXIT.Ok;
}
