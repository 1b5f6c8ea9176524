// backend/tools/env/envInit.ts
/**
 * Tool: env:init
 *
 * Create .env from .env.example. Never overwrites an existing .env unless
 * --force is given.
 *
 * Flags:
 *   --force
 *   --template <path>   (default ENV_TEMPLATE_FILE, .env.example)
 *   --env-file <path>   target (default ENV_FILE, .env)
 */

import fs from "node:fs";
import path from "node:path";
import { assertKnownFlags, flagBool, flagString, parseArgs } from "../../shared/src/cli/args";
import type { CliIo } from "../../shared/src/cli/io";
import { loadOpsConfig } from "../../shared/src/config";
import { EXIT, ToolError } from "../../shared/src/errors";
import { logger } from "../../shared/src/logger";

export type InitResult = "created" | "overwritten" | "exists";

export function initEnvFile(opts: {
  template: string;
  target: string;
  force?: boolean;
  cwd?: string;
}): InitResult {
  const cwd = opts.cwd ?? process.cwd();
  const template = path.resolve(cwd, opts.template);
  const target = path.resolve(cwd, opts.target);

  if (!fs.existsSync(template)) {
    throw new ToolError(`未找到模板文件: ${template}`);
  }
  const existed = fs.existsSync(target);
  if (existed && !opts.force) return "exists";

  fs.copyFileSync(template, target);
  logger.info({ template, target, overwritten: existed }, "env file written");
  return existed ? "overwritten" : "created";
}

const KNOWN_FLAGS = ["force", "template", "env-file"] as const;

export async function runEnvInit(
  args: string[],
  io: CliIo,
  deps: { env?: Record<string, string | undefined>; cwd?: string } = {}
): Promise<number> {
  const { flags } = parseArgs(args);
  assertKnownFlags(flags, KNOWN_FLAGS);
  const cfg = loadOpsConfig(deps.env);

  const target = flagString(flags, "env-file") ?? cfg.envFile;
  const template = flagString(flags, "template") ?? cfg.envTemplateFile;
  const result = initEnvFile({
    template,
    target,
    force: flagBool(flags, "force"),
    cwd: deps.cwd,
  });

  if (result === "exists") {
    io.out(`⚠️ ${target} 已存在, 未做修改 (使用 --force 覆盖)`);
    return EXIT.Failed;
  }
  io.out(`✅ 已${result === "created" ? "创建" : "覆盖"} ${target} (来自 ${template})`);
  io.out("请编辑该文件填写 api_key 等配置项, 然后重启服务器使其生效。");
  return EXIT.Ok;
}
