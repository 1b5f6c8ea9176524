// backend/tools/env/envCheck.ts
/**
 * Tool: env:check
 *
 * Verify that the server's .env carries every required key with a non-empty
 * value. The file is parsed, never loaded into process.env.
 *
 * Flags:
 *   --env-file <path>   (default ENV_FILE, .env)
 *   --require <KEY>     repeatable; added to the defaults
 */

import path from "node:path";
import { assertKnownFlags, flagList, flagString, parseArgs } from "../../shared/src/cli/args";
import type { CliIo } from "../../shared/src/cli/io";
import { loadOpsConfig } from "../../shared/src/config";
import { missingKeys, readEnvFile } from "../../shared/src/env";
import { EXIT, ToolError, errorMessage } from "../../shared/src/errors";

export const DEFAULT_REQUIRED_KEYS = ["api_key"] as const;

export const OPERATIONAL_NOTES = [
  "注意: 服务器只在启动时读取 .env, 修改后必须重启服务器才能生效。",
  "注意: 重新部署配置后, 请在外部工具平台手动清除缓存的全局变量, 否则工具调用可能使用旧值。",
] as const;

const KNOWN_FLAGS = ["env-file", "require"] as const;

export async function runEnvCheck(
  args: string[],
  io: CliIo,
  deps: { env?: Record<string, string | undefined>; cwd?: string } = {}
): Promise<number> {
  const { flags } = parseArgs(args);
  assertKnownFlags(flags, KNOWN_FLAGS);
  const cfg = loadOpsConfig(deps.env);

  const envFile = path.resolve(
    deps.cwd ?? process.cwd(),
    flagString(flags, "env-file") ?? cfg.envFile
  );
  const required = [...new Set([...DEFAULT_REQUIRED_KEYS, ...flagList(flags, "require")])];

  let values: Record<string, string>;
  try {
    values = readEnvFile(envFile);
  } catch (err) {
    throw new ToolError(`${errorMessage(err)} (先运行 env:init)`);
  }

  const missing = missingKeys(values, required);
  if (missing.length) {
    io.out(`缺少配置项: ${missing.join(", ")}`);
  } else {
    io.out(`✅ ${envFile} 配置检查通过 (${required.length} 项必填)`);
  }
  for (const note of OPERATIONAL_NOTES) io.out(note);

  return missing.length ? EXIT.Failed : EXIT.Ok;
}
