// backend/tools/test/setup.spec.ts
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { BufferedIo } from "../../shared/src/cli/io";
import type { CommandOutcome, CommandRunner, CommandSpec } from "../../shared/src/proc/CommandRunner";
import { formatCommand } from "../../shared/src/proc/CommandRunner";
import { runSetup } from "../setup/index";

/** Responds per executable; anything not listed is missing (ENOENT). */
function fakeRunner(versions: Record<string, string>) {
  const calls: CommandSpec[] = [];
  const run: CommandRunner = async (spec) => {
    calls.push(spec);
    const command = formatCommand(spec.command, spec.args);
    const stdout = versions[spec.command];
    if (stdout === undefined) {
      const missing: CommandOutcome = {
        kind: "error",
        command,
        message: `Command failed with ENOENT: ${command}`,
        durationMs: 1,
      };
      return missing;
    }
    return { kind: "ok", command, exitCode: 0, stdout: spec.args[0] === "sync" ? undefined : stdout, durationMs: 1 };
  };
  return { run, calls };
}

const NEXT_STEPS =
  "下一步: 编辑 .env → npm run env:check → npm run preload → npm run server:start → npm run health-check";

describe("runSetup", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "ops-setup-"));
    fs.writeFileSync(path.join(dir, ".env.example"), "api_key=\n");
  });
  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("walks every step and tolerates a missing optional deno", async () => {
    const { run, calls } = fakeRunner({ uv: "uv 0.5.0\n", npm: "10.8.0\n" });
    const io = new BufferedIo();
    const code = await runSetup([], io, { env: {}, run, cwd: dir });

    expect(code).toBe(0);
    expect(io.stdout).toEqual([
      "[1/5] 检查 uv",
      "  ✔ uv 0.5.0",
      "[2/5] 检查 npm",
      "  ✔ 10.8.0",
      "[3/5] 检查 deno",
      "  ⚠️ 可选步骤失败: Command failed with ENOENT: deno --version",
      "[4/5] 安装服务器依赖 (uv sync)",
      "  ✔",
      "[5/5] 创建 .env",
      "  ✔ 已从 .env.example 创建",
      "✅ 环境初始化完成",
      NEXT_STEPS,
    ]);
    expect(calls[3]).toMatchObject({ command: "uv", args: ["sync"], cwd: dir });
    expect(fs.existsSync(path.join(dir, ".env"))).toBe(true);
  });

  it("stops at the first failing required step", async () => {
    const { run, calls } = fakeRunner({ uv: "uv 0.5.0" });
    const io = new BufferedIo();
    const code = await runSetup([], io, { env: {}, run, cwd: dir });

    expect(code).toBe(1);
    expect(io.stdout.slice(-2)).toEqual([
      "  ❌ Command failed with ENOENT: npm --version",
      "❌ 环境初始化失败: 检查 npm",
    ]);
    expect(calls).toHaveLength(2);
    expect(fs.existsSync(path.join(dir, ".env"))).toBe(false);
  });

  it("skips uv sync and keeps an existing .env", async () => {
    fs.writeFileSync(path.join(dir, ".env"), "api_key=test-secret\n");
    const { run, calls } = fakeRunner({ uv: "uv 0.5.0", npm: "10.8.0", deno: "deno 2.1.0" });
    const io = new BufferedIo();
    const code = await runSetup(["--skip-install"], io, { env: {}, run, cwd: dir });

    expect(code).toBe(0);
    expect(io.stdout).toContain("  ↷ 已跳过");
    expect(io.stdout).toContain("  ✔ 已存在, 保留原文件");
    expect(calls.some((c) => c.args[0] === "sync")).toBe(false);
    expect(fs.readFileSync(path.join(dir, ".env"), "utf8")).toBe("api_key=test-secret\n");
  });
});
