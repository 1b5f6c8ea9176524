// backend/tools/test/healthCheck.spec.ts
import { afterEach, describe, expect, it } from "vitest";
import { BufferedIo } from "../../shared/src/cli/io";
import { runCli } from "../../shared/src/cli/main";
import { runHealthCheck } from "../health-check/index";
import { SEPARATOR } from "../health-check/report";
import {
  closedPortUrl,
  startStandIn,
  type StandIn,
} from "../../shared/test/helpers/standInServer";

const NO_ENV_FILE = "/nonexistent/ops-tests.env";
const FIXED_NOW = () => new Date("2026-01-02T03:04:05.000Z");
const noSleep = async () => {};

function healthyServer(): Promise<StandIn> {
  return startStandIn((app) => {
    app.get("/", (_req, res) => {
      res.json({ status: "ok" });
    });
    app.post("/api/v1/mcp/execute", (_req, res) => {
      res.json({ output: "hi" });
    });
  });
}

describe("runHealthCheck", () => {
  let standIn: StandIn | undefined;

  afterEach(async () => {
    await standIn?.close();
    standIn = undefined;
  });

  it("prints the full report and exits 0 when the server is healthy", async () => {
    standIn = await healthyServer();
    const io = new BufferedIo();
    const code = await runHealthCheck(
      ["--url", standIn.url, "--env-file", NO_ENV_FILE],
      io,
      { env: {}, now: FIXED_NOW }
    );

    expect(code).toBe(0);
    expect(io.stdout).toEqual([
      "开始服务器健康检查 2026-01-02T03:04:05.000Z",
      SEPARATOR,
      "",
      SEPARATOR,
      "测试: 基础连接测试",
      `URL: ${standIn.url}`,
      "方法: GET",
      "{",
      '  "status": "ok"',
      "}",
      "状态码: 200",
      "[成功] 请求返回状态码: 200",
      "",
      SEPARATOR,
      "测试: API功能测试",
      `URL: ${standIn.url}/api/v1/mcp/execute`,
      "方法: POST",
      "请求体: *****",
      "{",
      '  "output": "hi"',
      "}",
      "状态码: 200",
      "[成功] 请求返回状态码: 200",
      "",
      SEPARATOR,
      "健康检查汇总:",
      "基础连接测试: 通过",
      "API功能测试: 通过",
      "",
      "[√] 所有测试通过! 服务器状态正常",
    ]);
    expect(standIn.requests[1].body).toEqual({ INPUT: "Hello!", polling: false });
  });

  it("uses --input for the probe payload", async () => {
    standIn = await healthyServer();
    await runHealthCheck(
      ["--url", standIn.url, "--env-file", NO_ENV_FILE, "--input", "ping"],
      new BufferedIo(),
      { env: {} }
    );
    expect(standIn.requests[1].body).toEqual({ INPUT: "ping", polling: false });
  });

  it("exits 1 and reports connection errors when nothing listens", async () => {
    const url = await closedPortUrl();
    const io = new BufferedIo();
    const code = await runHealthCheck(["--url", url, "--env-file", NO_ENV_FILE], io, {
      env: {},
    });

    expect(code).toBe(1);
    expect(io.stdout).toContain("[错误] 请求失败! (network_error)");
    expect(io.stdout).toContain("基础连接测试: 失败");
    expect(io.stdout).toContain("API功能测试: 失败");
    expect(io.stdout[io.stdout.length - 1]).toBe("[!] 健康检查未通过! 请检查服务器状态");
  });

  it("warns on a non-2xx execute and fails the run", async () => {
    standIn = await startStandIn((app) => {
      app.get("/", (_req, res) => {
        res.json({ status: "ok" });
      });
      app.post("/api/v1/mcp/execute", (_req, res) => {
        res.status(503).json({ detail: "not ready" });
      });
    });
    const io = new BufferedIo();
    const code = await runHealthCheck(
      ["--url", standIn.url, "--env-file", NO_ENV_FILE],
      io,
      { env: {} }
    );
    expect(code).toBe(1);
    expect(io.stdout).toContain("状态码: 503");
    expect(io.stdout).toContain("[警告] 非成功状态码: 503");
  });

  it("treats a failing docs probe as degraded, not down", async () => {
    standIn = await healthyServer();
    const io = new BufferedIo();
    const code = await runHealthCheck(
      ["--url", standIn.url, "--env-file", NO_ENV_FILE, "--docs"],
      io,
      { env: {} }
    );
    expect(code).toBe(0);
    expect(io.stdout).toContain("文档页面测试: 失败");
    expect(io.stdout[io.stdout.length - 1]).toBe(
      "[√] 关键测试通过! 非关键测试失败: 文档页面测试"
    );
  });

  it("follows the task in polling mode", async () => {
    standIn = await startStandIn((app) => {
      app.get("/", (_req, res) => {
        res.json({ status: "ok" });
      });
      app.post("/api/v1/mcp/execute", (_req, res) => {
        res.json({ task_id: "t-9" });
      });
      app.get("/api/v1/tasks/:id", (req, res) => {
        res.json({ task_id: req.params.id, status: "completed", result: "done" });
      });
    });
    const io = new BufferedIo();
    const code = await runHealthCheck(
      ["--url", standIn.url, "--env-file", NO_ENV_FILE, "--polling"],
      io,
      { env: {}, sleep: noSleep }
    );
    expect(code).toBe(0);
    expect(io.stdout).toContain("任务 t-9: completed (轮询 1 次)");
    expect(standIn.requests[1].body).toEqual({ INPUT: "Hello!", polling: true });
  });

  it("prints a JSON report with --json", async () => {
    standIn = await healthyServer();
    const io = new BufferedIo();
    await runHealthCheck(
      ["--url", `${standIn.url}/`, "--env-file", NO_ENV_FILE, "--json"],
      io,
      { env: {} }
    );
    const report: unknown = JSON.parse(io.stdout.join("\n"));
    expect(report).toMatchObject({
      status: "ok",
      target: standIn.url,
      checks: [
        { name: "root", ok: true, critical: true },
        { name: "execute", ok: true, critical: true },
      ],
    });
  });

  it("waits for a slow execute answer; --timeout bounds only the connect", async () => {
    standIn = await startStandIn((app) => {
      app.get("/", (_req, res) => {
        res.json({ status: "ok" });
      });
      app.post("/api/v1/mcp/execute", (_req, res) => {
        const timer = setTimeout(() => res.json({ output: "slow agent" }), 1500);
        res.on("close", () => clearTimeout(timer));
      });
    });
    const io = new BufferedIo();
    const code = await runHealthCheck(
      ["--url", standIn.url, "--env-file", NO_ENV_FILE, "--timeout", "1"],
      io,
      { env: {} }
    );
    expect(code).toBe(0);
    expect(io.stdout).toContain("API功能测试: 通过");
  });

  it("gives the same verdict when run twice against an unchanged server", async () => {
    standIn = await healthyServer();
    const summaryOf = (io: BufferedIo) => io.stdout.slice(-5);

    const first = new BufferedIo();
    const second = new BufferedIo();
    const args = ["--url", standIn.url, "--env-file", NO_ENV_FILE];
    expect(await runHealthCheck(args, first, { env: {}, now: FIXED_NOW })).toBe(0);
    expect(await runHealthCheck(args, second, { env: {}, now: FIXED_NOW })).toBe(0);
    expect(summaryOf(first)).toEqual([
      "健康检查汇总:",
      "基础连接测试: 通过",
      "API功能测试: 通过",
      "",
      "[√] 所有测试通过! 服务器状态正常",
    ]);
    expect(summaryOf(second)).toEqual(summaryOf(first));

    const down = await closedPortUrl();
    const third = new BufferedIo();
    const fourth = new BufferedIo();
    const downArgs = ["--url", down, "--env-file", NO_ENV_FILE];
    expect(await runHealthCheck(downArgs, third, { env: {} })).toBe(1);
    expect(await runHealthCheck(downArgs, fourth, { env: {} })).toBe(1);
    expect(summaryOf(third)).toEqual([
      "健康检查汇总:",
      "基础连接测试: 失败",
      "API功能测试: 失败",
      "",
      "[!] 健康检查未通过! 请检查服务器状态",
    ]);
    expect(summaryOf(fourth)).toEqual(summaryOf(third));
  });

  it("reports a bad LOG_LEVEL as a configuration error with exit code 2", async () => {
    const io = new BufferedIo();
    try {
      await runCli(
        (_args, cliIo) =>
          runHealthCheck(["--env-file", NO_ENV_FILE], cliIo, { env: { LOG_LEVEL: "loud" } }),
        io
      );
      expect(process.exitCode).toBe(2);
      expect(io.stderr).toEqual([
        '❌ Invalid configuration: LOG_LEVEL: Invalid LOG_LEVEL: "loud"',
      ]);
    } finally {
      process.exitCode = undefined;
    }
  });

  it("rejects unknown flags", async () => {
    await expect(runHealthCheck(["--bogus"], new BufferedIo(), { env: {} })).rejects.toThrow(
      "Unknown flag(s): --bogus"
    );
  });
});
