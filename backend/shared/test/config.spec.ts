// backend/shared/test/config.spec.ts
import { describe, it, expect } from "vitest";
import { loadOpsConfig, normalizeBaseUrl } from "../src/config";
import { ConfigError } from "../src/errors";

describe("loadOpsConfig", () => {
  it("applies defaults on an empty environment", () => {
    const cfg = loadOpsConfig({});
    expect(cfg.serverUrl).toBe("http://127.0.0.1:8443");
    expect(cfg.serverCommand).toBe(
      "uv run uvicorn src.app.main:app --host 0.0.0.0 --port 8443"
    );
    expect(cfg.healthTimeoutMs).toBe(60_000);
    expect(cfg.healthInput).toBe("Hello!");
    expect(cfg.taskPoll).toEqual({
      initialMs: 3000,
      maxMs: 30_000,
      factor: 1.5,
      deadlineMs: 300_000,
    });
    expect(cfg.preloadTimeoutMs).toBe(30_000);
    expect(cfg.mirrors).toEqual({
      uvIndexUrl: "https://pypi.tuna.tsinghua.edu.cn/simple",
      npmRegistry: "https://registry.npmmirror.com/",
    });
    expect(cfg.mcpCatalogPath).toBe("config/mcp-servers.json");
    expect(cfg.envFile).toBe(".env");
    expect(cfg.envTemplateFile).toBe(".env.example");
    expect(cfg.serverWaitTimeoutMs).toBe(120_000);
    expect(cfg.logLevel).toBeUndefined();
  });

  it("validates LOG_LEVEL, accepting the model server's names", () => {
    expect(loadOpsConfig({ LOG_LEVEL: "WARNING" }).logLevel).toBe("warn");
    expect(loadOpsConfig({ LOG_LEVEL: " " }).logLevel).toBeUndefined();

    let err: unknown;
    try {
      loadOpsConfig({ LOG_LEVEL: "loud" });
    } catch (e) {
      err = e;
    }
    expect(err).toBeInstanceOf(ConfigError);
    if (!(err instanceof ConfigError)) return;
    expect(err.issues).toEqual(['LOG_LEVEL: Invalid LOG_LEVEL: "loud"']);
    expect(err.exitCode).toBe(2);
  });

  it("derives the server URL from SERVER_PORT and treats blanks as unset", () => {
    const cfg = loadOpsConfig({ SERVER_PORT: "9001", SERVER_URL: "  ", HEALTH_TIMEOUT_SEC: "" });
    expect(cfg.serverUrl).toBe("http://127.0.0.1:9001");
    expect(cfg.healthTimeoutMs).toBe(60_000);
  });

  it("prefers SERVER_URL and strips trailing slashes", () => {
    const cfg = loadOpsConfig({ SERVER_URL: "http://models.internal:8443//" });
    expect(cfg.serverUrl).toBe("http://models.internal:8443");
  });

  it("reports every invalid key at once", () => {
    let err: unknown;
    try {
      loadOpsConfig({ SERVER_PORT: "70000", HEALTH_TIMEOUT_SEC: "-1", SERVER_URL: "not a url" });
    } catch (e) {
      err = e;
    }
    expect(err).toBeInstanceOf(ConfigError);
    if (!(err instanceof ConfigError)) return;
    expect(err.issues).toHaveLength(3);
    expect(err.issues.map((i) => i.split(":")[0]).sort()).toEqual([
      "HEALTH_TIMEOUT_SEC",
      "SERVER_PORT",
      "SERVER_URL",
    ]);
    expect(err.exitCode).toBe(2);
  });

  it("normalizeBaseUrl trims whitespace and trailing slashes", () => {
    expect(normalizeBaseUrl(" http://h:1/ ")).toBe("http://h:1");
    expect(normalizeBaseUrl("http://h:1/api/")).toBe("http://h:1/api");
  });
});
