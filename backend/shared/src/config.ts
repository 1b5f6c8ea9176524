// backend/shared/src/config.ts
/**
 * Purpose:
 * - Single typed view over the environment for every ops tool.
 * - Env is loaded (dotenv) by the CLI before this runs; here we only
 *   validate + default. Blank values count as unset.
 *
 * Keys shared with the model server: HOST_NAME, SERVER_PORT, LOG_LEVEL.
 */

import { z } from "zod";
import { ConfigError } from "./errors";
import { resolveLogLevel } from "./logger";
import type { LevelWithSilent } from "pino";

const blank = (v: unknown) =>
  typeof v === "string" && v.trim() === "" ? undefined : v;

const seconds = (def: number) =>
  z.preprocess(blank, z.coerce.number().positive().default(def));

const text = (def: string) => z.preprocess(blank, z.string().trim().default(def));

const RawEnvSchema = z.object({
  SERVER_URL: z.preprocess(blank, z.string().url().optional()),
  HOST_NAME: text("0.0.0.0"),
  SERVER_PORT: z.preprocess(
    blank,
    z.coerce.number().int().min(1).max(65535).default(8443)
  ),
  SERVER_COMMAND: z.preprocess(blank, z.string().trim().optional()),
  SERVER_WAIT_TIMEOUT_SEC: seconds(120),

  HEALTH_TIMEOUT_SEC: seconds(60),
  HEALTH_INPUT: text("Hello!"),

  TASK_POLL_INITIAL_SEC: seconds(3),
  TASK_POLL_MAX_SEC: seconds(30),
  TASK_POLL_FACTOR: z.preprocess(blank, z.coerce.number().min(1).default(1.5)),
  TASK_POLL_DEADLINE_SEC: seconds(300),

  PRELOAD_TIMEOUT_SEC: seconds(30),
  UV_INDEX_URL: z.preprocess(
    blank,
    z.string().url().default("https://pypi.tuna.tsinghua.edu.cn/simple")
  ),
  NPM_REGISTRY: z.preprocess(
    blank,
    z.string().url().default("https://registry.npmmirror.com/")
  ),
  MCP_CATALOG_FILE: text("config/mcp-servers.json"),

  LOG_LEVEL: z.preprocess(
    blank,
    z
      .string()
      .optional()
      .transform((v, ctx) => {
        if (v === undefined) return undefined;
        const level = resolveLogLevel(v);
        if (level === undefined) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Invalid LOG_LEVEL: "${v}"`,
          });
          return z.NEVER;
        }
        return level;
      })
  ),

  ENV_FILE: text(".env"),
  ENV_TEMPLATE_FILE: text(".env.example"),
});

export interface TaskPollSettings {
  initialMs: number;
  maxMs: number;
  factor: number;
  deadlineMs: number;
}

export interface OpsConfig {
  serverUrl: string;
  serverCommand: string;
  serverWaitTimeoutMs: number;
  healthTimeoutMs: number;
  healthInput: string;
  taskPoll: TaskPollSettings;
  preloadTimeoutMs: number;
  mirrors: { uvIndexUrl: string; npmRegistry: string };
  mcpCatalogPath: string;
  envFile: string;
  envTemplateFile: string;
  /** only when LOG_LEVEL is set */
  logLevel?: LevelWithSilent;
}

const ms = (sec: number) => Math.round(sec * 1000);

/** Strip trailing slashes so paths can be appended with a single "/". */
export function normalizeBaseUrl(url: string): string {
  return url.trim().replace(/\/+$/, "");
}

export function loadOpsConfig(
  env: Record<string, string | undefined> = process.env
): OpsConfig {
  const parsed = RawEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }
  const e = parsed.data;

  return {
    serverUrl: normalizeBaseUrl(
      e.SERVER_URL ?? `http://127.0.0.1:${e.SERVER_PORT}`
    ),
    serverCommand:
      e.SERVER_COMMAND ??
      `uv run uvicorn src.app.main:app --host ${e.HOST_NAME} --port ${e.SERVER_PORT}`,
    serverWaitTimeoutMs: ms(e.SERVER_WAIT_TIMEOUT_SEC),
    healthTimeoutMs: ms(e.HEALTH_TIMEOUT_SEC),
    healthInput: e.HEALTH_INPUT,
    taskPoll: {
      initialMs: ms(e.TASK_POLL_INITIAL_SEC),
      maxMs: ms(e.TASK_POLL_MAX_SEC),
      factor: e.TASK_POLL_FACTOR,
      deadlineMs: ms(e.TASK_POLL_DEADLINE_SEC),
    },
    preloadTimeoutMs: ms(e.PRELOAD_TIMEOUT_SEC),
    mirrors: { uvIndexUrl: e.UV_INDEX_URL, npmRegistry: e.NPM_REGISTRY },
    mcpCatalogPath: e.MCP_CATALOG_FILE,
    envFile: e.ENV_FILE,
    envTemplateFile: e.ENV_TEMPLATE_FILE,
    logLevel: e.LOG_LEVEL,
  };
}
