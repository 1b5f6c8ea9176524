// backend/shared/src/logger.ts
import pino, {
  type LoggerOptions,
  type LevelWithSilent,
  stdTimeFunctions,
} from "pino";

/**
 * Shared Logger for the ops tools.
 *
 * Each CLI calls `initLogger(TOOL_NAME)` at startup so every line carries
 * `tool`. Logs go to stderr; stdout belongs to the operator-facing report.
 *
 * Usage:
 *   import { initLogger, logger } from "../../shared/src/logger";
 *   initLogger("health-check");
 */

const validLevels: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

// LOG_LEVEL is shared with the model server, which spells levels WARNING / CRITICAL.
const aliases: Record<string, LevelWithSilent> = {
  warning: "warn",
  critical: "fatal",
};

/** pino level for a LOG_LEVEL value, or undefined when it names none. */
export function resolveLogLevel(raw: string): LevelWithSilent | undefined {
  const folded = raw.trim().toLowerCase();
  const v = aliases[folded] ?? folded;
  return validLevels.find((l) => l === v);
}

// Import time and initLogger never throw on a bad LOG_LEVEL (runCli is not
// catching yet); loadOpsConfig reports it as a ConfigError.
function levelOrInfo(raw: string | undefined): LevelWithSilent {
  return resolveLogLevel(raw ?? "info") ?? "info";
}

let TOOL_NAME = "";

function buildOptions(level: LevelWithSilent): LoggerOptions {
  return {
    level,
    base: TOOL_NAME ? { tool: TOOL_NAME } : {},
    timestamp: stdTimeFunctions.isoTime,
  };
}

export let logger = pino(
  buildOptions(levelOrInfo(process.env.LOG_LEVEL)),
  pino.destination(2)
);

/** Re-create the logger for this tool. Call once at bootstrap. */
export function initLogger(toolName: string, level?: LevelWithSilent): void {
  TOOL_NAME = toolName.trim();
  if (!TOOL_NAME) throw new Error("initLogger requires toolName");
  logger = pino(
    buildOptions(level ?? levelOrInfo(process.env.LOG_LEVEL)),
    pino.destination(2)
  );
}

export function setLogLevel(level: LevelWithSilent): void {
  logger.level = level;
}
