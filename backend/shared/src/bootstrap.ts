// backend/shared/src/bootstrap.ts
/**
 * Common CLI bootstrap: load ENV_FILE (optional unless `required`), validate
 * the ops config (LOG_LEVEL included), then apply its log level.
 */

import { loadOpsConfig, type OpsConfig } from "./config";
import { loadEnvFile } from "./env";
import { logger, setLogLevel } from "./logger";

export function bootstrapTool(
  envFileFlag: string | undefined,
  env: Record<string, string | undefined> = process.env,
  opts: { required?: boolean } = {}
): OpsConfig {
  const envFile = envFileFlag ?? env.ENV_FILE ?? ".env";
  const loaded = loadEnvFile(envFile, { required: opts.required });
  const cfg = loadOpsConfig(env);
  if (cfg.logLevel) setLogLevel(cfg.logLevel);
  logger.debug({ envFile, loaded }, "env file");
  return cfg;
}
