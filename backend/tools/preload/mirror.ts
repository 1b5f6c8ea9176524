// backend/tools/preload/mirror.ts
/**
 * Package-registry mirrors for the preload children.
 *
 * - UV_INDEX_URL: process-scoped, handed to child processes only.
 * - npm registry: handed to children as npm_config_registry and, unless
 *   disabled, persisted with `npm config set registry <url>` (user config).
 */

import type { CommandOutcome, CommandRunner } from "../../shared/src/proc/CommandRunner";

export interface MirrorSettings {
  uvIndexUrl: string;
  npmRegistry: string;
  persistNpmRegistry: boolean;
}

export interface MirrorResult {
  env: Record<string, string>;
  /** outcome of `npm config set registry`, when persisted */
  persisted?: CommandOutcome;
}

export function mirrorEnv(settings: Pick<MirrorSettings, "uvIndexUrl" | "npmRegistry">): Record<string, string> {
  return {
    UV_INDEX_URL: settings.uvIndexUrl,
    npm_config_registry: settings.npmRegistry,
  };
}

export async function applyMirrors(
  settings: MirrorSettings,
  run: CommandRunner
): Promise<MirrorResult> {
  const env = mirrorEnv(settings);
  if (!settings.persistNpmRegistry) return { env };

  const persisted = await run({
    command: "npm",
    args: ["config", "set", "registry", settings.npmRegistry],
    stdio: "ignore",
  });
  return { env, persisted };
}
