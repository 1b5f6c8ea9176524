// backend/shared/src/env.ts
/**
 * dotenv loading (with ${VAR} expansion) and required-key checks.
 */

import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import dotenvExpand from "dotenv-expand";

type EnvSource = Record<string, string | undefined>;

/**
 * Load a dotenv file with ${VAR} expansion into process.env.
 * Variables already present in process.env win over the file.
 * Returns false when the file is absent and not required.
 */
export function loadEnvFile(
  envFilePath: string,
  opts: { required?: boolean; cwd?: string } = {}
): boolean {
  if (!envFilePath || envFilePath.trim() === "") {
    throw new Error("ENV_FILE path is empty.");
  }
  const resolved = path.resolve(opts.cwd ?? process.cwd(), envFilePath);
  if (!fs.existsSync(resolved)) {
    if (opts.required) throw new Error(`ENV_FILE not found at: ${resolved}`);
    return false;
  }

  const parsed = dotenv.config({ path: resolved });
  if (parsed.error) {
    throw new Error(
      `Failed to load ENV_FILE: ${resolved}: ${String(parsed.error)}`
    );
  }
  dotenvExpand.expand(parsed);
  return true;
}

/** Parse a dotenv file without touching process.env. */
export function readEnvFile(envFilePath: string): Record<string, string> {
  const resolved = path.resolve(process.cwd(), envFilePath);
  if (!fs.existsSync(resolved)) {
    throw new Error(`ENV_FILE not found at: ${resolved}`);
  }
  return dotenv.parse(fs.readFileSync(resolved));
}

/** Keys from `keys` that are missing or blank in `source`. */
export function missingKeys(source: EnvSource, keys: readonly string[]): string[] {
  return keys.filter((k) => {
    const v = source[k];
    return v == null || v.trim() === "";
  });
}
