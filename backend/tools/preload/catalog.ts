// backend/tools/preload/catalog.ts
import fs from "node:fs";
import path from "node:path";
import {
  McpCatalogSchema,
  type McpCatalog,
} from "../../shared/src/contracts/mcpCatalog.contract";
import { ArgsError, ConfigError, errorMessage } from "../../shared/src/errors";

export interface PreloadTarget {
  name: string;
  command: string;
  /** already includes the trailing --help */
  args: string[];
}

/** Read + validate config/mcp-servers.json (path relative to cwd). */
export function loadMcpCatalog(filePath: string): McpCatalog {
  const resolved = path.resolve(process.cwd(), filePath);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, "utf8"));
  } catch (err) {
    throw new ConfigError([`MCP catalog ${resolved}: ${errorMessage(err)}`]);
  }
  const parsed = McpCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (i) => `MCP catalog ${i.path.join(".") || "(root)"}: ${i.message}`
      )
    );
  }
  return parsed.data;
}

/**
 * Warm-up commands: `<command> <preloadArgs ?? args> --help`, in catalog
 * order. `only` restricts to the named servers; unknown names are an error.
 */
export function preloadTargets(
  catalog: McpCatalog,
  only: readonly string[] = []
): PreloadTarget[] {
  const names = Object.keys(catalog.mcpServers);
  const unknown = only.filter((n) => !names.includes(n));
  if (unknown.length) {
    throw new ArgsError(
      `Unknown MCP server(s): ${unknown.join(", ")}. Known: ${names.join(", ")}`
    );
  }

  return Object.entries(catalog.mcpServers)
    .filter(([name]) => only.length === 0 || only.includes(name))
    .map(([name, entry]) => ({
      name,
      command: entry.command,
      args: [...(entry.preloadArgs ?? entry.args), "--help"],
    }));
}
