// backend/shared/src/contracts/mcpCatalog.contract.ts
/**
 * Purpose:
 * - Schema of config/mcp-servers.json: the MCP servers the model server
 *   launches, keyed by name (same shape as its "mcpServers" block).
 * - `preloadArgs` overrides `args` when warming the package caches, for
 *   servers whose runtime args (paths, "stdio") must not be passed then.
 */

import { z } from "zod";

export const McpServerEntrySchema = z.object({
  transport: z.string().min(1).optional(),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  preloadArgs: z.array(z.string()).optional(),
});
export type McpServerEntry = z.infer<typeof McpServerEntrySchema>;

export const McpCatalogSchema = z.object({
  mcpServers: z.record(z.string().min(1), McpServerEntrySchema),
});
export type McpCatalog = z.infer<typeof McpCatalogSchema>;
