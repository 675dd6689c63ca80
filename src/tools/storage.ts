import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { errorMessage } from "../errors.js";
import { bytesToHuman, readFlag, readNumber, readString, type JsonMap } from "../proxmox/normalize.js";
import { listNodeNames, listNodeStorages } from "../proxmox/resources.js";
import { mapLimit } from "../util/concurrency.js";
import type { ToolContext } from "./context.js";
import { formatStyleSchema, formatted, toolError } from "./response.js";

export interface StorageRow {
  node: string;
  storage: string;
  type: string | null;
  content: string | null;
  active: boolean;
  shared: boolean;
  total: number | null;
  used: number | null;
  avail: number | null;
}

function toStorageRow(node: string, storage: JsonMap): StorageRow | null {
  const name = readString(storage, "storage");
  if (!name) return null;
  return {
    node,
    storage: name,
    type: readString(storage, "type"),
    content: readString(storage, "content"),
    active: readFlag(storage, "active"),
    shared: readFlag(storage, "shared"),
    total: readNumber(storage, "total"),
    used: readNumber(storage, "used"),
    avail: readNumber(storage, "avail"),
  };
}

export async function listStorage(ctx: ToolContext, node: string | undefined): Promise<StorageRow[]> {
  const collect = async (name: string): Promise<StorageRow[]> => {
    const rows: StorageRow[] = [];
    for (const storage of await listNodeStorages(ctx.api, name)) {
      const row = toStorageRow(name, storage);
      if (row) rows.push(row);
    }
    return rows;
  };

  if (node) return collect(node);

  const nodes = await listNodeNames(ctx.api);
  const perNode = await mapLimit(nodes, ctx.limits.maxConcurrency, async (name) => {
    try {
      return await collect(name);
    } catch (error) {
      ctx.logger.warn({ node: name, err: errorMessage(error) }, "skipping node while listing storage");
      return [];
    }
  });
  return perNode.flat();
}

export function renderStorage(rows: readonly StorageRow[]): string {
  const lines = ["💾 Storage Pools", ""];
  for (const row of rows) {
    const pct = row.used && row.total ? ` (${((row.used / row.total) * 100).toFixed(1)}%)` : "";
    lines.push(`💾 ${row.storage} @ ${row.node}`);
    lines.push(`  • Type: ${row.type ?? "unknown"}${row.shared ? " (shared)" : ""}`);
    lines.push(`  • Status: ${row.active ? "ACTIVE" : "INACTIVE"}`);
    lines.push(`  • Content: ${row.content ?? "-"}`);
    lines.push(`  • Usage: ${bytesToHuman(row.used ?? 0)} / ${bytesToHuman(row.total ?? 0)}${pct}`);
    lines.push(`  • Available: ${bytesToHuman(row.avail ?? 0)}`);
    lines.push("");
  }
  if (rows.length === 0) lines.push("No storage found");
  return lines.join("\n").trimEnd();
}

export function registerStorageTools(server: McpServer, ctx: ToolContext): void {
  // Get storage status
  server.registerTool(
    "get_storage",
    {
      description: "List storage pools with type, content types and usage, across the cluster or on one node",
      inputSchema: {
        node: z.string().optional().describe("Node name (optional, defaults to all nodes)"),
        format_style: formatStyleSchema,
      },
    },
    async ({ node, format_style }) => {
      try {
        const rows = await listStorage(ctx, node);
        return formatted(format_style, rows, () => renderStorage(rows));
      } catch (error) {
        return toolError("Failed to list storage", error, format_style, ctx.logger);
      }
    }
  );
}
