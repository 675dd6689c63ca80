import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { readFlag, readNumber, readString, unwrapRecords, type JsonMap } from "../proxmox/normalize.js";
import type { ToolContext } from "./context.js";
import { formatStyleSchema, formatted, toolError } from "./response.js";

export function renderClusterStatus(entries: readonly JsonMap[]): string {
  const cluster = entries.find((e) => readString(e, "type") === "cluster");
  const nodes = entries.filter((e) => readString(e, "type") === "node");

  const lines = ["⚙️ Proxmox Cluster", ""];
  if (cluster) {
    lines.push(`  • Name: ${readString(cluster, "name") ?? "unknown"}`);
    lines.push(`  • Quorum: ${readFlag(cluster, "quorate") ? "OK" : "NO QUORUM"}`);
    lines.push(`  • Nodes: ${readNumber(cluster, "nodes") ?? nodes.length}`);
  } else {
    lines.push("  • Name: standalone node (no cluster configured)");
  }
  lines.push("");

  for (const node of nodes) {
    const state = readFlag(node, "online") ? "ONLINE" : "OFFLINE";
    const ip = readString(node, "ip");
    lines.push(`🖥️ ${readString(node, "name") ?? "?"} - ${state}${ip ? ` (${ip})` : ""}`);
  }
  return lines.join("\n").trimEnd();
}

export function registerClusterTools(server: McpServer, ctx: ToolContext): void {
  // Get cluster status
  server.registerTool(
    "get_cluster_status",
    {
      description: "Get Proxmox cluster status: name, quorum and member nodes",
      inputSchema: {
        format_style: formatStyleSchema,
      },
    },
    async ({ format_style }) => {
      try {
        const entries = unwrapRecords(await ctx.api.request("get", "/cluster/status"));
        return formatted(format_style, entries, () => renderClusterStatus(entries));
      } catch (error) {
        return toolError("Failed to get cluster status", error, format_style, ctx.logger);
      }
    }
  );
}
