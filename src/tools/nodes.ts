import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import {
  bytesToHuman,
  formatUptime,
  isRecord,
  readNumber,
  readString,
  unwrapDict,
  unwrapRecords,
  type JsonMap,
} from "../proxmox/normalize.js";
import { nodePath } from "../proxmox/resources.js";
import type { ToolContext } from "./context.js";
import { formatStyleSchema, formatted, toolError } from "./response.js";

function percent(used: number | null, total: number | null): string {
  if (!used || !total) return "";
  return ` (${((used / total) * 100).toFixed(1)}%)`;
}

export function renderNodes(nodes: readonly JsonMap[]): string {
  const lines = ["🖥️ Proxmox Nodes", ""];
  for (const node of nodes) {
    const mem = readNumber(node, "mem");
    const maxmem = readNumber(node, "maxmem");
    lines.push(`🖥️ ${readString(node, "node") ?? "?"}`);
    lines.push(`  • Status: ${(readString(node, "status") ?? "unknown").toUpperCase()}`);
    lines.push(`  • Uptime: ${formatUptime(readNumber(node, "uptime"))}`);
    lines.push(`  • CPU: ${((readNumber(node, "cpu") ?? 0) * 100).toFixed(1)}% of ${readNumber(node, "maxcpu") ?? "?"} cores`);
    lines.push(`  • Memory: ${bytesToHuman(mem ?? 0)} / ${bytesToHuman(maxmem ?? 0)}${percent(mem, maxmem)}`);
    lines.push("");
  }
  if (nodes.length === 0) lines.push("No nodes found");
  return lines.join("\n").trimEnd();
}

function section(status: JsonMap, key: string): JsonMap {
  const value = status[key];
  return isRecord(value) ? value : {};
}

export function renderNodeStatus(node: string, status: JsonMap): string {
  const cpuinfo = section(status, "cpuinfo");
  const memory = section(status, "memory");
  const rootfs = section(status, "rootfs");
  const loadavg = Array.isArray(status.loadavg) ? status.loadavg.map(String).join(", ") : "N/A";
  const memUsed = readNumber(memory, "used");
  const memTotal = readNumber(memory, "total");
  const diskUsed = readNumber(rootfs, "used");
  const diskTotal = readNumber(rootfs, "total");

  return [
    `🖥️ Node ${node}`,
    "",
    `  • Version: ${readString(status, "pveversion") ?? "unknown"}`,
    `  • Kernel: ${readString(status, "kversion") ?? "unknown"}`,
    `  • Uptime: ${formatUptime(readNumber(status, "uptime"))}`,
    `  • CPU: ${((readNumber(status, "cpu") ?? 0) * 100).toFixed(1)}% (${readNumber(cpuinfo, "cpus") ?? "?"} cores, ${readString(cpuinfo, "model") ?? "unknown model"})`,
    `  • Load: ${loadavg}`,
    `  • Memory: ${bytesToHuman(memUsed ?? 0)} / ${bytesToHuman(memTotal ?? 0)}${percent(memUsed, memTotal)}`,
    `  • Root FS: ${bytesToHuman(diskUsed ?? 0)} / ${bytesToHuman(diskTotal ?? 0)}${percent(diskUsed, diskTotal)}`,
  ].join("\n");
}

export function registerNodeTools(server: McpServer, ctx: ToolContext): void {
  // List nodes
  server.registerTool(
    "get_nodes",
    {
      description: "List all nodes in the Proxmox cluster with their status and resource usage",
      inputSchema: {
        format_style: formatStyleSchema,
      },
    },
    async ({ format_style }) => {
      try {
        const nodes = unwrapRecords(await ctx.api.request("get", "/nodes"));
        return formatted(format_style, nodes, () => renderNodes(nodes));
      } catch (error) {
        return toolError("Failed to list nodes", error, format_style, ctx.logger);
      }
    }
  );

  // Get node status
  server.registerTool(
    "get_node_status",
    {
      description: "Get detailed status of one Proxmox node (CPU, memory, root filesystem, versions)",
      inputSchema: {
        node: z.string().describe("Node name (e.g. 'pve1')"),
        format_style: formatStyleSchema,
      },
    },
    async ({ node, format_style }) => {
      try {
        const status = unwrapDict(await ctx.api.request("get", `${nodePath(node)}/status`));
        return formatted(format_style, status, () => renderNodeStatus(node, status));
      } catch (error) {
        return toolError(`Failed to get status of node ${node}`, error, format_style, ctx.logger);
      }
    }
  );
}
