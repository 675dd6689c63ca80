import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { ProxmoxApiError } from "../errors.js";
import { bytesToHuman, formatTimestamp } from "../proxmox/normalize.js";
import { describeTask, listStorageContent, nodePath, volumePath } from "../proxmox/resources.js";
import { collectVolumes, emptyMessage, toVolumeRow, type VolumeFilter, type VolumeRow } from "./content.js";
import type { ToolContext } from "./context.js";
import { formatStyleSchema, formatted, text, toolError } from "./response.js";

export async function listBackups(ctx: ToolContext, filter: VolumeFilter): Promise<VolumeRow[]> {
  const rows = await collectVolumes(ctx, "backup", filter);
  // Newest first
  return rows.sort((a, b) => (b.ctime ?? 0) - (a.ctime ?? 0));
}

export function renderBackups(rows: readonly VolumeRow[], filter: VolumeFilter): string {
  if (rows.length === 0) return emptyMessage("backups", filter);

  const lines = ["💾 Available Backups", ""];
  for (const backup of rows) {
    lines.push(`  💾 VM/CT ${backup.vmid ?? "?"} - ${formatTimestamp(backup.ctime)}`);
    lines.push(`     Size: ${bytesToHuman(backup.size ?? 0)}`);
    lines.push(`     Format: ${backup.format ?? ""}`);
    lines.push(`     Storage: ${backup.storage} @ ${backup.node}`);
    lines.push(`     Volume ID: ${backup.volid}`);
    if (backup.notes) lines.push(`     Notes: ${backup.notes}`);
    if (backup.protected) lines.push("     🔒 Protected");
    lines.push("");
  }
  lines.push("Use the Volume ID with restore_backup to restore.");
  return lines.join("\n");
}

/** Container archives carry "vzdump-lxc" in the file name or live under a ct/ directory. */
export function isContainerArchive(archive: string): boolean {
  const lower = archive.toLowerCase();
  return lower.includes("vzdump-lxc") || lower.includes("/ct/");
}

export function registerBackupTools(server: McpServer, ctx: ToolContext): void {
  // List backups
  server.registerTool(
    "list_backups",
    {
      description: "List vzdump backups across the cluster, newest first",
      inputSchema: {
        node: z.string().optional().describe("Filter by node (optional)"),
        storage: z.string().optional().describe("Filter by storage pool (optional)"),
        vmid: z.number().int().optional().describe("Filter by VM or container ID (optional)"),
        format_style: formatStyleSchema,
      },
    },
    async ({ node, storage, vmid, format_style }) => {
      const filter: VolumeFilter = { node, storage, vmid };
      try {
        const rows = await listBackups(ctx, filter);
        return formatted(format_style, rows, () => renderBackups(rows, filter));
      } catch (error) {
        return toolError("Failed to list backups", error, format_style, ctx.logger);
      }
    }
  );

  // Create backup
  server.registerTool(
    "create_backup",
    {
      description: "Start a vzdump backup of a VM or container",
      inputSchema: {
        node: z.string().describe("Node where the guest runs"),
        vmid: z.number().int().describe("VM or container ID to back up"),
        storage: z.string().describe("Target backup storage"),
        compress: z.enum(["0", "gzip", "lzo", "zstd"]).default("zstd").describe("Compression"),
        mode: z.enum(["snapshot", "suspend", "stop"]).default("snapshot").describe("Backup mode"),
        notes: z.string().optional().describe("Notes template stored with the backup"),
      },
    },
    async ({ node, vmid, storage, compress, mode, notes }) => {
      try {
        const result = await ctx.api.request("post", `${nodePath(node)}/vzdump`, {
          vmid,
          storage,
          compress,
          mode,
          "notes-template": notes,
        });

        const lines = [
          "💾 Backup Started",
          "",
          `  • VM/CT ID: ${vmid}`,
          `  • Node: ${node}`,
          `  • Storage: ${storage}`,
          `  • Compression: ${compress}`,
          `  • Mode: ${mode}`,
        ];
        if (notes) lines.push(`  • Notes: ${notes}`);
        lines.push(
          "",
          `Task ID: ${describeTask(result) ?? "n/a"}`,
          "",
          "The backup is running in the background.",
          "Use list_backups to verify when complete."
        );
        return text(lines.join("\n"));
      } catch (error) {
        return toolError(`Failed to create backup for ${vmid}`, error, "pretty", ctx.logger);
      }
    }
  );

  // Restore backup
  server.registerTool(
    "restore_backup",
    {
      description: "Restore a VM or container from a backup archive into a new guest ID",
      inputSchema: {
        node: z.string().describe("Target node for the restore"),
        archive: z.string().describe("Backup volume ID (from list_backups)"),
        vmid: z.number().int().min(100).describe("ID for the restored guest"),
        storage: z.string().optional().describe("Target storage for disks (optional)"),
        unique: z.boolean().default(true).describe("Generate unique MAC addresses"),
      },
    },
    async ({ node, archive, vmid, storage, unique }) => {
      const container = isContainerArchive(archive);
      const kind = container ? "Container" : "VM";
      try {
        const common = { vmid, storage, unique: unique ? 1 : undefined };
        const result = container
          ? await ctx.api.request("post", `${nodePath(node)}/lxc`, { ...common, ostemplate: archive, restore: 1 })
          : await ctx.api.request("post", `${nodePath(node)}/qemu`, { ...common, archive });

        const lines = [
          `♻️ ${kind} Restore Started`,
          "",
          `  • New ID: ${vmid}`,
          `  • From: ${archive}`,
          `  • Target Node: ${node}`,
        ];
        if (storage) lines.push(`  • Target Storage: ${storage}`);
        lines.push(
          `  • Unique MACs: ${unique ? "Yes" : "No"}`,
          "",
          `Task ID: ${describeTask(result) ?? "n/a"}`,
          "",
          "The restore is running in the background.",
          `The ${kind.toLowerCase()} will be available once the task completes.`
        );
        return text(lines.join("\n"));
      } catch (error) {
        return toolError(`Failed to restore backup to ${vmid}`, error, "pretty", ctx.logger);
      }
    }
  );

  // Delete backup
  server.registerTool(
    "delete_backup",
    {
      description: "Delete a backup archive. Protected backups are refused",
      inputSchema: {
        node: z.string().describe("Node name"),
        storage: z.string().describe("Storage pool holding the backup"),
        volid: z.string().describe("Backup volume ID to delete"),
      },
    },
    async ({ node, storage, volid }) => {
      try {
        const items = await listStorageContent(ctx.api, node, storage, { content: "backup" });
        const backup = items.map((item) => toVolumeRow(node, storage, item)).find((row) => row?.volid === volid);
        if (backup?.protected) {
          throw new ProxmoxApiError(`Backup '${volid}' is protected and cannot be deleted. Remove protection first.`);
        }

        const result = await ctx.api.request("delete", volumePath(node, storage, volid));
        const lines = ["🗑️ Backup Deleted", "", `  • Volume: ${volid}`, `  • Storage: ${storage}`, `  • Node: ${node}`];
        const task = describeTask(result);
        if (task) lines.push("", `Task ID: ${task}`);
        return text(lines.join("\n"));
      } catch (error) {
        return toolError(`Failed to delete backup '${volid}'`, error, "pretty", ctx.logger);
      }
    }
  );
}
