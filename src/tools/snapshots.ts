import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { errorMessage } from "../errors.js";
import type { ProxmoxApi } from "../proxmox/client.js";
import { formatTimestamp, readFlag, readNumber, readString, unwrapRecords, type JsonMap } from "../proxmox/normalize.js";
import { describeTask, nodePath, type GuestType } from "../proxmox/resources.js";
import type { ToolContext } from "./context.js";
import { formatStyleSchema, formatted, text, toolError } from "./response.js";

const guestTypeSchema = z.enum(["qemu", "lxc"]).default("qemu").describe("'qemu' for VMs, 'lxc' for containers");
const snapnameSchema = z
  .string()
  .regex(/^[A-Za-z][A-Za-z0-9_-]*$/, "Snapshot names start with a letter and contain only letters, digits, '-' and '_'")
  .describe("Snapshot name (e.g. 'before-upgrade')");

function snapshotBase(node: string, type: GuestType, vmid: number): string {
  return `${nodePath(node)}/${type}/${vmid}/snapshot`;
}

/** Snapshots of a guest, without the "current" pseudo-snapshot Proxmox always lists. */
export async function listSnapshots(api: ProxmoxApi, node: string, type: GuestType, vmid: number): Promise<JsonMap[]> {
  const snapshots = unwrapRecords(await api.request("get", snapshotBase(node, type, vmid)));
  return snapshots.filter((snap) => readString(snap, "name") !== "current");
}

export function renderSnapshots(node: string, type: GuestType, vmid: number, snapshots: readonly JsonMap[]): string {
  if (snapshots.length === 0) {
    return `No snapshots found for ${type.toUpperCase()} ${vmid} on node ${node}`;
  }
  const lines = [`📸 Snapshots for ${type.toUpperCase()} ${vmid} on ${node}`, ""];
  for (const snap of snapshots) {
    const description = readString(snap, "description");
    const snaptime = readNumber(snap, "snaptime");
    const parent = readString(snap, "parent");
    lines.push(`  📷 ${readString(snap, "name") ?? "unknown"}`);
    if (description) lines.push(`     Description: ${description.trim()}`);
    if (snaptime) lines.push(`     Created: ${formatTimestamp(snaptime)}`);
    if (parent) lines.push(`     Parent: ${parent}`);
    if (readFlag(snap, "vmstate")) lines.push("     RAM State: Included");
    lines.push("");
  }
  return lines.join("\n").trimEnd();
}

export function registerSnapshotTools(server: McpServer, ctx: ToolContext): void {
  const guestInput = {
    node: z.string().describe("Host node name (e.g. 'pve1')"),
    vmid: z.number().int().describe("VM or container ID"),
    vm_type: guestTypeSchema,
  };

  // List snapshots
  server.registerTool(
    "list_snapshots",
    {
      description: "List the snapshots of a VM or container",
      inputSchema: { ...guestInput, format_style: formatStyleSchema },
    },
    async ({ node, vmid, vm_type, format_style }) => {
      try {
        const snapshots = await listSnapshots(ctx.api, node, vm_type, vmid);
        return formatted(format_style, snapshots, () => renderSnapshots(node, vm_type, vmid, snapshots));
      } catch (error) {
        return toolError(`Failed to list snapshots for ${vm_type} ${vmid}`, error, format_style, ctx.logger);
      }
    }
  );

  // Create snapshot
  server.registerTool(
    "create_snapshot",
    {
      description: "Create a snapshot of a VM or container",
      inputSchema: {
        ...guestInput,
        snapname: snapnameSchema,
        description: z.string().optional().describe("Snapshot description"),
        vmstate: z.boolean().default(false).describe("Include RAM state (VMs only)"),
      },
    },
    async ({ node, vmid, vm_type, snapname, description, vmstate }) => {
      try {
        const includeRam = vmstate && vm_type === "qemu";
        const result = await ctx.api.request("post", snapshotBase(node, vm_type, vmid), {
          snapname,
          description,
          vmstate: includeRam ? 1 : undefined,
        });

        const lines = [
          "📸 Snapshot Created",
          "",
          `  • Name: ${snapname}`,
          `  • ${vm_type.toUpperCase()} ID: ${vmid}`,
          `  • Node: ${node}`,
        ];
        if (description) lines.push(`  • Description: ${description}`);
        if (includeRam) lines.push("  • RAM State: Included");
        lines.push("", `Task ID: ${describeTask(result) ?? "n/a"}`);
        return text(lines.join("\n"));
      } catch (error) {
        return toolError(`Failed to create snapshot '${snapname}' for ${vm_type} ${vmid}`, error, "pretty", ctx.logger);
      }
    }
  );

  // Delete snapshot
  server.registerTool(
    "delete_snapshot",
    {
      description: "Delete a snapshot of a VM or container",
      inputSchema: { ...guestInput, snapname: snapnameSchema },
    },
    async ({ node, vmid, vm_type, snapname }) => {
      try {
        const result = await ctx.api.request("delete", `${snapshotBase(node, vm_type, vmid)}/${encodeURIComponent(snapname)}`);
        return text(
          [
            "🗑️ Snapshot Deleted",
            "",
            `  • Name: ${snapname}`,
            `  • ${vm_type.toUpperCase()} ID: ${vmid}`,
            `  • Node: ${node}`,
            "",
            `Task ID: ${describeTask(result) ?? "n/a"}`,
          ].join("\n")
        );
      } catch (error) {
        return toolError(`Failed to delete snapshot '${snapname}' for ${vm_type} ${vmid}`, error, "pretty", ctx.logger);
      }
    }
  );

  // Rollback snapshot
  server.registerTool(
    "rollback_snapshot",
    {
      description:
        "Roll a VM or container back to a snapshot. The guest is stopped during rollback, and snapshots taken on top of the target are deleted first (required on ZFS)",
      inputSchema: { ...guestInput, snapname: snapnameSchema },
    },
    async ({ node, vmid, vm_type, snapname }) => {
      try {
        const base = snapshotBase(node, vm_type, vmid);
        const children = (await listSnapshots(ctx.api, node, vm_type, vmid)).filter(
          (snap) => readString(snap, "parent") === snapname
        );

        const deleted: string[] = [];
        const failed: string[] = [];
        for (const child of children) {
          const name = readString(child, "name");
          if (!name) continue;
          try {
            await ctx.api.request("delete", `${base}/${encodeURIComponent(name)}`);
            deleted.push(name);
          } catch (error) {
            ctx.logger.warn({ node, vmid, snapshot: name, err: errorMessage(error) }, "could not delete newer snapshot");
            failed.push(`${name} (${errorMessage(error)})`);
          }
        }

        const result = await ctx.api.request("post", `${base}/${encodeURIComponent(snapname)}/rollback`);

        const lines = [
          "⏪ Snapshot Rollback Started",
          "",
          `  • Restoring to: ${snapname}`,
          `  • ${vm_type.toUpperCase()} ID: ${vmid}`,
          `  • Node: ${node}`,
        ];
        if (deleted.length > 0) lines.push(`  • Deleted newer snapshots: ${deleted.join(", ")}`);
        if (failed.length > 0) lines.push(`  • Could not delete: ${failed.join(", ")}`);
        lines.push(
          "",
          "⚠️  The guest is stopped during rollback.",
          "",
          `Task ID: ${describeTask(result) ?? "n/a"}`
        );
        return text(lines.join("\n"));
      } catch (error) {
        return toolError(`Failed to roll back to snapshot '${snapname}' for ${vm_type} ${vmid}`, error, "pretty", ctx.logger);
      }
    }
  );
}
