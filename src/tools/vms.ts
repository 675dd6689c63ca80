import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { setTimeout as sleep } from "node:timers/promises";
import { z } from "zod";
import { ProxmoxApiError, errorMessage } from "../errors.js";
import type { ProxmoxApi } from "../proxmox/client.js";
import {
  bytesToHuman,
  readFlag,
  readNumber,
  readString,
  unwrapDict,
  type JsonMap,
} from "../proxmox/normalize.js";
import {
  describeTask,
  getGuestStatus,
  listGuests,
  listNodeNames,
  listNodeStorages,
  nodePath,
  waitForTask,
  type PollOptions,
} from "../proxmox/resources.js";
import { mapLimit } from "../util/concurrency.js";
import type { ToolContext } from "./context.js";
import { formatStyleSchema, formatted, text, toolError } from "./response.js";

export interface VmRow {
  vmid: number;
  name: string;
  node: string;
  status: string | null;
  cpus: number | null;
  mem: number | null;
  maxmem: number | null;
  uptime: number | null;
}

function toVmRow(node: string, vmid: number, fields: JsonMap): VmRow {
  return {
    vmid,
    name: readString(fields, "name") ?? `vm-${vmid}`,
    node,
    status: readString(fields, "status"),
    cpus: readNumber(fields, "cpus"),
    mem: readNumber(fields, "mem"),
    maxmem: readNumber(fields, "maxmem"),
    uptime: readNumber(fields, "uptime"),
  };
}

export async function listVms(ctx: ToolContext, node: string | undefined): Promise<VmRow[]> {
  if (node) {
    const entries = await listGuests(ctx.api, node, "qemu");
    return entries.map((entry) => toVmRow(node, entry.vmid, entry.fields));
  }
  const nodes = await listNodeNames(ctx.api);
  const perNode = await mapLimit(nodes, ctx.limits.maxConcurrency, async (name) => {
    try {
      const entries = await listGuests(ctx.api, name, "qemu");
      return entries.map((entry) => toVmRow(name, entry.vmid, entry.fields));
    } catch (error) {
      ctx.logger.warn({ node: name, err: errorMessage(error) }, "skipping node while listing VMs");
      return [];
    }
  });
  return perNode.flat();
}

export function renderVms(rows: readonly VmRow[]): string {
  const lines = ["🗃️ Virtual Machines", ""];
  for (const vm of rows) {
    lines.push(`🗃️ ${vm.name} (ID: ${vm.vmid})`);
    lines.push(`  • Status: ${(vm.status ?? "").toUpperCase()}`);
    lines.push(`  • Node: ${vm.node}`);
    lines.push(`  • CPU Cores: ${vm.cpus ?? "N/A"}`);
    lines.push(`  • Memory: ${bytesToHuman(vm.mem ?? 0)} / ${bytesToHuman(vm.maxmem ?? 0)}`);
    lines.push("");
  }
  if (rows.length === 0) lines.push("No virtual machines found");
  return lines.join("\n").trimEnd();
}

async function pickDiskStorage(api: ProxmoxApi, node: string): Promise<string> {
  const storages = await listNodeStorages(api, node, "images");
  const usable = storages.find((s) => s.active === undefined || readFlag(s, "active"));
  const name = usable ? readString(usable, "storage") : null;
  if (!name) {
    throw new ProxmoxApiError(`No storage accepting VM disk images found on node ${node}`);
  }
  return name;
}

export interface CommandOutput {
  exitcode: number | null;
  stdout: string;
  stderr: string;
}

/** Run a command through the QEMU guest agent and wait for it to exit. */
export async function executeGuestCommand(
  api: ProxmoxApi,
  node: string,
  vmid: number,
  command: string,
  poll: PollOptions
): Promise<CommandOutput> {
  const started = unwrapDict(
    await api.request("post", `${nodePath(node)}/qemu/${vmid}/agent/exec`, { command: ["/bin/sh", "-c", command] })
  );
  const pid = readNumber(started, "pid");
  if (pid === null) {
    throw new ProxmoxApiError("Guest agent did not return a process id");
  }

  for (let attempt = 0; attempt < poll.attempts; attempt++) {
    const status = unwrapDict(await api.request("get", `${nodePath(node)}/qemu/${vmid}/agent/exec-status`, { pid }));
    if (readFlag(status, "exited")) {
      return {
        exitcode: readNumber(status, "exitcode"),
        stdout: readString(status, "out-data") ?? "",
        stderr: readString(status, "err-data") ?? "",
      };
    }
    await sleep(poll.intervalMs);
  }
  throw new ProxmoxApiError(`Command did not finish after ${poll.attempts} checks (pid ${pid})`);
}

function pollOptions(ctx: ToolContext): PollOptions {
  return { intervalMs: ctx.limits.taskPollIntervalMs, attempts: ctx.limits.taskPollAttempts };
}

const POWER_ACTIONS = {
  start_vm: { command: "start", verb: "Start", description: "Start a VM" },
  stop_vm: { command: "stop", verb: "Stop", description: "Stop a VM immediately (like pulling the power plug)" },
  shutdown_vm: { command: "shutdown", verb: "Shutdown", description: "Shut a VM down gracefully through ACPI" },
  reset_vm: { command: "reset", verb: "Reset", description: "Hard-reset a VM" },
} as const;

export function registerVmTools(server: McpServer, ctx: ToolContext): void {
  // List VMs
  server.registerTool(
    "get_vms",
    {
      description: "List QEMU virtual machines across the cluster or on one node",
      inputSchema: {
        node: z.string().optional().describe("Node name (optional, defaults to all nodes)"),
        format_style: formatStyleSchema,
      },
    },
    async ({ node, format_style }) => {
      try {
        const rows = await listVms(ctx, node);
        return formatted(format_style, rows, () => renderVms(rows));
      } catch (error) {
        return toolError("Failed to list VMs", error, format_style, ctx.logger);
      }
    }
  );

  // Create VM
  server.registerTool(
    "create_vm",
    {
      description: "Create a new QEMU VM with one SCSI disk and a virtio NIC on vmbr0",
      inputSchema: {
        node: z.string().describe("Node to create the VM on"),
        vmid: z.number().int().min(100).describe("New VM ID (e.g. 200)"),
        name: z.string().describe("VM name (e.g. 'web-server')"),
        cpus: z.number().int().min(1).max(32).describe("Number of CPU cores"),
        memory: z.number().int().min(512).max(131072).describe("Memory in MiB (e.g. 2048)"),
        disk_size: z.number().int().min(5).max(1000).describe("Disk size in GiB"),
        storage: z.string().optional().describe("Storage for the disk (optional, auto-detected)"),
        ostype: z.string().optional().describe("OS type (optional, default 'l26' for Linux)"),
      },
    },
    async ({ node, vmid, name, cpus, memory, disk_size, storage, ostype }) => {
      try {
        const diskStorage = storage ?? (await pickDiskStorage(ctx.api, node));
        const result = await ctx.api.request("post", `${nodePath(node)}/qemu`, {
          vmid,
          name,
          cores: cpus,
          memory,
          ostype: ostype ?? "l26",
          scsihw: "virtio-scsi-pci",
          scsi0: `${diskStorage}:${disk_size}`,
          net0: "virtio,bridge=vmbr0",
          boot: "order=scsi0",
          agent: "enabled=1",
        });

        return text(
          [
            "🎉 VM Creation Started",
            "",
            `  • ID: ${vmid}`,
            `  • Name: ${name}`,
            `  • Node: ${node}`,
            `  • CPU Cores: ${cpus}`,
            `  • Memory: ${memory} MiB`,
            `  • Disk: ${disk_size} GiB on ${diskStorage}`,
            "",
            `Task ID: ${describeTask(result) ?? "n/a"}`,
            "",
            "The VM is created in the stopped state; use start_vm to boot it.",
          ].join("\n")
        );
      } catch (error) {
        return toolError(`Failed to create VM ${vmid}`, error, "pretty", ctx.logger);
      }
    }
  );

  // Run command in VM
  server.registerTool(
    "execute_vm_command",
    {
      description: "Run a shell command inside a VM through the QEMU guest agent and return its output",
      inputSchema: {
        node: z.string().describe("Node where the VM is located"),
        vmid: z.number().int().describe("VM ID"),
        command: z.string().min(1).describe("Shell command to run (e.g. 'uname -a')"),
      },
    },
    async ({ node, vmid, command }) => {
      try {
        const output = await executeGuestCommand(ctx.api, node, vmid, command, pollOptions(ctx));
        const lines = [`🔧 Command on VM ${vmid} (${node})`, "", `$ ${command}`, `Exit code: ${output.exitcode ?? "unknown"}`];
        if (output.stdout) lines.push("", "Output:", output.stdout.trimEnd());
        if (output.stderr) lines.push("", "Errors:", output.stderr.trimEnd());
        return text(lines.join("\n"));
      } catch (error) {
        return toolError(`Failed to execute command on VM ${vmid}`, error, "pretty", ctx.logger);
      }
    }
  );

  // Power management
  for (const [tool, { command, verb, description }] of Object.entries(POWER_ACTIONS)) {
    server.registerTool(
      tool,
      {
        description,
        inputSchema: {
          node: z.string().describe("Node where the VM is located"),
          vmid: z.number().int().describe("VM ID"),
        },
      },
      async ({ node, vmid }) => {
        try {
          const result = await ctx.api.request("post", `${nodePath(node)}/qemu/${vmid}/status/${command}`);
          return text(`✅ ${verb} requested for VM ${vmid} on ${node}\nTask ID: ${describeTask(result) ?? "n/a"}`);
        } catch (error) {
          return toolError(`Failed to ${verb.toLowerCase()} VM ${vmid}`, error, "pretty", ctx.logger);
        }
      }
    );
  }

  // Delete VM
  server.registerTool(
    "delete_vm",
    {
      description: "Delete a VM and its disks. A running VM is only deleted with force, after being stopped",
      inputSchema: {
        node: z.string().describe("Node where the VM is located"),
        vmid: z.number().int().describe("VM ID to delete"),
        force: z.boolean().default(false).describe("Stop the VM first if it is running"),
      },
    },
    async ({ node, vmid, force }) => {
      try {
        const status = await getGuestStatus(ctx.api, node, "qemu", vmid);
        const lines = ["🗑️ VM Deleted", "", `  • ID: ${vmid}`, `  • Node: ${node}`];

        if (readString(status, "status") === "running") {
          if (!force) {
            throw new ProxmoxApiError(`VM ${vmid} is running; stop it first or pass force=true`);
          }
          const stopTask = await ctx.api.request("post", `${nodePath(node)}/qemu/${vmid}/status/stop`);
          // Only a UPID string can be polled
          if (typeof stopTask === "string") await waitForTask(ctx.api, node, stopTask, pollOptions(ctx));
          lines.push("  • Stopped before deletion");
        }

        const result = await ctx.api.request("delete", `${nodePath(node)}/qemu/${vmid}`, {
          purge: 1,
          "destroy-unreferenced-disks": 1,
        });
        lines.push("", `Task ID: ${describeTask(result) ?? "n/a"}`);
        return text(lines.join("\n"));
      } catch (error) {
        return toolError(`Failed to delete VM ${vmid}`, error, "pretty", ctx.logger);
      }
    }
  );
}
