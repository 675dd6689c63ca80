import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { ProxmoxApiError } from "../errors.js";
import type { ProxmoxApi } from "../proxmox/client.js";
import { bytesToHuman, readString } from "../proxmox/normalize.js";
import { describeTask, listStorageContent, storagePath, volumePath } from "../proxmox/resources.js";
import { collectVolumes, emptyMessage, volumeFileName, type VolumeFilter, type VolumeRow } from "./content.js";
import type { ToolContext } from "./context.js";
import { formatStyleSchema, formatted, text, toolError } from "./response.js";

interface ImageKind {
  contentType: "iso" | "vztmpl";
  subject: string;
  title: string;
  icon: string;
  footer?: string;
}

const ISO_IMAGES: ImageKind = {
  contentType: "iso",
  subject: "ISO images",
  title: "Available ISO Images",
  icon: "💿",
};

const OS_TEMPLATES: ImageKind = {
  contentType: "vztmpl",
  subject: "OS templates",
  title: "Available OS Templates",
  icon: "📦",
  footer: "Use the Volume ID as the ostemplate when creating a container.",
};

export async function listImages(ctx: ToolContext, kind: ImageKind, filter: VolumeFilter): Promise<VolumeRow[]> {
  const rows = await collectVolumes(ctx, kind.contentType, filter);
  return rows.sort((a, b) => (a.volid < b.volid ? -1 : a.volid > b.volid ? 1 : 0));
}

export function renderImages(kind: ImageKind, rows: readonly VolumeRow[], filter: VolumeFilter): string {
  if (rows.length === 0) return emptyMessage(kind.subject, filter);

  const lines = [`${kind.icon} ${kind.title}`, ""];
  for (const image of rows) {
    lines.push(`  ${kind.icon} ${volumeFileName(image.volid)}`);
    lines.push(`     Size: ${bytesToHuman(image.size ?? 0)}`);
    lines.push(`     Storage: ${image.storage} @ ${image.node}`);
    lines.push(`     Volume ID: ${image.volid}`);
    lines.push("");
  }
  if (kind.footer) lines.push(kind.footer);
  return lines.join("\n").trimEnd();
}

/**
 * A full volume id ("local:iso/x.iso") is used as given. A bare file name is
 * looked up in the storage and must match a volume's file name exactly.
 */
export async function resolveVolume(api: ProxmoxApi, node: string, storage: string, filename: string): Promise<string> {
  if (filename.includes(":")) return filename;

  for (const item of await listStorageContent(api, node, storage)) {
    const volid = readString(item, "volid");
    if (volid && volumeFileName(volid) === filename) return volid;
  }
  throw new ProxmoxApiError(`Could not find '${filename}' in ${storage} on ${node}`);
}

export function registerIsoTools(server: McpServer, ctx: ToolContext): void {
  const listInput = {
    node: z.string().optional().describe("Filter by node (optional)"),
    storage: z.string().optional().describe("Filter by storage pool (optional)"),
    format_style: formatStyleSchema,
  };

  // List ISO images and OS templates
  for (const [tool, kind, description] of [
    ["list_isos", ISO_IMAGES, "List ISO images available for VM installation"],
    ["list_templates", OS_TEMPLATES, "List OS templates available for container creation"],
  ] as const) {
    server.registerTool(tool, { description, inputSchema: listInput }, async ({ node, storage, format_style }) => {
      const filter: VolumeFilter = { node, storage };
      try {
        const rows = await listImages(ctx, kind, filter);
        return formatted(format_style, rows, () => renderImages(kind, rows, filter));
      } catch (error) {
        return toolError(`Failed to list ${kind.subject}`, error, format_style, ctx.logger);
      }
    });
  }

  // Download ISO
  server.registerTool(
    "download_iso",
    {
      description: "Have a node download an ISO image from a URL into a storage",
      inputSchema: {
        node: z.string().describe("Target node"),
        storage: z.string().describe("Target storage pool (must accept ISO content)"),
        url: z.string().url().describe("URL to download from"),
        filename: z
          .string()
          .regex(/^[^/\\:]+\.iso$/i, "Filename must be a plain file name ending in .iso")
          .describe("Target file name (e.g. 'debian-12.iso')"),
        checksum: z.string().optional().describe("Expected checksum (optional)"),
        checksum_algorithm: z
          .enum(["md5", "sha1", "sha224", "sha256", "sha384", "sha512"])
          .default("sha256")
          .describe("Checksum algorithm, used only with checksum"),
      },
    },
    async ({ node, storage, url, filename, checksum, checksum_algorithm }) => {
      try {
        const result = await ctx.api.request("post", `${storagePath(node, storage)}/download-url`, {
          url,
          filename,
          content: "iso",
          checksum,
          "checksum-algorithm": checksum ? checksum_algorithm : undefined,
        });

        const lines = [
          "⬇️ ISO Download Started",
          "",
          `  • Filename: ${filename}`,
          `  • URL: ${url}`,
          `  • Storage: ${storage} @ ${node}`,
        ];
        if (checksum) lines.push(`  • Checksum: ${checksum_algorithm.toUpperCase()}`);
        lines.push(
          "",
          `Task ID: ${describeTask(result) ?? "n/a"}`,
          "",
          "The download is running in the background.",
          "Use list_isos to verify when complete."
        );
        return text(lines.join("\n"));
      } catch (error) {
        return toolError(`Failed to download ISO '${filename}'`, error, "pretty", ctx.logger);
      }
    }
  );

  // Delete ISO or template
  server.registerTool(
    "delete_iso",
    {
      description: "Delete an ISO image or OS template from a storage",
      inputSchema: {
        node: z.string().describe("Node name"),
        storage: z.string().describe("Storage pool name"),
        filename: z.string().min(1).describe("File name or full volume ID"),
      },
    },
    async ({ node, storage, filename }) => {
      try {
        const volid = await resolveVolume(ctx.api, node, storage, filename);
        const result = await ctx.api.request("delete", volumePath(node, storage, volid));
        const lines = ["🗑️ ISO/Template Deleted", "", `  • Volume: ${volid}`, `  • Storage: ${storage}`, `  • Node: ${node}`];
        const task = describeTask(result);
        if (task) lines.push("", `Task ID: ${task}`);
        return text(lines.join("\n"));
      } catch (error) {
        return toolError(`Failed to delete ISO/template '${filename}'`, error, "pretty", ctx.logger);
      }
    }
  );
}
