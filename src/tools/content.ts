import { errorMessage } from "../errors.js";
import { readFlag, readInteger, readNumber, readString, type JsonMap } from "../proxmox/normalize.js";
import { listNodeNames, listNodeStorages, listStorageContent } from "../proxmox/resources.js";
import { mapLimit } from "../util/concurrency.js";
import type { ToolContext } from "./context.js";

/** One volume found in a storage's content listing. */
export interface VolumeRow {
  node: string;
  storage: string;
  volid: string;
  format: string | null;
  size: number | null;
  ctime: number | null;
  vmid: number | null;
  notes: string | null;
  protected: boolean;
}

export interface VolumeFilter {
  node?: string;
  storage?: string;
  vmid?: number;
}

export function toVolumeRow(node: string, storage: string, item: JsonMap): VolumeRow | null {
  const volid = readString(item, "volid");
  if (!volid) return null;
  return {
    node,
    storage,
    volid,
    format: readString(item, "format"),
    size: readNumber(item, "size"),
    ctime: readNumber(item, "ctime"),
    vmid: readInteger(item, "vmid"),
    notes: readString(item, "notes"),
    protected: readFlag(item, "protected"),
  };
}

// "local:iso/debian-12.iso" -> "debian-12.iso"
export function volumeFileName(volid: string): string {
  const slash = volid.lastIndexOf("/");
  return slash === -1 ? volid : volid.slice(slash + 1);
}

interface StorageRef {
  node: string;
  storage: string;
}

async function storagesWith(ctx: ToolContext, node: string, contentType: string, filter: VolumeFilter): Promise<StorageRef[]> {
  const refs: StorageRef[] = [];
  for (const entry of await listNodeStorages(ctx.api, node, contentType)) {
    const storage = readString(entry, "storage");
    if (storage !== null && (!filter.storage || storage === filter.storage)) refs.push({ node, storage });
  }
  return refs;
}

/**
 * Gather volumes of one content type from every storage that holds it. On a
 * cluster-wide scan a node whose storages cannot be listed is skipped; a
 * storage whose content cannot be read is skipped on any scan.
 *
 * Storages are found first and their content read in a second pass, so each
 * pass keeps at most `maxConcurrency` requests open.
 */
export async function collectVolumes(ctx: ToolContext, contentType: string, filter: VolumeFilter): Promise<VolumeRow[]> {
  const limit = ctx.limits.maxConcurrency;
  let refs: StorageRef[];
  if (filter.node) {
    refs = await storagesWith(ctx, filter.node, contentType, filter);
  } else {
    const nodes = await listNodeNames(ctx.api);
    const perNode = await mapLimit(nodes, limit, async (node) => {
      try {
        return await storagesWith(ctx, node, contentType, filter);
      } catch (error) {
        ctx.logger.warn({ node, contentType, err: errorMessage(error) }, "skipping node while listing storage content");
        return [];
      }
    });
    refs = perNode.flat();
  }

  const perStorage = await mapLimit(refs, limit, async ({ node, storage }) => {
    try {
      const items = await listStorageContent(ctx.api, node, storage, { content: contentType, vmid: filter.vmid });
      const rows: VolumeRow[] = [];
      for (const item of items) {
        const row = toVolumeRow(node, storage, item);
        if (row) rows.push(row);
      }
      return rows;
    } catch (error) {
      ctx.logger.warn({ node, storage, contentType, err: errorMessage(error) }, "skipping unreadable storage");
      return [];
    }
  });
  return perStorage.flat();
}

// "No backups found on node pve1 in storage local for VM/CT 100"
export function emptyMessage(subject: string, filter: VolumeFilter): string {
  let message = `No ${subject} found`;
  if (filter.node) message += ` on node ${filter.node}`;
  if (filter.storage) message += ` in storage ${filter.storage}`;
  if (filter.vmid !== undefined) message += ` for VM/CT ${filter.vmid}`;
  return message;
}
