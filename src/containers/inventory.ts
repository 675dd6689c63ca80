import { errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import type { ProxmoxApi } from "../proxmox/client.js";
import { readString } from "../proxmox/normalize.js";
import { listGuests, listNodeNames } from "../proxmox/resources.js";
import { mapLimit } from "../util/concurrency.js";

export interface InventoryRecord {
  node: string;
  vmid: number;
  name: string | null;
  hostname: string | null;
  status: string | null;
}

export interface InventoryOptions {
  concurrency: number;
  logger: Logger;
}

async function listNodeContainers(api: ProxmoxApi, node: string): Promise<InventoryRecord[]> {
  const entries = await listGuests(api, node, "lxc");
  return entries.map(({ vmid, fields }) => ({
    node,
    vmid,
    name: readString(fields, "name"),
    hostname: readString(fields, "hostname"),
    status: readString(fields, "status"),
  }));
}

/**
 * List the containers of one node, or of every node when `node` is unset.
 *
 * A single requested node propagates its listing error. In the cluster-wide
 * scan a failing node is left out and the rest of the inventory is returned.
 */
export async function listInventory(
  api: ProxmoxApi,
  node: string | undefined,
  options: InventoryOptions
): Promise<InventoryRecord[]> {
  if (node) {
    return listNodeContainers(api, node);
  }

  const nodes = await listNodeNames(api);
  const perNode = await mapLimit(nodes, options.concurrency, async (name) => {
    try {
      return await listNodeContainers(api, name);
    } catch (error) {
      options.logger.warn({ node: name, err: errorMessage(error) }, "skipping node while listing containers");
      return [];
    }
  });
  return perNode.flat();
}

export function containerLabel(record: InventoryRecord): string {
  return record.name ?? record.hostname ?? `ct-${record.vmid}`;
}
