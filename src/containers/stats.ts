import { errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import type { ProxmoxApi } from "../proxmox/client.js";
import { bytesToHuman, readNumber, type JsonMap } from "../proxmox/normalize.js";
import { getGuestConfig, getGuestRrd, getGuestStatus } from "../proxmox/resources.js";
import { toSortedJson } from "../util/json.js";
import { mapLimit } from "../util/concurrency.js";
import { containerLabel, listInventory, type InventoryRecord } from "./inventory.js";

const MIB = 1024 * 1024;

export interface ContainerStats {
  cores: number | null;
  /** Configured memory limit in MiB; 0 when the config has none. */
  memory: number;
  cpu_pct: number;
  mem_bytes: number;
  maxmem_bytes: number;
  mem_pct: number | null;
  unlimited_memory: boolean;
}

export interface ContainerRow extends Partial<ContainerStats> {
  vmid: string;
  name: string;
  node: string;
  status: string | null;
  raw_status?: JsonMap;
  raw_config?: JsonMap;
}

export interface ListContainersOptions {
  node?: string;
  includeStats: boolean;
  includeRaw: boolean;
  concurrency: number;
  logger: Logger;
}

interface RrdSample {
  cpuPct: number;
  memBytes: number;
  maxmemBytes: number;
}

const round2 = (value: number) => Math.round(value * 100) / 100;

// Missing status or config is not fatal for a listing; the row just has zeros
async function readOrEmpty(what: string, read: () => Promise<JsonMap>, logger: Logger): Promise<JsonMap> {
  try {
    return await read();
  } catch (error) {
    logger.debug({ what, err: errorMessage(error) }, "container detail unavailable");
    return {};
  }
}

async function lastRrdSample(api: ProxmoxApi, node: string, vmid: number, logger: Logger): Promise<RrdSample | null> {
  try {
    const samples = await getGuestRrd(api, node, "lxc", vmid, "hour");
    const last = samples.at(-1);
    if (!last) return null;
    // RRD cpu is a 0..1 fraction
    return {
      cpuPct: round2((readNumber(last, "cpu") ?? 0) * 100),
      memBytes: Math.trunc(readNumber(last, "mem") ?? 0),
      maxmemBytes: Math.trunc(readNumber(last, "maxmem") ?? 0),
    };
  } catch (error) {
    logger.debug({ node, vmid, err: errorMessage(error) }, "rrd data unavailable");
    return null;
  }
}

function configMemoryMib(config: JsonMap): number {
  for (const key of ["memory", "ram", "maxmem", "memoryMiB"]) {
    if (config[key] !== undefined && config[key] !== null) {
      return Math.trunc(readNumber(config, key) ?? 0);
    }
  }
  return 0;
}

function configCores(config: JsonMap): number | null {
  const cores = readNumber(config, "cores");
  if (cores !== null) return Math.trunc(cores);
  const cpulimit = readNumber(config, "cpulimit");
  return cpulimit !== null && cpulimit > 0 ? cpulimit : null;
}

/**
 * Merge live status, configured limits and, where live values read zero
 * (stopped or freshly started containers), the latest RRD sample.
 */
export function mergeStats(status: JsonMap, config: JsonMap, rrd: RrdSample | null): ContainerStats {
  let cpuPct = round2((readNumber(status, "cpu") ?? 0) * 100);
  let memBytes = Math.trunc(readNumber(status, "mem") ?? 0);
  let maxmemBytes = Math.trunc(readNumber(status, "maxmem") ?? 0);
  let memoryMib = configMemoryMib(config);
  // Heuristic: no swap and no memory limit in the config reads as "unlimited"
  const unlimited = (readNumber(config, "swap") ?? 0) === 0 && memoryMib === 0;

  if (rrd) {
    if (cpuPct === 0) cpuPct = rrd.cpuPct;
    if (memBytes === 0) memBytes = rrd.memBytes;
    if (maxmemBytes === 0 && rrd.maxmemBytes > 0) {
      maxmemBytes = rrd.maxmemBytes;
      if (memoryMib === 0) memoryMib = Math.round(maxmemBytes / MIB);
    }
  }

  return {
    cores: configCores(config),
    memory: memoryMib,
    cpu_pct: cpuPct,
    mem_bytes: memBytes,
    maxmem_bytes: maxmemBytes,
    mem_pct: maxmemBytes > 0 ? round2((memBytes / maxmemBytes) * 100) : null,
    unlimited_memory: unlimited,
  };
}

async function buildRow(api: ProxmoxApi, record: InventoryRecord, options: ListContainersOptions): Promise<ContainerRow> {
  const row: ContainerRow = {
    vmid: String(record.vmid),
    name: containerLabel(record),
    node: record.node,
    status: record.status,
  };
  if (!options.includeStats) return row;

  const { node, vmid } = record;
  // At most one open request per container
  const status = await readOrEmpty("status", () => getGuestStatus(api, node, "lxc", vmid), options.logger);
  const config = await readOrEmpty("config", () => getGuestConfig(api, node, "lxc", vmid), options.logger);

  const needsRrd =
    (readNumber(status, "cpu") ?? 0) === 0 ||
    (readNumber(status, "mem") ?? 0) === 0 ||
    (readNumber(status, "maxmem") ?? 0) === 0;
  const rrd = needsRrd ? await lastRrdSample(api, node, vmid, options.logger) : null;

  Object.assign(row, mergeStats(status, config, rrd));
  if (options.includeRaw) {
    row.raw_status = status;
    row.raw_config = config;
  }
  return row;
}

export async function listContainers(api: ProxmoxApi, options: ListContainersOptions): Promise<ContainerRow[]> {
  const inventory = await listInventory(api, options.node, options);
  return mapLimit(inventory, options.concurrency, (record) => buildRow(api, record, options));
}

function memoryLine(row: ContainerRow): string {
  const mem = bytesToHuman(row.mem_bytes ?? 0);
  if (row.unlimited_memory) return `  • Memory: ${mem} (unlimited)`;
  const maxmem = row.maxmem_bytes ?? 0;
  if (maxmem > 0) {
    const pct = typeof row.mem_pct === "number" ? ` (${row.mem_pct.toFixed(1)}%)` : "";
    return `  • Memory: ${mem} / ${bytesToHuman(maxmem)}${pct}`;
  }
  return `  • Memory: ${mem} / 0.00 B`;
}

export function renderContainers(rows: readonly ContainerRow[]): string {
  const lines: string[] = ["📦 Containers", ""];
  for (const row of rows) {
    lines.push(`📦 ${row.name} (ID: ${row.vmid})`);
    lines.push(`  • Status: ${(row.status ?? "").toUpperCase()}`);
    lines.push(`  • Node: ${row.node}`);
    if (row.cpu_pct !== undefined) {
      lines.push(`  • CPU: ${row.cpu_pct.toFixed(1)}%`);
      lines.push(`  • CPU Cores: ${row.cores ?? "N/A"}`);
      lines.push(memoryLine(row));
    }
    if (row.raw_status) lines.push(`  • Raw status: ${toSortedJson(row.raw_status)}`);
    if (row.raw_config) lines.push(`  • Raw config: ${toSortedJson(row.raw_config)}`);
    lines.push("");
  }
  if (rows.length === 0) lines.push("No containers found");
  return lines.join("\n").trimEnd();
}
