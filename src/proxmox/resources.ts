// Typed wrappers over the endpoints the tools share. Each one normalizes the
// reply so callers never look at raw envelopes.

import { setTimeout as sleep } from "node:timers/promises";
import { z } from "zod";
import { ProxmoxApiError } from "../errors.js";
import type { ProxmoxApi } from "./client.js";
import {
  isRecord,
  readString,
  toNumber,
  unwrapDict,
  unwrapList,
  unwrapRecords,
  type JsonMap,
} from "./normalize.js";

export type GuestType = "qemu" | "lxc";

const vmidSchema = z.preprocess((value) => toNumber(value) ?? value, z.number().int().nonnegative());

export interface GuestEntry {
  vmid: number;
  fields: JsonMap;
}

/**
 * Guest list entries are usually mappings, but some proxies hand back bare
 * ids. Bare ids become `{ vmid }`; anything without an integer id is dropped.
 */
export function toGuestEntry(item: unknown): GuestEntry | null {
  const raw = isRecord(item) ? item.vmid : item;
  const parsed = vmidSchema.safeParse(raw);
  if (!parsed.success) return null;
  return { vmid: parsed.data, fields: isRecord(item) ? item : { vmid: parsed.data } };
}

/** A node's API subtree; the name is always a single path segment. */
export function nodePath(node: string): string {
  return `/nodes/${encodeURIComponent(node)}`;
}

export function storagePath(node: string, storage: string): string {
  return `${nodePath(node)}/storage/${encodeURIComponent(storage)}`;
}

export async function listNodeNames(api: ProxmoxApi): Promise<string[]> {
  const nodes = unwrapRecords(await api.request("get", "/nodes"));
  const names: string[] = [];
  for (const node of nodes) {
    const name = readString(node, "node");
    if (name) names.push(name);
  }
  return names;
}

export async function listGuests(api: ProxmoxApi, node: string, type: GuestType): Promise<GuestEntry[]> {
  const raw = await api.request("get", `${nodePath(node)}/${type}`);
  const entries: GuestEntry[] = [];
  for (const item of unwrapList(raw)) {
    const entry = toGuestEntry(item);
    if (entry) entries.push(entry);
  }
  return entries;
}

export async function getGuestStatus(api: ProxmoxApi, node: string, type: GuestType, vmid: number): Promise<JsonMap> {
  return unwrapDict(await api.request("get", `${nodePath(node)}/${type}/${vmid}/status/current`));
}

export async function getGuestConfig(api: ProxmoxApi, node: string, type: GuestType, vmid: number): Promise<JsonMap> {
  return unwrapDict(await api.request("get", `${nodePath(node)}/${type}/${vmid}/config`));
}

export type RrdTimeframe = "hour" | "day" | "week" | "month" | "year";

export async function getGuestRrd(
  api: ProxmoxApi,
  node: string,
  type: GuestType,
  vmid: number,
  timeframe: RrdTimeframe = "hour"
): Promise<JsonMap[]> {
  return unwrapRecords(
    await api.request("get", `${nodePath(node)}/${type}/${vmid}/rrddata`, { timeframe, cf: "AVERAGE" })
  );
}

/** Storages of a node, optionally only those that accept the given content type. */
export async function listNodeStorages(api: ProxmoxApi, node: string, contentType?: string): Promise<JsonMap[]> {
  const storages = unwrapRecords(await api.request("get", `${nodePath(node)}/storage`));
  if (!contentType) return storages;
  return storages.filter((storage) => storageAccepts(storage, contentType));
}

export function storageAccepts(storage: JsonMap, contentType: string): boolean {
  const content = readString(storage, "content") ?? "";
  return content
    .split(",")
    .map((part) => part.trim())
    .includes(contentType);
}

export async function listStorageContent(
  api: ProxmoxApi,
  node: string,
  storage: string,
  params: { content?: string; vmid?: number } = {}
): Promise<JsonMap[]> {
  return unwrapRecords(await api.request("get", `${storagePath(node, storage)}/content`, params));
}

export function volumePath(node: string, storage: string, volid: string): string {
  return `${storagePath(node, storage)}/content/${encodeURIComponent(volid)}`;
}

/** Task ids come back as plain UPID strings; anything else is shown as JSON. */
export function describeTask(reply: unknown): string | null {
  if (reply === null || reply === undefined) return null;
  return typeof reply === "string" ? reply : JSON.stringify(reply);
}

export interface PollOptions {
  intervalMs: number;
  attempts: number;
}

export interface TaskOutcome {
  upid: string;
  exitStatus: string | null;
}

export async function waitForTask(api: ProxmoxApi, node: string, upid: string, poll: PollOptions): Promise<TaskOutcome> {
  for (let attempt = 0; attempt < poll.attempts; attempt++) {
    const status = unwrapDict(await api.request("get", `${nodePath(node)}/tasks/${encodeURIComponent(upid)}/status`));
    if (readString(status, "status") === "stopped") {
      const exitStatus = readString(status, "exitstatus");
      if (exitStatus && exitStatus !== "OK" && !exitStatus.startsWith("WARNINGS")) {
        throw new ProxmoxApiError(`Task ${upid} failed: ${exitStatus}`);
      }
      return { upid, exitStatus };
    }
    await sleep(poll.intervalMs);
  }
  throw new ProxmoxApiError(`Task ${upid} did not finish after ${poll.attempts} checks`);
}
