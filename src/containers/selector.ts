import { containerLabel, type InventoryRecord } from "./inventory.js";

/**
 * One comma-separated part of a container selector.
 *
 * - `123`        vmid on any node
 * - `pve1:123`   vmid on one node
 * - `pve1/web`   name or hostname on one node
 * - `web`        name or hostname on any node
 */
export type SelectorToken =
  | { kind: "vmid"; vmid: number }
  | { kind: "node-vmid"; node: string; vmid: number }
  | { kind: "node-name"; node: string; name: string }
  | { kind: "name"; name: string };

export interface Target {
  node: string;
  vmid: number;
  label: string;
}

const DIGITS = /^\d+$/;

export function parseToken(token: string): SelectorToken | null {
  const hasColon = token.includes(":");
  const hasSlash = token.includes("/");

  if (hasColon && !hasSlash) {
    const index = token.indexOf(":");
    const vmid = token.slice(index + 1).trim();
    if (!DIGITS.test(vmid)) return null;
    return { kind: "node-vmid", node: token.slice(0, index), vmid: Number(vmid) };
  }

  if (hasSlash && !hasColon) {
    const index = token.indexOf("/");
    const name = token.slice(index + 1).trim();
    if (!name) return null;
    return { kind: "node-name", node: token.slice(0, index), name };
  }

  if (DIGITS.test(token)) {
    return { kind: "vmid", vmid: Number(token) };
  }

  return { kind: "name", name: token };
}

/** Split a selector into tokens; blank and malformed parts are skipped. */
export function parseSelector(selector: string | undefined | null): SelectorToken[] {
  if (!selector) return [];
  const tokens: SelectorToken[] = [];
  for (const part of selector.split(",")) {
    const trimmed = part.trim();
    if (!trimmed) continue;
    const token = parseToken(trimmed);
    if (token) tokens.push(token);
  }
  return tokens;
}

function matchesName(record: InventoryRecord, name: string): boolean {
  return record.name === name || record.hostname === name;
}

function matchToken(token: SelectorToken, inventory: readonly InventoryRecord[]): Target[] {
  switch (token.kind) {
    case "vmid":
      return inventory
        .filter((record) => record.vmid === token.vmid)
        .map((record) => ({ node: record.node, vmid: record.vmid, label: containerLabel(record) }));
    case "node-vmid": {
      // vmids are unique per node, so at most one record matches
      const record = inventory.find((r) => r.node === token.node && r.vmid === token.vmid);
      return record ? [{ node: record.node, vmid: record.vmid, label: containerLabel(record) }] : [];
    }
    case "node-name":
      return inventory
        .filter((record) => record.node === token.node && matchesName(record, token.name))
        .map((record) => ({ node: record.node, vmid: record.vmid, label: token.name }));
    case "name":
      return inventory
        .filter((record) => matchesName(record, token.name))
        .map((record) => ({ node: record.node, vmid: record.vmid, label: token.name }));
    default: {
      const unreachable: never = token;
      return unreachable;
    }
  }
}

/**
 * Resolve a selector against an inventory snapshot.
 *
 * Matching is exact. Each (node, vmid) appears once, at the position of its
 * first match, carrying the label of its last match. An empty result means
 * nothing matched and must be reported as such by the caller.
 */
export function resolveTargets(
  selector: string | readonly SelectorToken[],
  inventory: readonly InventoryRecord[]
): Target[] {
  const tokens = typeof selector === "string" ? parseSelector(selector) : selector;
  const unique = new Map<string, Target>();
  for (const token of tokens) {
    for (const target of matchToken(token, inventory)) {
      unique.set(`${target.node}\u0000${target.vmid}`, target);
    }
  }
  return [...unique.values()];
}
