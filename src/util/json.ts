import { isRecord } from "../proxmox/normalize.js";

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (isRecord(value)) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(value[key]);
    }
    return sorted;
  }
  return value;
}

/** JSON with keys sorted at every depth, so equal data always renders to equal text. */
export function toSortedJson(value: unknown): string {
  return JSON.stringify(sortKeys(value), null, 2);
}
