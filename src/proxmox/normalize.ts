// Reply normalization. Proxmox endpoints answer with bare values, lists, or
// { data: ... } envelopes depending on the path and the client in front of
// them, so every reply is classified once here before anything reads it.

export type JsonMap = Record<string, unknown>;

export type ApiReply =
  | { kind: "list"; items: unknown[] }
  | { kind: "map"; value: JsonMap }
  | { kind: "scalar"; value: unknown };

export function isRecord(value: unknown): value is JsonMap {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function classifyReply(raw: unknown): ApiReply {
  if (Array.isArray(raw)) {
    return { kind: "list", items: raw };
  }
  if (isRecord(raw)) {
    const data = raw.data;
    if (Array.isArray(data)) return { kind: "list", items: data };
    if (isRecord(data)) return { kind: "map", value: data };
    return { kind: "map", value: raw };
  }
  return { kind: "scalar", value: raw };
}

export function unwrapList(raw: unknown): unknown[] {
  const reply = classifyReply(raw);
  return reply.kind === "list" ? reply.items : [];
}

export function unwrapDict(raw: unknown): JsonMap {
  const reply = classifyReply(raw);
  return reply.kind === "map" ? reply.value : {};
}

/** Mapping entries of a list reply; bare values are dropped. */
export function unwrapRecords(raw: unknown): JsonMap[] {
  return unwrapList(raw).filter(isRecord);
}

export function toNumber(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function readString(map: JsonMap, key: string): string | null {
  const value = map[key];
  if (typeof value === "string" && value !== "") return value;
  if (typeof value === "number") return String(value);
  return null;
}

export function readNumber(map: JsonMap, key: string): number | null {
  return toNumber(map[key]);
}

export function readInteger(map: JsonMap, key: string): number | null {
  const value = toNumber(map[key]);
  return value !== null && Number.isInteger(value) ? value : null;
}

/** Proxmox encodes booleans as 0/1 numbers; some paths send real booleans. */
export function readFlag(map: JsonMap, key: string): boolean {
  const value = map[key];
  if (typeof value === "boolean") return value;
  return toNumber(value) === 1;
}

const BYTE_UNITS = ["B", "KiB", "MiB", "GiB", "TiB", "PiB"] as const;

/**
 * Format a byte count with binary units, e.g. `1536` -> `"1.50 KiB"`.
 * Anything that is not a number or a numeric string renders as `"0.00 B"`.
 */
export function bytesToHuman(input: unknown): string {
  let value = toNumber(input);
  if (value === null) return "0.00 B";
  let unit = 0;
  while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit += 1;
  }
  return `${value.toFixed(2)} ${BYTE_UNITS[unit]}`;
}

export function formatUptime(seconds: number | null): string {
  if (seconds === null || seconds <= 0) return "0m";
  const days = Math.floor(seconds / 86400);
  const hours = Math.floor((seconds % 86400) / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const parts: string[] = [];
  if (days > 0) parts.push(`${days}d`);
  if (hours > 0) parts.push(`${hours}h`);
  parts.push(`${minutes}m`);
  return parts.join(" ");
}

// Epoch seconds -> "YYYY-MM-DD HH:MM:SS UTC"
export function formatTimestamp(epochSeconds: number | null): string {
  if (epochSeconds === null || epochSeconds <= 0) return "Unknown";
  const iso = new Date(epochSeconds * 1000).toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 19)} UTC`;
}
