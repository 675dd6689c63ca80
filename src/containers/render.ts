import type { FormatStyle } from "../tools/response.js";
import { toSortedJson } from "../util/json.js";
import type { ActionResult } from "./batch.js";

export function renderActionLine(result: ActionResult): string {
  const status = result.ok ? "✅ OK" : "❌ FAIL";
  const name = result.name || `ct-${result.vmid}`;
  const detail = result.ok ? result.message : result.error;
  const suffix = detail ? ` - ${detail}` : "";
  return `${status} ${name} (ID: ${result.vmid}, node: ${result.node})${suffix}`;
}

export function renderActionResults(title: string, results: readonly ActionResult[], format: FormatStyle): string {
  if (format === "json") {
    return toSortedJson(results);
  }
  return [`📦 ${title}`, "", ...results.map(renderActionLine)].join("\n").trimEnd();
}
