import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import { toSortedJson } from "../util/json.js";

export type FormatStyle = "pretty" | "json";

export const formatStyleSchema = z
  .enum(["pretty", "json"])
  .default("pretty")
  .describe("'pretty' for a readable report, 'json' for raw structured output");

export function text(s: string): CallToolResult {
  return { content: [{ type: "text", text: s }] };
}

/** Sorted-key JSON in json mode, otherwise the rendered report. */
export function formatted(format: FormatStyle, data: unknown, pretty: () => string): CallToolResult {
  return text(format === "json" ? toSortedJson(data) : pretty());
}

/**
 * Turn a failure into a single error block. JSON mode always yields a JSON
 * object with an `error` field; pretty mode a one-line message.
 */
export function toolError(action: string, error: unknown, format: FormatStyle, logger?: Logger): CallToolResult {
  const message = errorMessage(error);
  logger?.error({ action, err: message }, "tool call failed");
  const body = format === "json" ? toSortedJson({ action, error: message }) : `Error: ${action} - ${message}`;
  return { content: [{ type: "text", text: body }], isError: true };
}
