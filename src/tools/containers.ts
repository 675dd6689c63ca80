import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { runBatch, type ContainerAction } from "../containers/batch.js";
import { listInventory } from "../containers/inventory.js";
import { renderActionResults } from "../containers/render.js";
import { parseSelector, resolveTargets } from "../containers/selector.js";
import { listContainers, renderContainers } from "../containers/stats.js";
import { SelectorError } from "../errors.js";
import type { ToolContext } from "./context.js";
import { formatStyleSchema, formatted, text, toolError, type FormatStyle } from "./response.js";

const selectorSchema = z
  .string()
  .describe("CT selector: '123' | 'pve1:123' | 'pve1/name' | 'name', or a comma separated list of these");

/**
 * Resolve the selector against a fresh inventory, then dispatch the action to
 * every target. No backend action is sent when nothing matches.
 */
export async function controlContainers(
  ctx: ToolContext,
  selector: string,
  action: ContainerAction,
  title: string,
  format: FormatStyle
): Promise<CallToolResult> {
  const failure = `Failed to ${title.toLowerCase()}`;
  try {
    const tokens = parseSelector(selector);
    if (tokens.length === 0) {
      return toolError(failure, new SelectorError(selector), format, ctx.logger);
    }

    const concurrency = ctx.limits.maxConcurrency;
    const inventory = await listInventory(ctx.api, undefined, { concurrency, logger: ctx.logger });
    const targets = resolveTargets(tokens, inventory);
    if (targets.length === 0) {
      return toolError(failure, new SelectorError(selector), format, ctx.logger);
    }

    const results = await runBatch(ctx.api, targets, action, { concurrency, logger: ctx.logger });
    return text(renderActionResults(title, results, format));
  } catch (error) {
    return toolError(failure, error, format, ctx.logger);
  }
}

export function registerContainerTools(server: McpServer, ctx: ToolContext): void {
  // List containers
  server.registerTool(
    "get_containers",
    {
      description:
        "List LXC containers across the cluster or on one node, with live CPU and memory usage and configured limits",
      inputSchema: {
        node: z.string().optional().describe("Node name (optional, defaults to all nodes)"),
        include_stats: z.boolean().default(true).describe("Include live stats with config and RRD fallbacks"),
        include_raw: z.boolean().default(false).describe("Attach the raw status and config of each container"),
        format_style: formatStyleSchema,
      },
    },
    async ({ node, include_stats, include_raw, format_style }) => {
      try {
        const rows = await listContainers(ctx.api, {
          node,
          includeStats: include_stats,
          includeRaw: include_raw,
          concurrency: ctx.limits.maxConcurrency,
          logger: ctx.logger,
        });
        return formatted(format_style, rows, () => renderContainers(rows));
      } catch (error) {
        return toolError("Failed to list containers", error, format_style, ctx.logger);
      }
    }
  );

  // Start containers
  server.registerTool(
    "start_container",
    {
      description: "Start one or more LXC containers matching a selector",
      inputSchema: {
        selector: selectorSchema,
        format_style: formatStyleSchema,
      },
    },
    async ({ selector, format_style }) =>
      controlContainers(ctx, selector, { kind: "start" }, "Start Containers", format_style)
  );

  // Stop containers
  server.registerTool(
    "stop_container",
    {
      description: "Stop one or more LXC containers: graceful shutdown with a timeout, or an immediate forced stop",
      inputSchema: {
        selector: selectorSchema,
        graceful: z.boolean().default(false).describe("Graceful shutdown (true) or forced stop (false)"),
        timeout_seconds: z.number().int().min(1).max(600).default(10).describe("Timeout for a graceful shutdown"),
        format_style: formatStyleSchema,
      },
    },
    async ({ selector, graceful, timeout_seconds, format_style }) => {
      const action: ContainerAction = graceful ? { kind: "shutdown", timeoutSeconds: timeout_seconds } : { kind: "stop" };
      return controlContainers(ctx, selector, action, "Stop Containers", format_style);
    }
  );

  // Restart containers
  server.registerTool(
    "restart_container",
    {
      description: "Reboot one or more LXC containers matching a selector",
      inputSchema: {
        selector: selectorSchema,
        format_style: formatStyleSchema,
      },
    },
    async ({ selector, format_style }) =>
      controlContainers(ctx, selector, { kind: "reboot" }, "Restart Containers", format_style)
  );
}
