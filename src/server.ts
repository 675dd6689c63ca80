import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { registerBackupTools } from "./tools/backups.js";
import { registerClusterTools } from "./tools/cluster.js";
import { registerContainerTools } from "./tools/containers.js";
import type { ToolContext } from "./tools/context.js";
import { registerIsoTools } from "./tools/isos.js";
import { registerNodeTools } from "./tools/nodes.js";
import { registerSnapshotTools } from "./tools/snapshots.js";
import { registerStorageTools } from "./tools/storage.js";
import { registerVmTools } from "./tools/vms.js";

export const SERVER_NAME = "pve-mcp-tools";
export const SERVER_VERSION = "0.1.0";

export function createServer(ctx: ToolContext): McpServer {
  const server = new McpServer(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  registerNodeTools(server, ctx);
  registerVmTools(server, ctx);
  registerContainerTools(server, ctx);
  registerStorageTools(server, ctx);
  registerClusterTools(server, ctx);
  registerSnapshotTools(server, ctx);
  registerBackupTools(server, ctx);
  registerIsoTools(server, ctx);

  return server;
}
