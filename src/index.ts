#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { createServer as createHttpServer } from "node:http";
import { loadConfig, type Config } from "./config.js";
import { errorMessage } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { ProxmoxClient } from "./proxmox/client.js";
import { createServer } from "./server.js";

// ==================== Configuration ====================

let config: Config;
try {
  config = loadConfig();
} catch (error) {
  // Configuration failed, so log at the default level
  createLogger().fatal({ err: errorMessage(error) }, "invalid configuration");
  process.exit(1);
}

const logger: Logger = createLogger({ level: config.logging.level });
const api = new ProxmoxClient(config.proxmox, config.auth, logger.child({ component: "proxmox" }));
const server = createServer({ api, logger, limits: config.limits });

function shutdown(signal: string, close: () => Promise<void>): void {
  logger.info({ signal }, "shutting down");
  close().then(
    () => process.exit(0),
    (error: unknown) => {
      logger.error({ err: errorMessage(error) }, "error during shutdown");
      process.exit(1);
    }
  );
}

// ==================== Start Server ====================

try {
  if (config.mcp.transport === "http") {
    // Stateless mode: no session management
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
    });
    await server.connect(transport);

    const httpServer = createHttpServer(async (req, res) => {
      try {
        await transport.handleRequest(req, res);
      } catch (error) {
        logger.error({ err: errorMessage(error), url: req.url }, "HTTP request error");
        if (!res.headersSent) {
          res.writeHead(500, { "Content-Type": "application/json" });
          res.end(JSON.stringify({ error: "Internal server error" }));
        }
      }
    });

    const { host, port } = config.mcp;
    await new Promise<void>((resolve, reject) => {
      httpServer.once("error", reject);
      httpServer.listen(port, host, () => resolve());
    });
    logger.info({ host, port, proxmox: config.proxmox.host }, "MCP server listening on HTTP");

    const close = async (): Promise<void> => {
      await server.close();
      await new Promise<void>((resolve, reject) => httpServer.close((err) => (err ? reject(err) : resolve())));
    };
    process.once("SIGINT", () => shutdown("SIGINT", close));
    process.once("SIGTERM", () => shutdown("SIGTERM", close));
  } else {
    const transport = new StdioServerTransport();
    await server.connect(transport);
    logger.info({ proxmox: config.proxmox.host }, "MCP server running on stdio");

    const close = () => server.close();
    process.once("SIGINT", () => shutdown("SIGINT", close));
    process.once("SIGTERM", () => shutdown("SIGTERM", close));
  }
} catch (error) {
  logger.fatal({ err: errorMessage(error) }, "failed to start MCP server");
  process.exit(1);
}
