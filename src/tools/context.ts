import type { LimitSettings } from "../config.js";
import type { Logger } from "../logger.js";
import type { ProxmoxApi } from "../proxmox/client.js";

// Everything a tool module needs; built once in createServer
export interface ToolContext {
  api: ProxmoxApi;
  logger: Logger;
  limits: LimitSettings;
}
