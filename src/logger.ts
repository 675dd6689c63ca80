/**
 * Logger utility using pino
 *
 * Logs go to stderr: in stdio mode stdout carries the MCP protocol stream.
 */

import type { DestinationStream, Logger } from "pino";
import pino from "pino";
import type { LogLevel } from "./config.js";

export interface LoggerOptions {
  level?: LogLevel;
  component?: string;
  destination?: DestinationStream;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino(
    {
      level: options.level ?? "info",
      base: { component: options.component ?? "pve-mcp-tools" },
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label }),
      },
      redact: {
        paths: ["password", "tokenValue", "*.password", "*.tokenValue"],
        censor: "[REDACTED]",
      },
    },
    options.destination ?? pino.destination(2)
  );
}

export type { Logger };
