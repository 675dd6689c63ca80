import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors.js";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface ProxmoxSettings {
  host: string;
  port: number;
  verifySsl: boolean;
}

export type AuthSettings =
  | { kind: "token"; user: string; tokenName: string; tokenValue: string }
  | { kind: "password"; user: string; password: string };

export interface McpSettings {
  transport: "stdio" | "http";
  host: string;
  port: number;
}

export interface LimitSettings {
  /** Upper bound on concurrent backend calls when a tool fans out over nodes or targets. */
  maxConcurrency: number;
  taskPollIntervalMs: number;
  taskPollAttempts: number;
}

export interface Config {
  proxmox: ProxmoxSettings;
  auth: AuthSettings;
  logging: { level: LogLevel };
  mcp: McpSettings;
  limits: LimitSettings;
}

const lowercase = (value: unknown) => (typeof value === "string" ? value.toLowerCase() : value);

// The on-disk layout (snake_case sections). Environment variables are mapped
// onto the same shape so both sources go through one validation.
const configSchema = z
  .object({
    proxmox: z.object({
      host: z
        .string({ required_error: "Proxmox host must be provided (via config file or PROXMOX_HOST)" })
        .min(1, "Proxmox host must be provided (via config file or PROXMOX_HOST)"),
      port: z.coerce.number().int().min(1).max(65535).default(8006),
      verify_ssl: z.boolean().default(true),
    }),
    auth: z.object({
      user: z
        .string({ required_error: "Authentication user must be provided (via config file or PROXMOX_USER)" })
        .min(1, "Authentication user must be provided (via config file or PROXMOX_USER)"),
      token_name: z.string().min(1).optional(),
      token_value: z.string().min(1).optional(),
      password: z.string().min(1).optional(),
    }),
    logging: z
      .object({
        level: z.preprocess(lowercase, z.enum(LOG_LEVELS)).default("info"),
      })
      .default({}),
    mcp: z
      .object({
        transport: z.preprocess(lowercase, z.enum(["stdio", "http"])).default("stdio"),
        host: z.string().default("0.0.0.0"),
        port: z.coerce.number().int().min(1).max(65535).default(3333),
      })
      .default({}),
    limits: z
      .object({
        max_concurrency: z.coerce.number().int().min(1).max(64).default(4),
        task_poll_interval_ms: z.coerce.number().int().min(0).default(1000),
        task_poll_attempts: z.coerce.number().int().min(1).default(60),
      })
      .default({}),
  })
  .transform((raw, ctx): Config => {
    const { user, token_name, token_value, password } = raw.auth;
    let auth: AuthSettings;
    if (token_name && token_value) {
      auth = { kind: "token", user, tokenName: token_name, tokenValue: token_value };
    } else if (password) {
      auth = { kind: "password", user, password };
    } else {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["auth"],
        message: "Either token_name and token_value or password must be provided",
      });
      return z.NEVER;
    }

    return {
      proxmox: { host: raw.proxmox.host, port: raw.proxmox.port, verifySsl: raw.proxmox.verify_ssl },
      auth,
      logging: { level: raw.logging.level },
      mcp: raw.mcp,
      limits: {
        maxConcurrency: raw.limits.max_concurrency,
        taskPollIntervalMs: raw.limits.task_poll_interval_ms,
        taskPollAttempts: raw.limits.task_poll_attempts,
      },
    };
  });

type Env = Record<string, string | undefined>;

// Unset, empty and unexpanded "${VAR}" placeholders all count as missing
function envValue(env: Env, key: string): string | undefined {
  const value = env[key];
  if (value === undefined || value === "" || value.startsWith("${")) return undefined;
  return value;
}

function transportFromEnv(env: Env): string | undefined {
  if (envValue(env, "HTTP_MODE") === "true") return "http";
  const transport = envValue(env, "MCP_TRANSPORT")?.toLowerCase();
  if (transport === "streamable" || transport === "streamable_http") return "http";
  return transport;
}

function configFromEnv(env: Env): unknown {
  const verifySsl = envValue(env, "PROXMOX_VERIFY_SSL");
  return {
    proxmox: {
      host: envValue(env, "PROXMOX_HOST"),
      port: envValue(env, "PROXMOX_PORT"),
      verify_ssl: verifySsl === undefined ? undefined : verifySsl.toLowerCase() !== "false",
    },
    auth: {
      user: envValue(env, "PROXMOX_USER"),
      token_name: envValue(env, "PROXMOX_TOKEN_NAME"),
      token_value: envValue(env, "PROXMOX_TOKEN_VALUE"),
      password: envValue(env, "PROXMOX_PASSWORD"),
    },
    logging: { level: envValue(env, "LOG_LEVEL") },
    mcp: {
      transport: transportFromEnv(env),
      host: envValue(env, "HTTP_HOST"),
      port: envValue(env, "HTTP_PORT"),
    },
    limits: { max_concurrency: envValue(env, "PROXMOX_MAX_CONCURRENCY") },
  };
}

function configFromFile(path: string): unknown {
  try {
    return JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigError(`Invalid JSON in config file ${path}: ${error.message}`);
    }
    throw new ConfigError(`Failed to load config file ${path}: ${errorMessage(error)}`);
  }
}

/**
 * Load the server configuration.
 *
 * `PROXMOX_MCP_CONFIG` names a JSON file; when it is unset or the file does not
 * exist the configuration is read from environment variables instead.
 */
export function loadConfig(env: Env = process.env): Config {
  const path = envValue(env, "PROXMOX_MCP_CONFIG");
  const raw = path && existsSync(path) ? configFromFile(path) : configFromEnv(env);

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new ConfigError(`Configuration validation failed: ${issues}`);
  }
  return result.data;
}
