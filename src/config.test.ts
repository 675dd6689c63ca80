import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadConfig } from "./config.js";
import { ConfigError } from "./errors.js";

const tokenEnv = {
  PROXMOX_HOST: "pve.example.test",
  PROXMOX_USER: "root@pam",
  PROXMOX_TOKEN_NAME: "mcp",
  PROXMOX_TOKEN_VALUE: "test-secret",
};

describe("loadConfig from the environment", () => {
  it("applies defaults", () => {
    expect(loadConfig(tokenEnv)).toEqual({
      proxmox: { host: "pve.example.test", port: 8006, verifySsl: true },
      auth: { kind: "token", user: "root@pam", tokenName: "mcp", tokenValue: "test-secret" },
      logging: { level: "info" },
      mcp: { transport: "stdio", host: "0.0.0.0", port: 3333 },
      limits: { maxConcurrency: 4, taskPollIntervalMs: 1000, taskPollAttempts: 60 },
    });
  });

  it("reads ports, TLS verification, log level and concurrency", () => {
    const config = loadConfig({
      ...tokenEnv,
      PROXMOX_PORT: "8443",
      PROXMOX_VERIFY_SSL: "FALSE",
      LOG_LEVEL: "DEBUG",
      PROXMOX_MAX_CONCURRENCY: "8",
    });
    expect(config.proxmox).toEqual({ host: "pve.example.test", port: 8443, verifySsl: false });
    expect(config.logging.level).toBe("debug");
    expect(config.limits.maxConcurrency).toBe(8);
  });

  it("uses password authentication when no token is set", () => {
    const config = loadConfig({ PROXMOX_HOST: "pve", PROXMOX_USER: "root@pam", PROXMOX_PASSWORD: "test-secret" });
    expect(config.auth).toEqual({ kind: "password", user: "root@pam", password: "test-secret" });
  });

  it("prefers a complete token over a password", () => {
    const config = loadConfig({ ...tokenEnv, PROXMOX_PASSWORD: "test-secret" });
    expect(config.auth.kind).toBe("token");
  });

  it("switches to HTTP with HTTP_MODE", () => {
    const config = loadConfig({ ...tokenEnv, HTTP_MODE: "true", HTTP_HOST: "127.0.0.1", HTTP_PORT: "4000" });
    expect(config.mcp).toEqual({ transport: "http", host: "127.0.0.1", port: 4000 });
  });

  it("maps the streamable transport names to HTTP", () => {
    expect(loadConfig({ ...tokenEnv, MCP_TRANSPORT: "streamable_http" }).mcp.transport).toBe("http");
    expect(loadConfig({ ...tokenEnv, MCP_TRANSPORT: "Streamable" }).mcp.transport).toBe("http");
    expect(loadConfig({ ...tokenEnv, MCP_TRANSPORT: "stdio" }).mcp.transport).toBe("stdio");
  });

  it("treats empty values and unexpanded placeholders as unset", () => {
    const config = loadConfig({ ...tokenEnv, PROXMOX_PORT: "", HTTP_PORT: "${HTTP_PORT}" });
    expect(config.proxmox.port).toBe(8006);
    expect(config.mcp.port).toBe(3333);
  });

  it("requires a host", () => {
    const { PROXMOX_HOST: _host, ...rest } = tokenEnv;
    expect(() => loadConfig(rest)).toThrow(
      "Configuration validation failed: proxmox.host: Proxmox host must be provided (via config file or PROXMOX_HOST)"
    );
  });

  it("requires a password or a complete token", () => {
    expect(() => loadConfig({ PROXMOX_HOST: "pve", PROXMOX_USER: "root@pam", PROXMOX_TOKEN_NAME: "mcp" })).toThrow(
      "Configuration validation failed: auth: Either token_name and token_value or password must be provided"
    );
  });

  it("rejects an unknown transport", () => {
    expect(() => loadConfig({ ...tokenEnv, MCP_TRANSPORT: "websocket" })).toThrow(ConfigError);
  });

  it("rejects out-of-range concurrency", () => {
    expect(() => loadConfig({ ...tokenEnv, PROXMOX_MAX_CONCURRENCY: "0" })).toThrow(/limits\.max_concurrency/);
  });
});

describe("loadConfig from a file", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "pve-mcp-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("reads the JSON file named by PROXMOX_MCP_CONFIG instead of the environment", () => {
    const path = join(dir, "config.json");
    writeFileSync(
      path,
      JSON.stringify({
        proxmox: { host: "10.0.0.5", port: 8006, verify_ssl: false },
        auth: { user: "mcp@pve", token_name: "tools", token_value: "test-secret" },
        logging: { level: "warn" },
        mcp: { transport: "http", port: 9000 },
      })
    );

    const config = loadConfig({ PROXMOX_MCP_CONFIG: path, PROXMOX_HOST: "ignored" });

    expect(config.proxmox).toEqual({ host: "10.0.0.5", port: 8006, verifySsl: false });
    expect(config.auth).toEqual({ kind: "token", user: "mcp@pve", tokenName: "tools", tokenValue: "test-secret" });
    expect(config.logging.level).toBe("warn");
    expect(config.mcp).toEqual({ transport: "http", host: "0.0.0.0", port: 9000 });
  });

  it("falls back to the environment when the file does not exist", () => {
    const config = loadConfig({ ...tokenEnv, PROXMOX_MCP_CONFIG: join(dir, "missing.json") });
    expect(config.proxmox.host).toBe("pve.example.test");
  });

  it("reports malformed JSON", () => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ not json");
    expect(() => loadConfig({ PROXMOX_MCP_CONFIG: path })).toThrow(`Invalid JSON in config file ${path}`);
  });
});
