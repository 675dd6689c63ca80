// Error types shared by the backend client, the configuration loader and the tools

export class ProxmoxApiError extends Error {
  readonly status: number | undefined;
  readonly errors: Record<string, string>;

  constructor(message: string, status?: number, errors: Record<string, string> = {}) {
    super(message);
    this.name = "ProxmoxApiError";
    this.status = status;
    this.errors = errors;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Raised when a container selector matches nothing in the current inventory. */
export class SelectorError extends Error {
  readonly selector: string;

  constructor(selector: string) {
    super(`No containers matched the selector '${selector}'`);
    this.name = "SelectorError";
    this.selector = selector;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Proxmox reports parameter problems as { errors: { field: "message" } }
export function formatProxmoxErrors(errors: Record<string, string>): string {
  return Object.entries(errors)
    .map(([k, v]) => `${k}: ${v}`)
    .join("; ");
}
