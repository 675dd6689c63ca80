import { setTimeout as sleep } from "node:timers/promises";
import pino from "pino";
import type { LimitSettings } from "../config.js";
import { ProxmoxApiError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { HttpMethod, ProxmoxApi, RequestParams } from "../proxmox/client.js";
import type { ToolContext } from "../tools/context.js";

export interface RecordedCall {
  method: HttpMethod;
  endpoint: string;
  data: RequestParams | undefined;
}

export type RouteHandler = (data: RequestParams | undefined) => unknown;

/** "get /nodes" -> a reply value, or a handler that returns or throws one. */
export type Routes = Record<string, unknown>;

function isHandler(value: unknown): value is RouteHandler {
  return typeof value === "function";
}

/**
 * In-process stand-in for the Proxmox backend. Every call is recorded; an
 * unknown route answers like a missing endpoint.
 */
export class FakeProxmoxApi implements ProxmoxApi {
  readonly calls: RecordedCall[] = [];
  /** Most requests that were open at the same moment. */
  peakInFlight = 0;
  private inFlight = 0;
  private latencyMs = 0;

  constructor(private readonly routes: Routes = {}) {}

  route(key: string, reply: unknown): this {
    this.routes[key] = reply;
    return this;
  }

  /** Hold every reply for `ms` so overlapping requests can be observed. */
  withLatency(ms: number): this {
    this.latencyMs = ms;
    return this;
  }

  async request(method: HttpMethod, endpoint: string, data?: RequestParams): Promise<unknown> {
    this.calls.push({ method, endpoint, data });
    this.inFlight++;
    this.peakInFlight = Math.max(this.peakInFlight, this.inFlight);
    try {
      if (this.latencyMs > 0) await sleep(this.latencyMs);
      const key = `${method} ${endpoint}`;
      if (!(key in this.routes)) {
        throw new ProxmoxApiError(`Request failed with status 404: no route for ${key}`, 404);
      }
      const reply = this.routes[key];
      return isHandler(reply) ? reply(data) : reply;
    } finally {
      this.inFlight--;
    }
  }

  callsTo(method: HttpMethod, endpoint: string): RecordedCall[] {
    return this.calls.filter((call) => call.method === method && call.endpoint === endpoint);
  }

  /** Endpoints of every non-GET call, in order. */
  mutations(): string[] {
    return this.calls.filter((call) => call.method !== "get").map((call) => `${call.method} ${call.endpoint}`);
  }
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

export const TEST_LIMITS: LimitSettings = {
  maxConcurrency: 4,
  taskPollIntervalMs: 0,
  taskPollAttempts: 3,
};

export function testContext(api: ProxmoxApi, limits: Partial<LimitSettings> = {}): ToolContext {
  return { api, logger: silentLogger(), limits: { ...TEST_LIMITS, ...limits } };
}
