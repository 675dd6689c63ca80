import { Agent } from "node:https";
import axios, { type AxiosAdapter, type AxiosInstance, type AxiosResponse } from "axios";
import type { AuthSettings, ProxmoxSettings } from "../config.js";
import { ProxmoxApiError, errorMessage, formatProxmoxErrors } from "../errors.js";
import type { Logger } from "../logger.js";
import { isRecord, readString, unwrapDict } from "./normalize.js";

export type HttpMethod = "get" | "post" | "put" | "delete";

export type RequestValue = string | number | boolean | string[];

export type RequestParams = Record<string, RequestValue | undefined>;

/**
 * The single seam between the tools and Proxmox. Replies are returned with the
 * `{ data }` envelope already removed and are otherwise untyped; callers run
 * them through the normalizers.
 */
export interface ProxmoxApi {
  request(method: HttpMethod, endpoint: string, data?: RequestParams): Promise<unknown>;
}

interface Ticket {
  ticket: string;
  CSRFPreventionToken: string;
}

// Tickets are valid for two hours; renew a little before that
const TICKET_LIFETIME_MS = 110 * 60 * 1000;

export interface ProxmoxClientOptions {
  /** Replaces the HTTP transport, e.g. with an in-process stand-in. */
  adapter?: AxiosAdapter;
  now?: () => number;
}

function readErrors(body: unknown): Record<string, string> | undefined {
  if (!isRecord(body) || !isRecord(body.errors)) return undefined;
  const errors: Record<string, string> = {};
  for (const [key, value] of Object.entries(body.errors)) {
    errors[key] = typeof value === "string" ? value : JSON.stringify(value);
  }
  return errors;
}

// Drop undefined values so optional tool parameters never reach the API
function compact(data: RequestParams | undefined): Record<string, RequestValue> | undefined {
  if (!data) return undefined;
  const out: Record<string, RequestValue> = {};
  for (const [key, value] of Object.entries(data)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

export class ProxmoxClient implements ProxmoxApi {
  private readonly http: AxiosInstance;
  private readonly now: () => number;
  private session: Promise<Ticket> | undefined;
  private sessionIssuedAt = 0;

  constructor(
    settings: ProxmoxSettings,
    private readonly auth: AuthSettings,
    private readonly logger: Logger,
    options: ProxmoxClientOptions = {}
  ) {
    this.now = options.now ?? Date.now;
    this.http = axios.create({
      baseURL: `https://${settings.host}:${settings.port}/api2/json`,
      httpsAgent: settings.verifySsl ? undefined : new Agent({ rejectUnauthorized: false }),
      validateStatus: () => true,
      adapter: options.adapter,
    });
  }

  async request(method: HttpMethod, endpoint: string, data?: RequestParams): Promise<unknown> {
    const headers = await this.authHeaders();
    const payload = compact(data);

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.request<unknown>({
        method,
        url: endpoint,
        // GET/DELETE params go as query string; POST/PUT as request body
        ...(method === "get" || method === "delete" ? { params: payload } : { data: payload }),
        headers,
      });
    } catch (error) {
      throw new ProxmoxApiError(`Proxmox API error: ${errorMessage(error)}`);
    }

    this.logger.debug({ method, endpoint, status: response.status }, "proxmox request");

    const errors = readErrors(response.data);
    if (response.status >= 400 || errors) {
      if (response.status === 401 && this.auth.kind === "password") {
        this.session = undefined;
      }
      const reason = response.statusText ? `: ${response.statusText}` : "";
      const detail = errors ? formatProxmoxErrors(errors) : `Request failed with status ${response.status}${reason}`;
      throw new ProxmoxApiError(detail, response.status, errors);
    }

    if (isRecord(response.data)) {
      // Some endpoints return no data on success (e.g. DELETE)
      return response.data.data ?? null;
    }
    return response.data ?? null;
  }

  private async authHeaders(): Promise<Record<string, string>> {
    if (this.auth.kind === "token") {
      return {
        Authorization: `PVEAPIToken=${this.auth.user}!${this.auth.tokenName}=${this.auth.tokenValue}`,
      };
    }
    const ticket = await this.currentTicket();
    return {
      Cookie: `PVEAuthCookie=${ticket.ticket}`,
      CSRFPreventionToken: ticket.CSRFPreventionToken,
    };
  }

  private async currentTicket(): Promise<Ticket> {
    const now = this.now();
    if (!this.session || now - this.sessionIssuedAt > TICKET_LIFETIME_MS) {
      this.sessionIssuedAt = now;
      this.session = this.getTicket();
    }
    try {
      return await this.session;
    } catch (error) {
      this.session = undefined;
      throw error;
    }
  }

  private async getTicket(): Promise<Ticket> {
    if (this.auth.kind !== "password") {
      throw new ProxmoxApiError("Ticket authentication requires a password");
    }

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.post<unknown>("/access/ticket", {
        username: this.auth.user,
        password: this.auth.password,
      });
    } catch (error) {
      throw new ProxmoxApiError(`Authentication failed: ${errorMessage(error)}`);
    }

    const data = unwrapDict(response.data);
    const ticket = readString(data, "ticket");
    const csrf = readString(data, "CSRFPreventionToken");
    if (response.status >= 400 || !ticket || !csrf) {
      throw new ProxmoxApiError(
        `Authentication failed: Failed to get authentication ticket (status ${response.status})`,
        response.status
      );
    }
    this.logger.debug({ user: this.auth.user }, "obtained proxmox ticket");
    return { ticket, CSRFPreventionToken: csrf };
  }
}
