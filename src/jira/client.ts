/**
 * Jira REST client.
 *
 * Fetches a single issue and normalizes it into a Ticket. Works anonymously
 * for public issues or with a Personal Access Token sent as a bearer token.
 *
 *   const client = new JiraClient({ baseUrl: "https://issues.example.com", token });
 *   await client.testAuthentication();
 *   const ticket = await client.getTicket("LOGIN-1");
 *
 * No retries: a failed request surfaces immediately.
 */

import { normalizeTicket } from "../tickets/normalizer.js";
import type { Ticket } from "../tickets/schema.js";
import { parseRawRecord } from "./envelope.js";
import {
  AuthenticationError,
  JiraApiError,
  TicketNotFoundError,
  TransportError,
} from "./errors.js";

export const DEFAULT_JIRA_BASE_URL = "https://issues.redhat.com";
export const DEFAULT_TIMEOUT_MS = 30_000;

export type FetchFn = typeof fetch;

export interface JiraClientOptions {
  /** Jira instance root, without a trailing `/rest/...` path. */
  baseUrl?: string;
  /** Personal Access Token; anonymous access when omitted. */
  token?: string;
  /** Per-request timeout in milliseconds. */
  timeoutMs?: number;
  /** Injected fetch implementation (tests). */
  fetch?: FetchFn;
}

export class JiraClient {
  readonly baseUrl: string;
  private readonly token: string | undefined;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;

  constructor(options: JiraClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_JIRA_BASE_URL).replace(/\/+$/, "");
    this.token = options.token || undefined;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  /** Whether requests carry a bearer token. */
  get authenticated(): boolean {
    return this.token !== undefined;
  }

  /**
   * Fetch an issue by id or key.
   *
   * @throws TicketNotFoundError on 404
   * @throws JiraApiError        on any other non-success status
   * @throws TransportError      if the request fails or the body is not an
   *                             issue envelope
   */
  async getTicket(ticketId: string): Promise<Ticket> {
    const url = `${this.baseUrl}/rest/api/2/issue/${encodeURIComponent(ticketId)}`;
    const response = await this.request(url, {
      Accept: "application/json",
      "Content-Type": "application/json",
    });

    if (response.status === 404) {
      throw new TicketNotFoundError(ticketId);
    }
    if (!response.ok) {
      throw new JiraApiError(response.status, await this.readBody(response));
    }

    const body = await this.readBody(response);
    let payload: unknown;
    try {
      payload = JSON.parse(body);
    } catch (err) {
      throw new TransportError(`Failed to decode issue response for ${ticketId}`, {
        cause: err,
      });
    }

    const record = parseRawRecord(payload);
    return normalizeTicket(record.fields, { id: record.id, key: record.key });
  }

  /**
   * Verify the configured token against `/rest/api/2/myself`.
   *
   * @throws AuthenticationError if no token is configured, the token is
   *                             rejected, or the check returns another error
   * @throws TransportError      if the request itself fails
   */
  async testAuthentication(): Promise<void> {
    if (!this.authenticated) {
      throw new AuthenticationError("No authentication token provided");
    }

    const response = await this.request(`${this.baseUrl}/rest/api/2/myself`, {
      Accept: "application/json",
    });

    if (response.status === 401) {
      throw new AuthenticationError("Authentication failed: invalid token");
    }
    if (!response.ok) {
      const body = await this.readBody(response);
      throw new AuthenticationError(
        `Authentication test failed with status ${response.status}: ${body}`
      );
    }
  }

  private async request(url: string, headers: Record<string, string>): Promise<Response> {
    const allHeaders = this.token
      ? { ...headers, Authorization: `Bearer ${this.token}` }
      : headers;

    try {
      return await this.fetchFn(url, {
        method: "GET",
        headers: allHeaders,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new TransportError(`Request to ${url} failed: ${reason}`, { cause: err });
    }
  }

  private async readBody(response: Response): Promise<string> {
    try {
      return await response.text();
    } catch (err) {
      throw new TransportError("Failed to read response body", { cause: err });
    }
  }
}
