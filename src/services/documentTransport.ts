import { TransportError } from "../errors.js";
import type { TargetDescriptor } from "../types/records.js";
import { renderTargetUrl } from "./queryBuilder.js";

export interface DocumentTransport {
  fetchDocument(target: TargetDescriptor): Promise<string>;
}

/** Longest delay setTimeout honours; anything larger fires after 1 ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export const DEFAULT_BASE_URL = "https://lolalytics.com/";
export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/119.0 Safari/537.36";

export interface HttpDocumentTransportOptions {
  baseUrl?: string;
  timeoutMs?: number;
  /** Merged over the default User-Agent header. */
  headers?: Record<string, string>;
  /** Swap in a preconfigured client, e.g. one that routes through a proxy. */
  fetchImpl?: typeof fetch;
}

export class HttpDocumentTransport implements DocumentTransport {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpDocumentTransportOptions = {}) {
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    if (!Number.isInteger(this.timeoutMs) || this.timeoutMs <= 0 || this.timeoutMs > MAX_TIMEOUT_MS) {
      throw new RangeError(`timeoutMs must be an integer between 1 and ${MAX_TIMEOUT_MS}, got ${this.timeoutMs}.`);
    }
    // Header names are case-insensitive on the wire, so fold them before merging.
    const overrides = Object.entries(options.headers ?? {}).map(
      ([name, value]): [string, string] => [name.toLowerCase(), value]
    );
    this.headers = { "user-agent": DEFAULT_USER_AGENT, ...Object.fromEntries(overrides) };
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetchDocument(target: TargetDescriptor): Promise<string> {
    const url = renderTargetUrl(this.baseUrl, target);
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await this.fetchImpl(url, {
        method: "GET",
        headers: this.headers,
        signal: controller.signal
      });
      if (!response.ok) {
        throw new TransportError({ kind: "http_error", url, status: response.status });
      }
      return await response.text();
    } catch (error) {
      if (error instanceof TransportError) throw error;
      if (controller.signal.aborted) {
        throw new TransportError({ kind: "timeout", url, cause: error });
      }
      throw new TransportError({ kind: "network_error", url, cause: error });
    } finally {
      clearTimeout(timeout);
    }
  }
}
