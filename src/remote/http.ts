import type { ILogger } from "../shared/logger.js";
import { withRetry } from "../shared/retry-utils.js";
import { sanitizeCredentials } from "../shared/sanitize-utils.js";

export type FetchFn = typeof fetch;

/**
 * Non-2xx response from a remote API.
 */
export class ApiError extends Error {
  readonly status: number;
  readonly url: string;
  readonly body: string;

  constructor(status: number, url: string, body: string) {
    super(`Got ${status} from ${url}: ${sanitizeCredentials(body)}`);
    this.name = "ApiError";
    this.status = status;
    this.url = url;
    this.body = body;
  }
}

export interface HttpClientOptions {
  fetch?: FetchFn;
  /** Default headers sent with every request. */
  headers?: Record<string, string>;
  retries?: number;
  /** Delay before the first retry, in milliseconds. */
  retryMinTimeout?: number;
  logger?: ILogger;
}

/**
 * Extract the `rel="next"` target from a Link header.
 */
export function parseNextLink(header: string | null): string | null {
  if (!header) {
    return null;
  }
  for (const part of header.split(",")) {
    const match = part.match(/<([^>]+)>\s*;\s*rel="next"/);
    if (match) {
      return match[1];
    }
  }
  return null;
}

/**
 * Thin `fetch` wrapper: default headers, retries, and an ApiError for
 * every non-2xx response.
 */
export class HttpClient {
  private readonly fetchFn: FetchFn;
  private readonly headers: Record<string, string>;
  private readonly retries: number | undefined;
  private readonly retryMinTimeout: number | undefined;
  private readonly log: ILogger | undefined;

  constructor(options: HttpClientOptions = {}) {
    this.fetchFn = options.fetch ?? globalThis.fetch;
    this.headers = options.headers ?? {};
    this.retries = options.retries;
    this.retryMinTimeout = options.retryMinTimeout;
    this.log = options.logger;
  }

  async request(url: string, init: RequestInit = {}): Promise<Response> {
    return withRetry(
      async () => {
        const res = await this.fetchFn(url, {
          ...init,
          headers: { ...this.headers, ...headersToRecord(init.headers) },
        });
        if (!res.ok) {
          throw new ApiError(res.status, url, await res.text());
        }
        return res;
      },
      {
        retries: this.retries,
        minTimeout: this.retryMinTimeout,
        log: this.log,
      }
    );
  }

  async getJson(url: string): Promise<unknown> {
    const res = await this.request(url, { method: "GET" });
    return res.json();
  }

  /**
   * GET every page of a list endpoint, following Link headers.
   */
  async getAllPages(url: string): Promise<unknown[]> {
    const items: unknown[] = [];
    let next: string | null = url;
    while (next !== null) {
      const res = await this.request(next, { method: "GET" });
      const page: unknown = await res.json();
      if (!Array.isArray(page)) {
        throw new Error(`Expected a JSON array from ${next}`);
      }
      items.push(...page);
      next = parseNextLink(res.headers.get("link"));
    }
    return items;
  }
}

function headersToRecord(
  headers: RequestInit["headers"]
): Record<string, string> {
  if (headers === undefined) {
    return {};
  }
  return Object.fromEntries(new Headers(headers).entries());
}
