// ---------------------------------------------------------------------------
// HTTP transport – issues SRU GET requests and classifies HTTP-level
// failures.  Bodies are returned as bytes; decoding is left to the parser
// side so the XML prolog can decide the character set.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import {
  AccessDeniedError,
  ConnectionError,
  HttpStatusError,
  RateLimitedError,
  ServerError,
  SruClientError,
  TimeoutError,
} from "../core/errors.js";
import { RateLimiter } from "./rate-limiter.js";

export interface TransportOptions {
  timeoutMs: number;
  userAgent: string;
  /** Sent as `Authorization: Bearer <apiKey>`. */
  apiKey?: string;
  /** Requests per second; omitted means unthrottled. */
  rateLimit?: number;
}

export interface TransportResponse {
  status: number;
  body: Uint8Array;
  /** `charset` parameter of the Content-Type header, if any. */
  charset: string | undefined;
  url: string;
}

const ACCESS_DENIED_SUGGESTION =
  "This endpoint may restrict access. Try a different profile " +
  "(e.g. --profile k10plus or --profile dnb) or check whether an API key is required.";

/**
 * One network session.  Requests made after {@link close} fail; the client
 * replaces a closed transport with a fresh one.
 */
export class HttpTransport {
  private readonly options: TransportOptions;
  private readonly logger: Logger;
  private readonly limiter: RateLimiter | undefined;
  /** Aborts in-flight requests when the session is closed. */
  private readonly session = new AbortController();

  constructor(options: TransportOptions, logger: Logger) {
    this.options = options;
    this.logger = logger;
    this.limiter =
      options.rateLimit === undefined ? undefined : new RateLimiter(options.rateLimit);
  }

  get closed(): boolean {
    return this.session.signal.aborted;
  }

  close(): void {
    if (!this.closed) this.session.abort();
  }

  // ── Requests ────────────────────────────────────────────────────────────

  async get(url: string): Promise<TransportResponse> {
    if (this.closed) {
      throw new ConnectionError(`Session closed before requesting ${url}`, url);
    }

    if (this.limiter) {
      const waitedMs = await this.limiter.acquire();
      if (waitedMs > 0) this.logger.debug({ url, waitedMs }, "Request throttled");
    }

    let response: Response;
    try {
      response = await fetch(url, {
        signal: AbortSignal.any([
          this.session.signal,
          AbortSignal.timeout(this.options.timeoutMs),
        ]),
        headers: this.headers(),
      });
    } catch (error: unknown) {
      throw this.classify(error, url);
    }

    if (!response.ok) {
      throw statusError(response, url);
    }

    let body: Uint8Array;
    try {
      body = new Uint8Array(await response.arrayBuffer());
    } catch (error: unknown) {
      throw this.classify(error, url);
    }

    return {
      status: response.status,
      body,
      charset: contentCharset(response.headers.get("content-type")),
      url,
    };
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      "User-Agent": this.options.userAgent,
      Accept: "application/xml",
    };
    if (this.options.apiKey) {
      headers["Authorization"] = `Bearer ${this.options.apiKey}`;
    }
    return headers;
  }

  /** Map a fetch failure onto the transport error kinds. */
  private classify(error: unknown, url: string): SruClientError {
    if (error instanceof SruClientError) return error;

    if (this.closed) {
      return new ConnectionError(`Session closed while requesting ${url}`, url, {
        cause: error,
      });
    }

    // AbortSignal.timeout() rejects with a "TimeoutError" DOMException.
    if (
      error instanceof Error &&
      (error.name === "TimeoutError" || error.name === "AbortError")
    ) {
      return new TimeoutError(url, this.options.timeoutMs, { cause: error });
    }

    // fetch reports DNS, refused connections and TLS failures as TypeError.
    if (error instanceof TypeError) {
      const reason = error.cause instanceof Error ? error.cause.message : error.message;
      return new ConnectionError(`Network error requesting ${url}: ${reason}`, url, {
        cause: error,
      });
    }

    const msg = error instanceof Error ? error.message : String(error);
    return new ConnectionError(`Request to ${url} failed: ${msg}`, url, { cause: error });
  }
}

// ── Helpers ─────────────────────────────────────────────────────────────────

function statusError(response: Response, url: string): HttpStatusError {
  const { status } = response;
  if (status === 403) return new AccessDeniedError(url, ACCESS_DENIED_SUGGESTION);
  if (status === 429) {
    return new RateLimitedError(url, retryAfterMs(response.headers.get("retry-after")));
  }
  if (status >= 500) return new ServerError(status, url);
  return new HttpStatusError(
    `HTTP ${status}${response.statusText ? ` ${response.statusText}` : ""} from ${url}`,
    status,
    url,
  );
}

/** `Retry-After` as seconds or an HTTP date. */
function retryAfterMs(header: string | null): number | null {
  if (header === null) return null;
  const trimmed = header.trim();
  if (/^\d+$/.test(trimmed)) return Number.parseInt(trimmed, 10) * 1000;
  const date = Date.parse(trimmed);
  return Number.isNaN(date) ? null : Math.max(0, date - Date.now());
}

function contentCharset(contentType: string | null): string | undefined {
  const match = /;\s*charset\s*=\s*"?([^";\s]+)"?/i.exec(contentType ?? "");
  return match?.[1]?.toLowerCase();
}
