// ---------------------------------------------------------------------------
// SruClient – public operation surface.
//
// Every operation runs the same pipeline:
//   request builder -> transport -> response parser
// and every failure leaves with the operation's context attached.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import type {
  ClientConfig,
  Endpoint,
  EndpointCapabilities,
  ExplainResponse,
  IdentifierSearchOptions,
  OperationKind,
  RelatedSearchOptions,
  RelationType,
  ResponseWarning,
  ScanOptions,
  ScanResponse,
  SearchOptions,
  SearchResponse,
} from "../core/types.js";
import { SruClientError } from "../core/errors.js";
import type { OperationContext } from "../core/errors.js";
import { DEFAULT_PROFILE, getProfile } from "../config/profiles.js";
import { DEFAULT_USER_AGENT } from "../config/config.js";
import { silentLogger } from "../logging/logger.js";
import { parseExplainResponse } from "../parser/explain-parser.js";
import { parseScanResponse } from "../parser/scan-parser.js";
import { parseSearchResponse } from "../parser/search-parser.js";
import {
  DEFAULT_BUILDER_SETTINGS,
  buildExplainRequest,
  buildIdentifierSearchRequest,
  buildRelatedSearchRequest,
  buildScanRequest,
  buildSearchRequest,
  resolveEndpoint,
} from "../request/request-builder.js";
import type { BuilderSettings, SruRequest } from "../request/request-builder.js";
import { HttpTransport } from "../transport/http-transport.js";
import type { TransportOptions } from "../transport/http-transport.js";
import { decodeBody } from "../utils/xml.js";

export interface SruClientOptions {
  /** Named endpoint from the profiles file (default `swb`). Ignored when `baseUrl` is set. */
  profile?: string;
  /** Custom SRU endpoint. */
  baseUrl?: string;
  /** Overrides for the endpoint's capabilities. */
  capabilities?: Partial<EndpointCapabilities>;
  timeoutMs?: number;
  maxRecordsWarningThreshold?: number;
  /** Requests per second. */
  rateLimit?: number;
  userAgent?: string;
  apiKey?: string;
  /** Defaults to a silent logger. */
  logger?: Logger;
  /** Alternative profiles file. */
  profilesFile?: string;
}

const DEFAULT_TIMEOUT_MS = 30_000;

export class SruClient {
  public readonly endpoint: Endpoint;

  private readonly settings: BuilderSettings;
  private readonly transportOptions: TransportOptions;
  private readonly logger: Logger;
  private transport: HttpTransport | undefined;

  constructor(options: SruClientOptions = {}) {
    this.endpoint = resolveClientEndpoint(options);
    this.settings = {
      maxRecordsWarningThreshold:
        options.maxRecordsWarningThreshold ??
        DEFAULT_BUILDER_SETTINGS.maxRecordsWarningThreshold,
    };
    this.transportOptions = {
      timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      userAgent: options.userAgent ?? DEFAULT_USER_AGENT,
      ...(options.apiKey !== undefined ? { apiKey: options.apiKey } : {}),
      ...(options.rateLimit !== undefined ? { rateLimit: options.rateLimit } : {}),
    };
    this.logger = (options.logger ?? silentLogger()).child({
      component: "SruClient",
      baseUrl: this.endpoint.baseUrl,
    });
  }

  /** Client configured from {@link ClientConfig} (see `loadConfig`). */
  static fromConfig(config: ClientConfig, logger?: Logger): SruClient {
    return new SruClient({
      profile: config.profile,
      ...(config.baseUrl !== undefined ? { baseUrl: config.baseUrl } : {}),
      timeoutMs: config.timeoutMs,
      maxRecordsWarningThreshold: config.maxRecordsWarningThreshold,
      ...(config.rateLimit !== undefined ? { rateLimit: config.rateLimit } : {}),
      userAgent: config.userAgent,
      ...(config.apiKey !== undefined ? { apiKey: config.apiKey } : {}),
      ...(logger !== undefined ? { logger } : {}),
    });
  }

  // ── Session ─────────────────────────────────────────────────────────────

  /** Open the network session.  Operations call this on first use. */
  open(): void {
    if (this.transport && !this.transport.closed) return;
    this.transport = new HttpTransport(this.transportOptions, this.logger);
    this.logger.debug("Session opened");
  }

  /** Close the session.  Safe to call repeatedly. */
  close(): void {
    if (!this.transport) return;
    this.transport.close();
    this.transport = undefined;
    this.logger.debug("Session closed");
  }

  get isOpen(): boolean {
    return this.transport !== undefined && !this.transport.closed;
  }

  // ── Operations ──────────────────────────────────────────────────────────

  /**
   * Search the catalog.  With the default title index the query is one
   * term; pass `index: null` to send a complete CQL expression.
   */
  async search(query: string, options: SearchOptions = {}): Promise<SearchResponse> {
    return this.run("search", { query, ...options }, async () => {
      const request = buildSearchRequest(this.endpoint, query, options, this.settings);
      const body = await this.fetchBody(request);
      return withAdvisories(parseSearchResponse(body, request), request);
    });
  }

  async searchByIsbn(
    isbn: string,
    options: IdentifierSearchOptions = {},
  ): Promise<SearchResponse> {
    return this.run("searchByIsbn", { isbn, ...options }, async () => {
      const request = buildIdentifierSearchRequest(
        this.endpoint,
        "isbn",
        isbn,
        options,
        this.settings,
      );
      const body = await this.fetchBody(request);
      return withAdvisories(parseSearchResponse(body, request), request);
    });
  }

  async searchByIssn(
    issn: string,
    options: IdentifierSearchOptions = {},
  ): Promise<SearchResponse> {
    return this.run("searchByIssn", { issn, ...options }, async () => {
      const request = buildIdentifierSearchRequest(
        this.endpoint,
        "issn",
        issn,
        options,
        this.settings,
      );
      const body = await this.fetchBody(request);
      return withAdvisories(parseSearchResponse(body, request), request);
    });
  }

  /**
   * Records linked to `ppn`: volumes of a multi-part work (`CHILD`), its
   * parent (`PARENT`), the whole family, related or thesaurus links.
   */
  async searchRelated(
    ppn: string,
    relationType: RelationType,
    options: RelatedSearchOptions = {},
  ): Promise<SearchResponse> {
    return this.run("searchRelated", { ppn, relationType, ...options }, async () => {
      const request = buildRelatedSearchRequest(
        this.endpoint,
        ppn,
        relationType,
        options,
        this.settings,
      );
      const body = await this.fetchBody(request);
      return withAdvisories(parseSearchResponse(body, request), request);
    });
  }

  /** Browse index terms, e.g. `scan("pica.per=Goe")`. */
  async scan(scanClause: string, options: ScanOptions = {}): Promise<ScanResponse> {
    return this.run("scan", { scanClause, ...options }, async () => {
      const request = buildScanRequest(this.endpoint, scanClause, options);
      const body = await this.fetchBody(request);
      return parseScanResponse(body, request);
    });
  }

  /** Server capabilities: database info, indices and record schemas. */
  async explain(): Promise<ExplainResponse> {
    return this.run("explain", {}, async () => {
      const request = buildExplainRequest(this.endpoint);
      const body = await this.fetchBody(request);
      return parseExplainResponse(body);
    });
  }

  // ── Pipeline ────────────────────────────────────────────────────────────

  /**
   * Run one operation: log its outcome and attach the operation context
   * to any failure.  Errors keep their class and cause.
   */
  private async run<T extends { warnings: readonly ResponseWarning[] }>(
    operation: OperationKind,
    params: Record<string, unknown>,
    execute: () => Promise<T>,
  ): Promise<T> {
    const start = performance.now();
    const context: OperationContext = { operation, params };

    try {
      const result = await execute();
      const durationMs = Math.round(performance.now() - start);

      for (const warning of result.warnings) {
        this.logger.warn({ operation, warning }, warning.message);
      }
      this.logger.info(
        { operation, ...summarize(result), warnings: result.warnings.length, durationMs },
        "Operation completed",
      );
      return result;
    } catch (error: unknown) {
      const durationMs = Math.round(performance.now() - start);

      if (error instanceof SruClientError) {
        this.logger.warn({ operation, durationMs, err: error }, "Operation failed");
        throw error.withContext(context);
      }

      // Unclassified failure: wrap it, keeping it as the cause.
      const msg = error instanceof Error ? error.message : String(error);
      const wrapped = new SruClientError(`${operation} failed: ${msg}`, {
        cause: error,
      }).withContext(context);
      this.logger.error({ operation, durationMs, err: wrapped }, "Operation failed");
      throw wrapped;
    }
  }

  private async fetchBody(request: SruRequest): Promise<string> {
    this.open();
    const transport = this.transport;
    if (!transport) {
      throw new SruClientError("Session could not be opened");
    }

    this.logger.debug({ url: request.url, version: request.version }, "Issuing SRU request");

    const response = await transport.get(request.url);
    return decodeBody(response.body, response.charset);
  }
}

// ── Scoped usage ────────────────────────────────────────────────────────────

/**
 * Run `fn` with a client whose session is closed afterwards, whether `fn`
 * returns or throws.
 */
export async function withClient<T>(
  options: SruClientOptions,
  fn: (client: SruClient) => Promise<T>,
): Promise<T> {
  const client = new SruClient(options);
  try {
    return await fn(client);
  } finally {
    client.close();
  }
}

// ── Helpers ─────────────────────────────────────────────────────────────────

function resolveClientEndpoint(options: SruClientOptions): Endpoint {
  if (options.baseUrl !== undefined) {
    return resolveEndpoint(options.baseUrl, options.capabilities ?? {});
  }
  const profile = getProfile(options.profile ?? DEFAULT_PROFILE, options.profilesFile);
  return resolveEndpoint(profile.url, {
    ...profile.capabilities,
    ...options.capabilities,
  });
}

/** Request advisories come first in the response's warnings. */
function withAdvisories(response: SearchResponse, request: SruRequest): SearchResponse {
  if (request.advisories.length === 0) return response;
  return Object.freeze({
    ...response,
    warnings: Object.freeze([...request.advisories, ...response.warnings]),
  });
}

function summarize(result: object): Record<string, number | null> {
  if ("results" in result && Array.isArray(result.results)) {
    const total = "totalResults" in result ? result.totalResults : null;
    return {
      results: result.results.length,
      totalResults: typeof total === "number" ? total : null,
    };
  }
  if ("terms" in result && Array.isArray(result.terms)) {
    return { terms: result.terms.length };
  }
  if ("indices" in result && Array.isArray(result.indices)) {
    return { indices: result.indices.length };
  }
  return {};
}
