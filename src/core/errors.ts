// ---------------------------------------------------------------------------
// Error hierarchy for the SRU catalog client.
// ---------------------------------------------------------------------------

import type { OperationKind } from "./types.js";

/** Where in the public surface a failure happened. */
export interface OperationContext {
  operation: OperationKind;
  params: Record<string, unknown>;
}

// ── Base error ──────────────────────────────────────────────────────────────

/**
 * Root of all client errors.
 */
export class SruClientError extends Error {
  /** Attached once at the client boundary; never replaces the error kind. */
  public context: OperationContext | undefined;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SruClientError";
    Object.setPrototypeOf(this, new.target.prototype);
  }

  withContext(context: OperationContext): this {
    this.context ??= context;
    return this;
  }
}

// ── Pre-flight errors ───────────────────────────────────────────────────────

export interface ValidationIssue {
  path: string;
  message: string;
}

/** Caller-supplied parameters were rejected before any network call. */
export class ValidationError extends SruClientError {
  public readonly issues: readonly ValidationIssue[];

  constructor(
    message: string,
    issues: readonly ValidationIssue[] = [],
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "ValidationError";
    this.issues = issues;
  }
}

/** A required configuration value is missing or invalid. */
export class ConfigurationError extends SruClientError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

// ── Transport errors ────────────────────────────────────────────────────────

/** The request never produced an HTTP response. */
export class TransportError extends SruClientError {
  public readonly url: string;

  constructor(message: string, url: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TransportError";
    this.url = url;
  }
}

/** Connection refused, DNS failure, TLS failure, reset socket. */
export class ConnectionError extends TransportError {
  constructor(message: string, url: string, options?: ErrorOptions) {
    super(message, url, options);
    this.name = "ConnectionError";
  }
}

/** The request exceeded the configured timeout. */
export class TimeoutError extends TransportError {
  public readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number, options?: ErrorOptions) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`, url, options);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

// ── HTTP status errors ──────────────────────────────────────────────────────

/** The server answered with a non-2xx status. */
export class HttpStatusError extends SruClientError {
  public readonly status: number;
  public readonly url: string;

  constructor(
    message: string,
    status: number,
    url: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "HttpStatusError";
    this.status = status;
    this.url = url;
  }
}

/**
 * 403: usually an access restriction on the endpoint, not a query problem.
 * The message carries the suggestion as well.
 */
export class AccessDeniedError extends HttpStatusError {
  public readonly suggestion: string;

  constructor(url: string, suggestion: string, options?: ErrorOptions) {
    const base = `Access denied (403 Forbidden) from ${url}`;
    super(suggestion === "" ? base : `${base}. ${suggestion}`, 403, url, options);
    this.name = "AccessDeniedError";
    this.suggestion = suggestion;
  }
}

/** 429 from the remote catalog. */
export class RateLimitedError extends HttpStatusError {
  public readonly retryAfterMs: number | null;

  constructor(url: string, retryAfterMs: number | null, options?: ErrorOptions) {
    super(`Rate limit exceeded (429) at ${url}`, 429, url, options);
    this.name = "RateLimitedError";
    this.retryAfterMs = retryAfterMs;
  }
}

/** 5xx: the failure is on the server side and may be transient. */
export class ServerError extends HttpStatusError {
  constructor(status: number, url: string, options?: ErrorOptions) {
    super(`Server error (HTTP ${status}) from ${url}`, status, url, options);
    this.name = "ServerError";
  }
}

// ── Response errors ─────────────────────────────────────────────────────────

/** The body was zero-length or whitespace only. */
export class EmptyResponseError extends SruClientError {
  constructor(message = "Server returned an empty response body") {
    super(message);
    this.name = "EmptyResponseError";
  }
}

const SNIPPET_LENGTH = 200;

/** The body was not a well-formed SRU document. */
export class MalformedResponseError extends SruClientError {
  /** The complete text that failed to parse. */
  public readonly body: string;

  constructor(message: string, body: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "MalformedResponseError";
    this.body = body;
  }

  /** Leading part of the body, for log lines and terminal output. */
  get snippet(): string {
    return this.body.length > SNIPPET_LENGTH
      ? `${this.body.slice(0, SNIPPET_LENGTH)}...`
      : this.body;
  }
}

/** The server reported an SRU diagnostic instead of a result. */
export class ServerDiagnosticError extends SruClientError {
  public readonly uri: string;
  /** Diagnostic number, the last segment of the URI (e.g. `10`). */
  public readonly code: string;
  public readonly diagnosticMessage: string;
  public readonly details: string | undefined;

  constructor(
    uri: string,
    diagnosticMessage: string,
    details?: string,
    options?: ErrorOptions,
  ) {
    const suffix = details ? ` (${details})` : "";
    super(`SRU diagnostic ${uri}: ${diagnosticMessage}${suffix}`, options);
    this.name = "ServerDiagnosticError";
    this.uri = uri;
    this.code = uri.split("/").pop() ?? uri;
    this.diagnosticMessage = diagnosticMessage;
    this.details = details;
  }
}

// ── Message formatting ──────────────────────────────────────────────────────

export interface ErrorMessageExtras {
  suggestion?: string;
  context?: Record<string, unknown>;
}

/**
 * Render a multi-line, human-readable error message:
 *
 *   Invalid Parameter: Value must be positive
 *   Context:
 *     parameter: maximumRecords
 *   Suggestion: Use a value greater than 0
 */
export function formatErrorMessage(
  errorType: string,
  details: string,
  extras: ErrorMessageExtras = {},
): string {
  const parts = [`${errorType}: ${details}`];

  const entries = Object.entries(extras.context ?? {});
  if (entries.length > 0) {
    parts.push("Context:");
    for (const [key, value] of entries) {
      parts.push(`  ${key}: ${formatContextValue(value)}`);
    }
  }

  if (extras.suggestion) {
    parts.push(`Suggestion: ${extras.suggestion}`);
  }

  return parts.join("\n");
}

function formatContextValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === undefined) return "undefined";
  return JSON.stringify(value) ?? String(value);
}
