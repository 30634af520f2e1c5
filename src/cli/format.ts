// ---------------------------------------------------------------------------
// Plain-text rendering of client responses and errors for the terminal.
// ---------------------------------------------------------------------------

import type {
  CatalogProfile,
  ExplainResponse,
  ResponseWarning,
  ScanResponse,
  SearchResponse,
  SearchResult,
} from "../core/types.js";
import {
  MalformedResponseError,
  RateLimitedError,
  ServerDiagnosticError,
  SruClientError,
  ValidationError,
  formatErrorMessage,
} from "../core/errors.js";

// ── Search ──────────────────────────────────────────────────────────────────

export function formatSearchResponse(response: SearchResponse, startRecord = 1): string[] {
  const lines: string[] = [];
  const total = response.totalResults === null ? "an unknown number of" : String(response.totalResults);
  lines.push(`Found ${total} results for ${response.query}`);

  if (response.results.length > 0) {
    const last = startRecord + response.results.length - 1;
    lines.push(`Showing ${startRecord}-${last}`);
    lines.push("");
    response.results.forEach((result, i) => {
      lines.push(...formatResult(result, startRecord + i));
    });
  }

  if (response.hasMore && response.nextRecord !== undefined) {
    lines.push(`More results available: --start ${response.nextRecord}`);
  }

  if (response.facets) {
    lines.push("Facets:");
    for (const [field, values] of Object.entries(response.facets)) {
      const rendered = values.map((v) => `${v.value} (${v.count})`).join(", ");
      lines.push(`  ${field}: ${rendered}`);
    }
  }

  lines.push(...formatWarnings(response.warnings));
  return lines;
}

function formatResult(result: SearchResult, position: number): string[] {
  const lines = [`${String(position).padStart(3)}. ${result.title ?? "(no title)"}`];
  const indent = "     ";
  if (result.author) lines.push(`${indent}Author: ${result.author}`);

  const imprint = [result.year && `Year: ${result.year}`, result.publisher && `Publisher: ${result.publisher}`]
    .filter((part): part is string => Boolean(part))
    .join(" | ");
  if (imprint) lines.push(`${indent}${imprint}`);

  if (result.isbn) lines.push(`${indent}ISBN: ${result.isbn}`);
  if (result.recordId) lines.push(`${indent}Record ID: ${result.recordId}`);

  if (result.holdings.length > 0) {
    lines.push(`${indent}Holdings: ${result.holdings.length}`);
    for (const holding of result.holdings) {
      const collection = holding.collection ? ` [${holding.collection}]` : "";
      lines.push(`${indent}  - ${holding.libraryName} (${holding.libraryCode})${collection}`);
    }
  }

  lines.push("");
  return lines;
}

// ── Scan ────────────────────────────────────────────────────────────────────

export function formatScanResponse(response: ScanResponse): string[] {
  const lines = [`Index terms for ${response.scanClause}:`];
  if (response.terms.length === 0) {
    lines.push("  (no terms)");
  }
  for (const term of response.terms) {
    const label = term.displayTerm ?? term.value;
    lines.push(`  ${label} (${term.numberOfRecords})`);
  }
  lines.push(...formatWarnings(response.warnings));
  return lines;
}

// ── Explain ─────────────────────────────────────────────────────────────────

export function formatExplainResponse(response: ExplainResponse): string[] {
  const { serverInfo, databaseInfo } = response;
  const port = serverInfo.port === undefined ? "" : `:${serverInfo.port}`;
  const database = serverInfo.database === undefined ? "" : `/${serverInfo.database}`;

  const lines = [
    `Server: ${serverInfo.host}${port}${database}`,
    `Database: ${databaseInfo.title}`,
  ];
  if (databaseInfo.description) lines.push(`Description: ${databaseInfo.description}`);
  if (databaseInfo.contact) lines.push(`Contact: ${databaseInfo.contact}`);

  lines.push("", `Indices (${response.indices.length}):`);
  for (const index of response.indices) {
    lines.push(`  ${index.name.padEnd(20)} ${index.title}`);
  }

  lines.push("", `Record schemas (${response.schemas.length}):`);
  for (const schema of response.schemas) {
    lines.push(`  ${schema.name.padEnd(20)} ${schema.title ?? schema.identifier}`);
  }
  return lines;
}

// ── Profiles ────────────────────────────────────────────────────────────────

export function formatProfiles(profiles: readonly CatalogProfile[], current?: string): string[] {
  const lines = ["Available catalog profiles:", ""];
  for (const profile of profiles) {
    const marker = profile.name === current ? "*" : " ";
    lines.push(`${marker} ${profile.name.padEnd(10)} ${profile.displayName}`);
    lines.push(`  ${"".padEnd(10)} ${profile.url}`);
    if (profile.region) lines.push(`  ${"".padEnd(10)} Region: ${profile.region}`);
  }
  return lines;
}

// ── Warnings & errors ───────────────────────────────────────────────────────

export function formatWarnings(warnings: readonly ResponseWarning[]): string[] {
  if (warnings.length === 0) return [];
  return ["Warnings:", ...warnings.map((w) => `  [${w.code}] ${w.message}`)];
}

const ERROR_LABELS: Readonly<Record<string, string>> = {
  ValidationError: "Invalid Parameter",
  ConfigurationError: "Configuration Error",
  ConnectionError: "Connection Error",
  TimeoutError: "Timeout",
  HttpStatusError: "HTTP Error",
  AccessDeniedError: "Access Denied",
  RateLimitedError: "Rate Limited",
  ServerError: "Server Error",
  EmptyResponseError: "Empty Response",
  MalformedResponseError: "Malformed Response",
  ServerDiagnosticError: "Server Diagnostic",
};

/**
 * Human-readable message for a failure: kind, message, operation context
 * and, where there is one, a suggestion.
 */
export function formatError(error: unknown): string {
  if (!(error instanceof SruClientError)) {
    const msg = error instanceof Error ? error.message : String(error);
    return formatErrorMessage("Unexpected Error", msg);
  }

  const context: Record<string, unknown> = {};
  if (error.context) context["operation"] = error.context.operation;

  let suggestion: string | undefined;
  if (error instanceof RateLimitedError && error.retryAfterMs !== null) {
    suggestion = `Wait ${Math.ceil(error.retryAfterMs / 1000)}s before retrying`;
  } else if (error instanceof ServerDiagnosticError) {
    suggestion = "Check the query syntax and index names (run the explain command)";
  } else if (error instanceof ValidationError && error.issues.length > 1) {
    context["issues"] = error.issues.map((i) => `${i.path}: ${i.message}`);
  }

  if (error instanceof MalformedResponseError) {
    context["response"] = error.snippet;
  }

  return formatErrorMessage(ERROR_LABELS[error.name] ?? "Error", error.message, {
    ...(suggestion !== undefined ? { suggestion } : {}),
    context,
  });
}
