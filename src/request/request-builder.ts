// ---------------------------------------------------------------------------
// Request builder – turns operation parameters into fully qualified SRU
// request URLs.  Pure: no I/O, no logging.  Every rejection is raised here,
// before the transport is touched.
// ---------------------------------------------------------------------------

import { z } from "zod";

import {
  RecordFormat,
  RecordPacking,
  RecordType,
  RelationType,
  SearchIndex,
  SortBy,
  SortOrder,
  SruOperation,
  SruVersion,
} from "../core/types.js";
import type {
  Endpoint,
  EndpointCapabilities,
  IdentifierSearchOptions,
  RelatedSearchOptions,
  ResponseWarning,
  ScanOptions,
  SearchOptions,
} from "../core/types.js";
import { ValidationError } from "../core/errors.js";
import {
  indexQuery,
  isBlankIdentifier,
  normalizeIdentifier,
  relatedQuery,
} from "./cql.js";

// ── Request descriptors ─────────────────────────────────────────────────────

export interface SruRequest {
  operation: SruOperation;
  version: SruVersion;
  /** Complete GET URL. */
  url: string;
  params: Readonly<Record<string, string>>;
  /** Non-fatal notes about the request (oversized page, dropped facets). */
  advisories: readonly ResponseWarning[];
}

export interface SearchRequest extends SruRequest {
  operation: typeof SruOperation.SEARCH_RETRIEVE;
  /** CQL query as sent. */
  query: string;
  format: RecordFormat;
  recordPacking: RecordPacking;
  /** Facet fields actually sent; empty when none or when dropped. */
  facets: readonly string[];
  holdings: boolean;
}

export interface ScanRequest extends SruRequest {
  operation: typeof SruOperation.SCAN;
  scanClause: string;
  responsePosition: number;
  maximumTerms: number;
}

export interface ExplainRequest extends SruRequest {
  operation: typeof SruOperation.EXPLAIN;
}

export interface BuilderSettings {
  /** Page sizes above this produce an `oversized-request` advisory. */
  maxRecordsWarningThreshold: number;
}

export const DEFAULT_BUILDER_SETTINGS: BuilderSettings = {
  maxRecordsWarningThreshold: 100,
};

export const DEFAULT_CAPABILITIES: EndpointCapabilities = {
  sru2: true,
  bareIdentifiers: false,
};

// ── Zod schemas ─────────────────────────────────────────────────────────────

const nonBlank = (what: string) =>
  z.string({ required_error: `${what} is required` }).refine(
    (value) => value.trim() !== "",
    { message: `${what} must not be empty` },
  );

const SearchOptionsSchema = z.object({
  index: z.nativeEnum(SearchIndex).nullable().default(SearchIndex.TITLE),
  format: z.nativeEnum(RecordFormat).default(RecordFormat.MARCXML),
  maximumRecords: z.number().int().positive().default(10),
  startRecord: z.number().int().min(1).default(1),
  sortBy: z.nativeEnum(SortBy).optional(),
  sortOrder: z.nativeEnum(SortOrder).optional(),
  facets: z.array(nonBlank("Facet field")).default([]),
  facetLimit: z.number().int().positive().default(10),
  recordPacking: z.nativeEnum(RecordPacking).default(RecordPacking.XML),
  holdings: z.boolean().default(true),
});

type ResolvedSearchOptions = z.output<typeof SearchOptionsSchema>;

const RelatedOptionsSchema = SearchOptionsSchema.omit({
  index: true,
  facets: true,
  facetLimit: true,
}).extend({
  recordType: z.nativeEnum(RecordType).default(RecordType.BIBLIOGRAPHIC),
});

const ScanOptionsSchema = z.object({
  responsePosition: z.number().int().min(1).default(1),
  maximumTerms: z.number().int().positive().default(20),
});

const CapabilitiesSchema = z.object({
  sru2: z.boolean().default(DEFAULT_CAPABILITIES.sru2),
  bareIdentifiers: z.boolean().default(DEFAULT_CAPABILITIES.bareIdentifiers),
});

/**
 * Run a zod schema and convert a failure into a {@link ValidationError}
 * naming the offending parameter.
 */
function validate<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  what: string,
): z.output<S> {
  const result = schema.safeParse(input);
  if (result.success) return result.data;

  const issues = result.error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
  const first = issues[0];
  const where = first?.path ? ` (${first.path})` : "";
  throw new ValidationError(
    `Invalid ${what}${where}: ${first?.message ?? "rejected"}`,
    issues,
    { cause: result.error },
  );
}

// ── Endpoint ────────────────────────────────────────────────────────────────

/**
 * Validate a base URL and fill in capability defaults.  Unknown
 * capabilities are assumed present: SRU 2.0 is attempted unless the
 * endpoint is known not to support it.
 */
export function resolveEndpoint(
  baseUrl: string,
  capabilities: Partial<EndpointCapabilities> = {},
): Endpoint {
  let parsed: URL;
  try {
    parsed = new URL(baseUrl);
  } catch (err: unknown) {
    throw new ValidationError(`Malformed endpoint URL: ${baseUrl}`, [
      { path: "baseUrl", message: "not a valid URL" },
    ], { cause: err });
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ValidationError(
      `Endpoint URL must use http or https: ${baseUrl}`,
      [{ path: "baseUrl", message: `unsupported protocol ${parsed.protocol}` }],
    );
  }

  return {
    baseUrl: baseUrl.replace(/\/+$/, ""),
    capabilities: validate(CapabilitiesSchema, capabilities, "endpoint capabilities"),
  };
}

// ── Version selection ───────────────────────────────────────────────────────

/**
 * SRU version for a request: 2.0 only when facets are wanted and the
 * endpoint supports it, 1.1 otherwise.
 */
export function selectVersion(
  wantsFacets: boolean,
  capabilities: EndpointCapabilities,
): SruVersion {
  return wantsFacets && capabilities.sru2 ? SruVersion.V2_0 : SruVersion.V1_1;
}

// ── Search ──────────────────────────────────────────────────────────────────

/**
 * Build a searchRetrieve request.
 *
 * With an index the query is searched as a quoted term in that index;
 * with `index: null` it is sent verbatim as a CQL expression.  `sortOrder`
 * defaults to descending whenever `sortBy` is given (newest first for year
 * sorts).
 */
export function buildSearchRequest(
  endpoint: Endpoint,
  query: string,
  options: SearchOptions = {},
  settings: BuilderSettings = DEFAULT_BUILDER_SETTINGS,
): SearchRequest {
  validate(nonBlank("Query"), query, "query");
  const resolved = validate(SearchOptionsSchema, options, "search options");
  const cql = resolved.index === null ? query : indexQuery(resolved.index, query);
  return assembleSearch(endpoint, cql, resolved, settings);
}

/**
 * Build a search for one ISBN or ISSN in its dedicated index.
 */
export function buildIdentifierSearchRequest(
  endpoint: Endpoint,
  kind: "isbn" | "issn",
  identifier: string,
  options: IdentifierSearchOptions = {},
  settings: BuilderSettings = DEFAULT_BUILDER_SETTINGS,
): SearchRequest {
  const label = kind.toUpperCase();
  validate(nonBlank(label), identifier, label);
  if (isBlankIdentifier(identifier)) {
    throw new ValidationError(
      `Invalid ${label}: "${identifier}" contains only separators`,
      [{ path: kind, message: "contains only separators" }],
    );
  }

  const index = kind === "isbn" ? SearchIndex.ISBN : SearchIndex.ISSN;
  const literal = normalizeIdentifier(
    identifier,
    endpoint.capabilities.bareIdentifiers,
  );
  const resolved = validate(
    SearchOptionsSchema,
    { ...options, index },
    "search options",
  );
  return assembleSearch(endpoint, indexQuery(index, literal), resolved, settings);
}

/**
 * Build a search for records linked to `ppn` (volumes of a multi-part
 * work, its parent, its family, ...).
 */
export function buildRelatedSearchRequest(
  endpoint: Endpoint,
  ppn: string,
  relationType: RelationType,
  options: RelatedSearchOptions = {},
  settings: BuilderSettings = DEFAULT_BUILDER_SETTINGS,
): SearchRequest {
  validate(nonBlank("PPN"), ppn, "PPN");
  const relation = validate(z.nativeEnum(RelationType), relationType, "relation type");
  const { recordType, ...rest } = validate(
    RelatedOptionsSchema,
    options,
    "related search options",
  );

  const cql = relatedQuery(ppn.trim(), relation, recordType);
  return assembleSearch(
    endpoint,
    cql,
    { ...rest, index: null, facets: [], facetLimit: 10 },
    settings,
  );
}

function assembleSearch(
  endpoint: Endpoint,
  cql: string,
  options: ResolvedSearchOptions,
  settings: BuilderSettings,
): SearchRequest {
  const advisories: ResponseWarning[] = [];

  if (options.maximumRecords > settings.maxRecordsWarningThreshold) {
    advisories.push({
      code: "oversized-request",
      message:
        `maximumRecords=${options.maximumRecords} exceeds ` +
        `${settings.maxRecordsWarningThreshold}; large pages may be throttled by the server`,
    });
  }

  const wantsFacets = options.facets.length > 0;
  const version = selectVersion(wantsFacets, endpoint.capabilities);
  const facets = version === SruVersion.V2_0 ? options.facets : [];
  if (wantsFacets && facets.length === 0) {
    advisories.push({
      code: "facets-unsupported",
      message: `Endpoint does not support SRU 2.0; facets ${options.facets.join(", ")} were not requested`,
    });
  }

  const params: Record<string, string> = {
    version,
    operation: SruOperation.SEARCH_RETRIEVE,
    query: cql,
    recordSchema: options.format,
    startRecord: String(options.startRecord),
    maximumRecords: String(options.maximumRecords),
  };

  // SRU 2.0 renamed the string/xml switch; "recordPacking" there means
  // packed/unpacked and is left at its default.
  if (version === SruVersion.V2_0) {
    params["recordXMLEscaping"] = options.recordPacking;
  } else {
    params["recordPacking"] = options.recordPacking;
  }

  if (options.sortBy) {
    const order = options.sortOrder ?? SortOrder.DESCENDING;
    // sortKeys: <key>,,<ascending flag>  (1 = ascending, 0 = descending)
    params["sortKeys"] = `${options.sortBy},,${order === SortOrder.ASCENDING ? "1" : "0"}`;
  }

  if (facets.length > 0) {
    params["facets"] = facets.join(",");
    params["facetLimit"] = String(options.facetLimit);
  }

  return {
    operation: SruOperation.SEARCH_RETRIEVE,
    version,
    url: toUrl(endpoint, params),
    params,
    advisories,
    query: cql,
    format: options.format,
    recordPacking: options.recordPacking,
    facets,
    holdings: options.holdings,
  };
}

// ── Scan ────────────────────────────────────────────────────────────────────

/**
 * Build a scan request.  The clause (`index=value`) is not inspected;
 * a bad clause comes back as a server diagnostic.
 */
export function buildScanRequest(
  endpoint: Endpoint,
  scanClause: string,
  options: ScanOptions = {},
): ScanRequest {
  validate(nonBlank("Scan clause"), scanClause, "scan clause");
  const { responsePosition, maximumTerms } = validate(
    ScanOptionsSchema,
    options,
    "scan options",
  );

  const params: Record<string, string> = {
    version: SruVersion.V1_1,
    operation: SruOperation.SCAN,
    scanClause,
    responsePosition: String(responsePosition),
    maximumTerms: String(maximumTerms),
  };

  return {
    operation: SruOperation.SCAN,
    version: SruVersion.V1_1,
    url: toUrl(endpoint, params),
    params,
    advisories: [],
    scanClause,
    responsePosition,
    maximumTerms,
  };
}

// ── Explain ─────────────────────────────────────────────────────────────────

export function buildExplainRequest(endpoint: Endpoint): ExplainRequest {
  const params: Record<string, string> = {
    version: SruVersion.V1_1,
    operation: SruOperation.EXPLAIN,
  };
  return {
    operation: SruOperation.EXPLAIN,
    version: SruVersion.V1_1,
    url: toUrl(endpoint, params),
    params,
    advisories: [],
  };
}

// ── Helpers ─────────────────────────────────────────────────────────────────

function toUrl(endpoint: Endpoint, params: Record<string, string>): string {
  const url = new URL(endpoint.baseUrl);
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, value);
  }
  return url.toString();
}
