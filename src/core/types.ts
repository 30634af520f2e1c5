// ---------------------------------------------------------------------------
// Core types for the SRU catalog client.
// All other modules import from this file.
// ---------------------------------------------------------------------------

// ── Enums ───────────────────────────────────────────────────────────────────

/** Record schemas a catalog can be asked to return (`recordSchema`). */
export const RecordFormat = {
  MARCXML: "marcxml",
  MARCXML_LEGACY: "marcxml-legacy",
  MODS: "mods",
  MODS36: "mods36",
  PICA: "picaxml",
  DUBLIN_CORE: "dc",
  ISBD: "isbd",
  TURBOMARC: "turbomarc",
  MADS: "mads",
} as const;
export type RecordFormat = (typeof RecordFormat)[keyof typeof RecordFormat];

/** CQL indices understood by PICA-based union catalogs. */
export const SearchIndex = {
  TITLE: "pica.tit",
  AUTHOR: "pica.per",
  SUBJECT: "pica.sub",
  ISBN: "pica.isb",
  ISSN: "pica.iss",
  PUBLISHER: "pica.vlg",
  YEAR: "pica.ejr",
  ALL: "pica.all",
  KEYWORD: "pica.woe",
} as const;
export type SearchIndex = (typeof SearchIndex)[keyof typeof SearchIndex];

export const SortBy = {
  RELEVANCE: "relevance",
  YEAR: "year",
  AUTHOR: "author",
  TITLE: "title",
} as const;
export type SortBy = (typeof SortBy)[keyof typeof SortBy];

export const SortOrder = {
  ASCENDING: "ascending",
  DESCENDING: "descending",
} as const;
export type SortOrder = (typeof SortOrder)[keyof typeof SortOrder];

/** Link types between records of a multi-part work (`pica.1045`). */
export const RelationType = {
  FAMILY: "fam",
  PARENT: "rel-bt",
  CHILD: "rel-nt",
  RELATED: "rel-rt",
  THESAURUS: "rel-tt",
} as const;
export type RelationType = (typeof RelationType)[keyof typeof RelationType];

/** Record categories (`pica.1001`). */
export const RecordType = {
  BIBLIOGRAPHIC: "b",
  AUTHORITY: "n",
} as const;
export type RecordType = (typeof RecordType)[keyof typeof RecordType];

export const RecordPacking = {
  XML: "xml",
  STRING: "string",
} as const;
export type RecordPacking = (typeof RecordPacking)[keyof typeof RecordPacking];

export const SruVersion = {
  V1_1: "1.1",
  V2_0: "2.0",
} as const;
export type SruVersion = (typeof SruVersion)[keyof typeof SruVersion];

export const SruOperation = {
  SEARCH_RETRIEVE: "searchRetrieve",
  SCAN: "scan",
  EXPLAIN: "explain",
} as const;
export type SruOperation = (typeof SruOperation)[keyof typeof SruOperation];

/** Public operations of the client, used to label errors and log lines. */
export type OperationKind =
  | "search"
  | "searchByIsbn"
  | "searchByIssn"
  | "searchRelated"
  | "scan"
  | "explain";

// ── Endpoint ────────────────────────────────────────────────────────────────

export interface EndpointCapabilities {
  /** Endpoint accepts SRU 2.0 requests (required for facets). */
  sru2: boolean;
  /** ISBN/ISSN indices only match bare identifiers without separators. */
  bareIdentifiers: boolean;
}

export interface Endpoint {
  baseUrl: string;
  capabilities: EndpointCapabilities;
}

export interface CatalogProfile {
  name: string;
  url: string;
  displayName: string;
  description: string;
  region: string;
  capabilities: EndpointCapabilities;
}

// ── Warnings ────────────────────────────────────────────────────────────────

export type WarningCode =
  | "oversized-request"
  | "facets-unsupported"
  | "missing-total"
  | "missing-records-container"
  | "inconsistent-total"
  | "missing-record-data"
  | "record-extraction-failed"
  | "field-extraction-failed"
  | "facets-not-returned"
  | "invalid-term";

/**
 * A non-fatal problem noticed while building a request or reading a
 * response.  The operation still returns whatever could be produced.
 */
export interface ResponseWarning {
  code: WarningCode;
  message: string;
  /** 1-based position of the record or term the warning concerns. */
  position?: number;
}

// ── Search results ──────────────────────────────────────────────────────────

export interface HoldingEntry {
  /** ISIL of the holding library (924$b). */
  libraryCode: string;
  libraryName: string;
  collection?: string;
  accessUrl?: string;
  accessNote?: string;
}

export interface SearchResult {
  recordId?: string;
  title?: string;
  author?: string;
  year?: string;
  publisher?: string;
  isbn?: string;
  /** The record payload exactly as the server delivered it. */
  rawData: string;
  format: RecordFormat;
  holdings: readonly HoldingEntry[];
}

export interface FacetValue {
  value: string;
  count: number;
}

export type Facets = Readonly<Record<string, readonly FacetValue[]>>;

export interface SearchResponse {
  /** `null` when the server did not report a count. */
  totalResults: number | null;
  results: readonly SearchResult[];
  nextRecord?: number;
  hasMore: boolean;
  /** CQL query that was sent. */
  query: string;
  format: RecordFormat;
  facets?: Facets;
  warnings: readonly ResponseWarning[];
}

// ── Scan ────────────────────────────────────────────────────────────────────

export interface ScanTerm {
  value: string;
  numberOfRecords: number;
  displayTerm?: string;
  extraData?: string;
}

export interface ScanResponse {
  terms: readonly ScanTerm[];
  scanClause: string;
  responsePosition: number;
  warnings: readonly ResponseWarning[];
}

// ── Explain ─────────────────────────────────────────────────────────────────

export interface ServerInfo {
  host: string;
  port?: number;
  database?: string;
}

export interface DatabaseInfo {
  title: string;
  description?: string;
  contact?: string;
}

export interface IndexInfo {
  title: string;
  /** CQL index key, e.g. `pica.tit`. */
  name: string;
  description?: string;
}

export interface SchemaInfo {
  identifier: string;
  name: string;
  title?: string;
}

export interface ExplainResponse {
  serverInfo: ServerInfo;
  databaseInfo: DatabaseInfo;
  indices: readonly IndexInfo[];
  schemas: readonly SchemaInfo[];
  warnings: readonly ResponseWarning[];
}

// ── Request parameters ──────────────────────────────────────────────────────

export interface SearchOptions {
  /**
   * Index the query is searched in.  `null` sends the query verbatim as a
   * complete CQL expression.  Defaults to {@link SearchIndex.TITLE}.
   */
  index?: SearchIndex | null;
  format?: RecordFormat;
  maximumRecords?: number;
  startRecord?: number;
  sortBy?: SortBy;
  /** Defaults to descending whenever `sortBy` is set. */
  sortOrder?: SortOrder;
  facets?: readonly string[];
  facetLimit?: number;
  recordPacking?: RecordPacking;
  /** Extract 924 holdings into each result (default `true`). */
  holdings?: boolean;
}

export type IdentifierSearchOptions = Pick<
  SearchOptions,
  "format" | "maximumRecords" | "startRecord" | "recordPacking" | "holdings"
>;

export interface RelatedSearchOptions
  extends Omit<SearchOptions, "index" | "facets" | "facetLimit"> {
  recordType?: RecordType;
}

export interface ScanOptions {
  responsePosition?: number;
  maximumTerms?: number;
}

// ── Config types ────────────────────────────────────────────────────────────

export interface ClientConfig {
  profile: string;
  baseUrl?: string;
  timeoutMs: number;
  maxRecordsWarningThreshold: number;
  /** Requests per second; `undefined` disables client-side throttling. */
  rateLimit?: number;
  userAgent: string;
  apiKey?: string;
  logging: LoggingConfig;
}

export interface LoggingConfig {
  level: string;
  prettyPrint: boolean;
  redactSecrets: boolean;
}
