// ---------------------------------------------------------------------------
// sru-catalog-client – public entry point.
// ---------------------------------------------------------------------------

export { SruClient, withClient } from "./client/sru-client.js";
export type { SruClientOptions } from "./client/sru-client.js";

export * from "./core/types.js";
export * from "./core/errors.js";

export {
  buildExplainRequest,
  buildIdentifierSearchRequest,
  buildRelatedSearchRequest,
  buildScanRequest,
  buildSearchRequest,
  resolveEndpoint,
  selectVersion,
} from "./request/request-builder.js";
export type {
  BuilderSettings,
  ExplainRequest,
  ScanRequest,
  SearchRequest,
  SruRequest,
} from "./request/request-builder.js";
export { indexQuery, quoteTerm, relatedQuery } from "./request/cql.js";

export {
  parseExplainResponse,
  parseScanResponse,
  parseSearchResponse,
} from "./parser/index.js";
export type { ScanParseContext, SearchParseContext } from "./parser/index.js";

export { loadConfig } from "./config/config.js";
export {
  DEFAULT_PROFILE,
  getProfile,
  listProfiles,
  loadProfiles,
} from "./config/profiles.js";
export { createLogger } from "./logging/logger.js";
export type { Logger } from "./logging/logger.js";
