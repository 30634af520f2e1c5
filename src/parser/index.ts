export { parseSearchResponse } from "./search-parser.js";
export type { SearchParseContext } from "./search-parser.js";
export { parseScanResponse } from "./scan-parser.js";
export type { ScanParseContext } from "./scan-parser.js";
export { parseExplainResponse } from "./explain-parser.js";
export { resolveLibraryName } from "./holdings.js";
export { getExtractor, RecordExtractor } from "./extractors/index.js";
