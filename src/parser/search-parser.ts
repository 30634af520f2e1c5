// ---------------------------------------------------------------------------
// searchRetrieve response parser.
//
// Records are read one at a time behind their own failure boundary: a
// record whose fields cannot be read is still returned with its raw data,
// and never stops the records after it.
// ---------------------------------------------------------------------------

import { RecordPacking } from "../core/types.js";
import type {
  FacetValue,
  Facets,
  HoldingEntry,
  ResponseWarning,
  SearchResponse,
  SearchResult,
} from "../core/types.js";
import type { SearchRequest } from "../request/request-builder.js";
import {
  asNode,
  buildXml,
  child,
  childNodes,
  decodeEntities,
  descendant,
  descendants,
  elementNames,
  text,
} from "../utils/xml.js";
import type { XmlNode, XmlValue } from "../utils/xml.js";
import { RESPONSE_ROOT, openEnvelope, parseBoundary, readCount } from "./envelope.js";
import { getExtractor } from "./extractors/index.js";
import type { RecordExtractor } from "./extractors/index.js";

/** What the parser needs to know about the request that produced a body. */
export type SearchParseContext = Pick<
  SearchRequest,
  "query" | "format" | "recordPacking" | "facets" | "holdings" | "version"
>;

const RECORD_DATA = /<(?:[\w.-]+:)?recordData(?:\s[^>]*?)?(?:\/>|>([\s\S]*?)<\/(?:[\w.-]+:)?recordData\s*>)/g;
const RECORDS_SPAN = /<(?:[\w.-]+:)?records[\s>][\s\S]*?<\/(?:[\w.-]+:)?records\s*>/;
/** Comments and CDATA sections, blanked out before looking for tags. */
const OPAQUE_SECTION = /<!--[\s\S]*?-->|<!\[CDATA\[[\s\S]*?\]\]>/g;
const CDATA = /^<!\[CDATA\[([\s\S]*)\]\]>$/;

/**
 * Parse a searchRetrieve response body.
 *
 * @throws EmptyResponseError | MalformedResponseError | ServerDiagnosticError
 */
export function parseSearchResponse(
  body: string,
  context: SearchParseContext,
): SearchResponse {
  return parseBoundary(body, () => readSearchResponse(body, context));
}

function readSearchResponse(body: string, context: SearchParseContext): SearchResponse {
  const { root } = openEnvelope(body, RESPONSE_ROOT.searchRetrieve);
  const warnings: ResponseWarning[] = [];

  const totalText = text(child(root, "numberOfRecords"));
  const total = readCount(totalText);
  if (total === undefined) {
    warnings.push({
      code: "missing-total",
      message:
        totalText === undefined
          ? "Response does not report numberOfRecords"
          : `Unreadable numberOfRecords "${totalText}"`,
    });
  }
  const totalResults = total ?? null;

  const container = child(root, "records");
  const wrappers = childNodes(container, "record");

  let results: SearchResult[] = [];
  if (totalResults === 0) {
    if (wrappers.length > 0) {
      warnings.push({
        code: "inconsistent-total",
        message: `numberOfRecords is 0 but ${wrappers.length} record(s) were delivered; ignoring them`,
      });
    }
  } else {
    if (totalResults !== null && totalResults > 0 && wrappers.length === 0) {
      warnings.push({
        code: "missing-records-container",
        message: `numberOfRecords is ${totalResults} but the response carries no records`,
      });
    }
    results = readRecords(body, wrappers, context, warnings);
  }

  const next = totalResults === 0 ? undefined : readCount(text(child(root, "nextRecordPosition")));
  const nextRecord = next !== undefined && next > 0 ? next : undefined;

  const response: SearchResponse = {
    totalResults,
    results: Object.freeze(results),
    hasMore:
      nextRecord !== undefined && (totalResults === null || nextRecord <= totalResults),
    query: context.query,
    format: context.format,
    warnings,
  };
  if (nextRecord !== undefined) response.nextRecord = nextRecord;

  if (context.facets.length > 0) {
    const version = text(child(root, "version")) ?? context.version;
    const facets = version.startsWith("2.") ? readFacets(root) : undefined;
    if (facets) {
      response.facets = facets;
    } else {
      warnings.push({
        code: "facets-not-returned",
        message: `Facets ${context.facets.join(", ")} were requested but not returned`,
      });
    }
  }

  response.warnings = Object.freeze(warnings);
  return Object.freeze(response);
}

// ── Records ─────────────────────────────────────────────────────────────────

function readRecords(
  body: string,
  wrappers: readonly XmlNode[],
  context: SearchParseContext,
  warnings: ResponseWarning[],
): SearchResult[] {
  const slices = recordDataSlices(body);
  const extractor = getExtractor(context.format);
  const results: SearchResult[] = [];
  let sliceIndex = 0;

  wrappers.forEach((wrapper, index) => {
    const position = readCount(text(child(wrapper, "recordPosition"))) ?? index + 1;
    const recordData = wrapper["recordData"];
    const slice = recordData === undefined ? undefined : slices[sliceIndex++];

    if (recordData === undefined || isEmpty(recordData)) {
      warnings.push({
        code: "missing-record-data",
        message: `Record at position ${position} has no recordData`,
        position,
      });
      return;
    }

    try {
      results.push(readRecord(recordData, slice, extractor, context, position, warnings));
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      warnings.push({
        code: "record-extraction-failed",
        message: `Record at position ${position} could not be read: ${reason}`,
        position,
      });
      results.push(
        Object.freeze({
          rawData: slice ?? rawFromNode(recordData),
          format: context.format,
          holdings: [],
        }),
      );
    }
  });

  return results;
}

function readRecord(
  recordData: XmlValue,
  slice: string | undefined,
  extractor: RecordExtractor,
  context: SearchParseContext,
  position: number,
  warnings: ResponseWarning[],
): SearchResult {
  if (isStringPacked(recordData, context.recordPacking)) {
    // Escaped payload: unescape into rawData, no field extraction.
    return Object.freeze({
      rawData: unpackString(slice, recordData),
      format: context.format,
      holdings: Object.freeze([]),
    });
  }

  const node = asNode(recordData);
  const { fields, holdings, failures } = extractor.extract(node, {
    holdings: context.holdings,
  });
  for (const failure of failures) {
    warnings.push({
      code: "field-extraction-failed",
      message: `Record at position ${position}: ${failure.field} could not be read (${failure.reason})`,
      position,
    });
  }

  const frozenHoldings: readonly HoldingEntry[] = Object.freeze(holdings);
  return Object.freeze({
    ...fields,
    rawData: slice ?? rawFromNode(node),
    format: context.format,
    holdings: frozenHoldings,
  });
}

/**
 * Inner text of every `recordData` element inside `records`, in document
 * order, sliced from the source so the payload is kept exactly as
 * delivered.  Tags are looked for in a copy with comments and CDATA
 * blanked to the same length, so offsets still point into `body`.
 */
function recordDataSlices(body: string): string[] {
  const masked = body.replace(OPAQUE_SECTION, (section) => " ".repeat(section.length));
  const span = RECORDS_SPAN.exec(masked);
  if (!span) return [];

  return Array.from(span[0].matchAll(RECORD_DATA), (m) => {
    const inner = m[1];
    if (inner === undefined) return "";
    const start = span.index + (m.index ?? 0) + m[0].indexOf(">") + 1;
    return body.slice(start, start + inner.length).trim();
  });
}

function isEmpty(value: XmlValue): boolean {
  if (typeof value === "string") return value.trim() === "";
  if (Array.isArray(value)) return value.length === 0;
  return elementNames(value).length === 0 && text(value) === undefined;
}

/**
 * String packing skips field extraction.  Under XML packing, a recordData
 * with no elements whose text is escaped markup is still a string-packed
 * record; any other text is the record itself.
 */
function isStringPacked(value: XmlValue, packing: RecordPacking): boolean {
  if (packing === RecordPacking.STRING) return true;
  if (elementNames(value).length > 0) return false;
  return text(value)?.startsWith("<") ?? false;
}

function unpackString(slice: string | undefined, value: XmlValue): string {
  if (elementNames(value).length > 0) return slice ?? rawFromNode(value);
  if (slice === undefined) return text(value) ?? "";
  const cdata = CDATA.exec(slice);
  return cdata ? cdata[1] : decodeEntities(slice);
}

function rawFromNode(value: XmlValue): string {
  if (typeof value === "string") return value;
  const node = asNode(value);
  return elementNames(node)
    .map((name) => {
      const element = node[name];
      return element === undefined ? "" : buildXml(name, element);
    })
    .join("\n");
}

// ── Facets ──────────────────────────────────────────────────────────────────

/**
 * SRU 2.0 facets, found at any depth below `facetedResults`:
 *
 *   <facetedResults>
 *     <datasource><facets>
 *       <facet>
 *         <index>pica.ejr</index>
 *         <terms><term><actualTerm>2020</actualTerm><count>12</count></term></terms>
 *       </facet>
 *     </facets></datasource>
 *   </facetedResults>
 *
 * `undefined` when no facet carries a single term.
 */
function readFacets(root: XmlNode): Facets | undefined {
  const container = descendant(root, "facetedResults");
  if (container === undefined) return undefined;

  const facets: Record<string, FacetValue[]> = {};
  let found = false;
  for (const facetValue of descendants(container, "facet")) {
    const facet = asNode(facetValue);
    const field =
      text(descendant(facet, "index")) ?? text(descendant(facet, "facetDisplayLabel"));
    if (field === undefined) continue;

    const values = (facets[field] ??= []);
    for (const termValue of descendants(facet, "term")) {
      const term = asNode(termValue);
      const value =
        text(child(term, "actualTerm")) ??
        text(child(term, "value")) ??
        text(child(term, "displayTerm"));
      if (value === undefined) continue;
      values.push(Object.freeze({ value, count: readCount(text(child(term, "count"))) ?? 0 }));
      found = true;
    }
  }

  if (!found) return undefined;
  for (const field of Object.keys(facets)) Object.freeze(facets[field]);
  return Object.freeze(facets);
}
