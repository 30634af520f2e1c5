// ---------------------------------------------------------------------------
// scan response parser.
//
//   <scanResponse>
//     <terms>
//       <term>
//         <value>goethe</value>
//         <numberOfRecords>1234</numberOfRecords>
//         <displayTerm>Goethe</displayTerm>
//         <extraTermData>…</extraTermData>
//       </term>
//     </terms>
//   </scanResponse>
// ---------------------------------------------------------------------------

import type { ResponseWarning, ScanResponse, ScanTerm } from "../core/types.js";
import type { ScanRequest } from "../request/request-builder.js";
import { buildXml, child, childNodes, elementNames, text } from "../utils/xml.js";
import type { XmlValue } from "../utils/xml.js";
import { RESPONSE_ROOT, openEnvelope, parseBoundary, readCount } from "./envelope.js";

export type ScanParseContext = Pick<ScanRequest, "scanClause" | "responsePosition">;

/**
 * Parse a scan response body.  Terms without a value are skipped with an
 * `invalid-term` warning; order is kept as delivered.
 */
export function parseScanResponse(body: string, context: ScanParseContext): ScanResponse {
  return parseBoundary(body, () => {
    const { root } = openEnvelope(body, RESPONSE_ROOT.scan);
    const warnings: ResponseWarning[] = [];
    const terms: ScanTerm[] = [];

    childNodes(child(root, "terms"), "term").forEach((term, index) => {
      const value = text(child(term, "value"));
      if (value === undefined) {
        warnings.push({
          code: "invalid-term",
          message: `Term at position ${index + 1} has no value`,
          position: index + 1,
        });
        return;
      }

      const entry: ScanTerm = {
        value,
        numberOfRecords: readCount(text(child(term, "numberOfRecords"))) ?? 0,
      };
      const displayTerm = text(child(term, "displayTerm"));
      if (displayTerm !== undefined) entry.displayTerm = displayTerm;
      const extraData = extraTermData(child(term, "extraTermData"));
      if (extraData !== undefined) entry.extraData = extraData;

      terms.push(Object.freeze(entry));
    });

    return Object.freeze({
      terms: Object.freeze(terms),
      scanClause: context.scanClause,
      responsePosition: context.responsePosition,
      warnings: Object.freeze(warnings),
    });
  });
}

/** Opaque extra data: its text, or its child elements serialised. */
function extraTermData(value: XmlValue | undefined): string | undefined {
  if (value === undefined) return undefined;
  const names = elementNames(value);
  if (names.length === 0) return text(value);

  const serialised = names
    .map((name) => {
      const nested = typeof value === "object" && !Array.isArray(value) ? value[name] : undefined;
      return nested === undefined ? "" : buildXml(name, nested);
    })
    .join("\n");
  return serialised === "" ? undefined : serialised;
}
