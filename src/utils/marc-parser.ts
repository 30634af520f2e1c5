// ---------------------------------------------------------------------------
// MARC XML parsing utilities for fast-xml-parser output.
//
// fast-xml-parser can return either a single object or an array for repeated
// XML elements.  Every helper in this module handles both cases transparently.
//
// Expected parsed structure (with ignoreAttributes: false):
//   record.datafield  -> array | single object, each with @_tag, subfield(s)
//   record.controlfield -> array | single object, each with @_tag, #text
//   subfield -> array | single object, each with @_code, #text
//
// PICA-XML uses the same datafield/subfield layout (tags such as "021A",
// subfield codes such as "0"), so these helpers serve both schemas.
// ---------------------------------------------------------------------------

import { attr, childNodes, text } from "./xml.js";
import type { XmlNode, XmlValue } from "./xml.js";

/** A `[tag, subfieldCode]` pair, e.g. `["245", "a"]`. */
export type FieldPath = readonly [tag: string, code: string];

// ── Data-field helpers ────────────────────────────────────────────────────

/**
 * Return *all* data-field nodes for the given tag, in document order.
 */
export function extractAllDataFields(
  record: XmlValue | undefined,
  tag: string,
): XmlNode[] {
  return childNodes(record, "datafield").filter((f) => attr(f, "tag") === tag);
}

/**
 * Extract the text of the first `subfield` with the given code across all
 * data fields carrying `tag`.
 *
 * @returns  The subfield text, or `undefined` if not found.
 */
export function extractDataField(
  record: XmlValue | undefined,
  tag: string,
  subfield: string,
): string | undefined {
  for (const field of extractAllDataFields(record, tag)) {
    const value = extractSubfieldValues(field, subfield)[0];
    if (value !== undefined) return value;
  }
  return undefined;
}

/**
 * Try each `[tag, code]` pair in turn and return the first value found.
 * Used for fallbacks such as 264$c before 260$c.
 */
export function extractFirstOf(
  record: XmlValue | undefined,
  paths: readonly FieldPath[],
): string | undefined {
  for (const [tag, code] of paths) {
    const value = extractDataField(record, tag, code);
    if (value !== undefined) return value;
  }
  return undefined;
}

// ── Control-field helpers ─────────────────────────────────────────────────

/**
 * Extract the text of a MARC control field (001–009).
 */
export function extractControlField(
  record: XmlValue | undefined,
  tag: string,
): string | undefined {
  const field = childNodes(record, "controlfield").find(
    (cf) => attr(cf, "tag") === tag,
  );
  return text(field);
}

// ── Subfield extraction helpers ───────────────────────────────────────────

/**
 * Given a single data-field node, return all non-blank subfield values that
 * match the given code.
 */
export function extractSubfieldValues(datafield: XmlNode, code: string): string[] {
  const results: string[] = [];
  for (const sub of childNodes(datafield, "subfield")) {
    if (attr(sub, "code") !== code) continue;
    const value = text(sub);
    if (value !== undefined) results.push(value);
  }
  return results;
}
