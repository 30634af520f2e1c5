// ---------------------------------------------------------------------------
// CQL query construction.  Queries are opaque to this client; these helpers
// only build the few fixed shapes the client itself issues.
// ---------------------------------------------------------------------------

import type { RecordType, RelationType, SearchIndex } from "../core/types.js";

/** K10plus indices used to navigate links between records. */
export const LINK_INDEX = {
  /** PPN of the record the link points from. */
  PPN: "pica.1049",
  /** Relation type (`fam`, `rel-bt`, ...). */
  RELATION: "pica.1045",
  /** Record category (`b` or `n`). */
  RECORD_TYPE: "pica.1001",
} as const;

/**
 * Wrap a term in double quotes, escaping backslashes and embedded quotes.
 * Masking characters (`*`, `?`) keep their meaning inside quotes.
 */
export function quoteTerm(term: string): string {
  return `"${term.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

/** `index="term"` */
export function indexQuery(index: SearchIndex | string, term: string): string {
  return `${index}=${quoteTerm(term)}`;
}

/**
 * Query for the records linked to `ppn` through `relation`, restricted to
 * one record category.
 */
export function relatedQuery(
  ppn: string,
  relation: RelationType,
  recordType: RecordType,
): string {
  return [
    indexQuery(LINK_INDEX.PPN, ppn),
    indexQuery(LINK_INDEX.RELATION, relation),
    indexQuery(LINK_INDEX.RECORD_TYPE, recordType),
  ].join(" and ");
}

/**
 * Bring an ISBN/ISSN into the literal form the target index expects.
 * Input is kept as typed (trimmed) unless `bare` is set, in which case
 * hyphens and whitespace are removed.
 */
export function normalizeIdentifier(raw: string, bare: boolean): string {
  const trimmed = raw.trim();
  return bare ? trimmed.replace(/[\s-]/g, "") : trimmed;
}

/** True when an identifier has nothing left once separators are removed. */
export function isBlankIdentifier(raw: string): boolean {
  return raw.replace(/[\s-]/g, "") === "";
}
