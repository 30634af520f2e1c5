// ---------------------------------------------------------------------------
// RecordExtractor – abstract base class shared by every schema extractor.
// ---------------------------------------------------------------------------

import type { HoldingEntry, RecordFormat } from "../../core/types.js";
import type { XmlNode } from "../../utils/xml.js";

/** Structured fields a record can yield. */
export interface ExtractedFields {
  recordId?: string;
  title?: string;
  author?: string;
  year?: string;
  publisher?: string;
  isbn?: string;
}

export type FieldName = keyof ExtractedFields;

/** One reader per field; a reader returns `undefined` when the field is absent. */
export type FieldReaders = {
  readonly [K in FieldName]?: (root: XmlNode) => string | undefined;
};

export interface FieldFailure {
  field: FieldName | "holdings";
  reason: string;
}

export interface Extraction {
  fields: ExtractedFields;
  holdings: HoldingEntry[];
  failures: FieldFailure[];
}

export interface ExtractOptions {
  holdings: boolean;
}

/**
 * Base class for the per-schema field extractors.  Concrete extractors say
 * where their record element sits inside `recordData` and how to read each
 * field; the base class runs every reader behind its own failure boundary
 * so one unreadable field never costs the others.
 */
export abstract class RecordExtractor {
  public readonly format: RecordFormat;

  constructor(format: RecordFormat) {
    this.format = format;
  }

  // ── Public interface ────────────────────────────────────────────────────

  extract(recordData: XmlNode, options: ExtractOptions): Extraction {
    const root = this.locate(recordData) ?? recordData;
    const fields: ExtractedFields = {};
    const failures: FieldFailure[] = [];

    for (const name of FIELD_NAMES) {
      const read = this.readers[name];
      if (read === undefined) continue;
      try {
        const value = read(root);
        if (value !== undefined && value !== "") fields[name] = value;
      } catch (error: unknown) {
        failures.push({ field: name, reason: describe(error) });
      }
    }

    let holdings: HoldingEntry[] = [];
    if (options.holdings) {
      try {
        holdings = this.readHoldings(root);
      } catch (error: unknown) {
        failures.push({ field: "holdings", reason: describe(error) });
      }
    }

    return { fields, holdings, failures };
  }

  // ── Hooks for subclasses ────────────────────────────────────────────────

  /**
   * Find the schema's record element inside `recordData`.  Returning
   * `undefined` makes the extractor read `recordData` itself.
   */
  protected abstract locate(recordData: XmlNode): XmlNode | undefined;

  protected abstract readonly readers: FieldReaders;

  /** Schemas without an embedded holdings field yield none. */
  protected readHoldings(_root: XmlNode): HoldingEntry[] {
    return [];
  }
}

const FIELD_NAMES: readonly FieldName[] = [
  "recordId",
  "title",
  "author",
  "year",
  "publisher",
  "isbn",
];

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
