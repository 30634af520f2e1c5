// ---------------------------------------------------------------------------
// TurboMARC: MARC with tags and codes moved into element names.
//
//   <r><c001>…</c001><d245 i1="1" i2="0"><sa>Title</sa></d245></r>
//
// Same field mapping as MARCXML: c001, d245/sa, d100/sa (d700/sa),
// d264/sc (d260/sc), d264/sb (d260/sb), d020/sa, d924 holdings.
// ---------------------------------------------------------------------------

import { RecordFormat } from "../../core/types.js";
import type { HoldingEntry } from "../../core/types.js";
import { asNode, child, childNodes, children, text } from "../../utils/xml.js";
import type { XmlNode } from "../../utils/xml.js";
import { buildHoldings } from "../holdings.js";
import { RecordExtractor } from "./base-extractor.js";
import type { FieldReaders } from "./base-extractor.js";

/** Non-blank values of subfield `code` in a TurboMARC data field. */
function subfieldValues(field: XmlNode, code: string): string[] {
  return children(field, `s${code}`)
    .map((value) => text(value))
    .filter((value): value is string => value !== undefined);
}

function dataField(root: XmlNode, tag: string, code: string): string | undefined {
  for (const field of childNodes(root, `d${tag}`)) {
    const value = subfieldValues(field, code)[0];
    if (value !== undefined) return value;
  }
  return undefined;
}

export class TurboMarcExtractor extends RecordExtractor {
  constructor() {
    super(RecordFormat.TURBOMARC);
  }

  protected locate(recordData: XmlNode): XmlNode | undefined {
    const record = child(recordData, "r");
    return record === undefined ? undefined : asNode(record);
  }

  protected readonly readers: FieldReaders = {
    recordId: (r) => text(child(r, "c001")),
    title: (r) => dataField(r, "245", "a"),
    author: (r) => dataField(r, "100", "a") ?? dataField(r, "700", "a"),
    year: (r) => dataField(r, "264", "c") ?? dataField(r, "260", "c"),
    publisher: (r) => dataField(r, "264", "b") ?? dataField(r, "260", "b"),
    isbn: (r) => dataField(r, "020", "a"),
  };

  protected readHoldings(root: XmlNode): HoldingEntry[] {
    return buildHoldings(
      childNodes(root, "d924").map((field) => ({
        values: (code: string) => subfieldValues(field, code),
      })),
    );
  }
}
