// ---------------------------------------------------------------------------
// PICA-XML (PICA+ fields in datafield/subfield form).
//
//   003@$0  - PPN
//   021A$a  - Title ("@" marks the start of the sort form)
//   028A    - Primary author: $a family name, $d given name, $8 display form
//   028C    - Further person (fallback)
//   011@$a  - Year of publication
//   033A$n  - Publisher
//   004A$0  - ISBN
// ---------------------------------------------------------------------------

import {
  extractAllDataFields,
  extractDataField,
  extractSubfieldValues,
} from "../../utils/marc-parser.js";
import { asNode, child } from "../../utils/xml.js";
import type { XmlNode } from "../../utils/xml.js";
import { RecordExtractor } from "./base-extractor.js";
import type { FieldReaders } from "./base-extractor.js";

function person(root: XmlNode, tag: string): string | undefined {
  for (const field of extractAllDataFields(root, tag)) {
    const family = extractSubfieldValues(field, "a")[0];
    const given = extractSubfieldValues(field, "d")[0];
    if (family) return given ? `${family}, ${given}` : family;

    const display = extractSubfieldValues(field, "8")[0];
    if (display) return display;
  }
  return undefined;
}

export class PicaExtractor extends RecordExtractor {
  protected locate(recordData: XmlNode): XmlNode | undefined {
    const record = child(recordData, "record");
    return record === undefined ? undefined : asNode(record);
  }

  protected readonly readers: FieldReaders = {
    recordId: (r) => extractDataField(r, "003@", "0"),
    title: (r) => extractDataField(r, "021A", "a")?.replace("@", ""),
    author: (r) => person(r, "028A") ?? person(r, "028C"),
    year: (r) => extractDataField(r, "011@", "a"),
    publisher: (r) => extractDataField(r, "033A", "n"),
    isbn: (r) => extractDataField(r, "004A", "0") ?? extractDataField(r, "004A", "A"),
  };
}
