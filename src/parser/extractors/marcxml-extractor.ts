// ---------------------------------------------------------------------------
// MARCXML (MARC 21 slim) and its legacy variant.
//
//   001    - Record control number
//   245$a  - Title
//   100$a  - Main entry, personal name (700$a as fallback)
//   264$c  - Date of publication (260$c as fallback)
//   264$b  - Publisher (260$b as fallback)
//   020$a  - ISBN
//   924    - Local holdings
// ---------------------------------------------------------------------------

import type { HoldingEntry } from "../../core/types.js";
import {
  extractAllDataFields,
  extractControlField,
  extractDataField,
  extractFirstOf,
  extractSubfieldValues,
} from "../../utils/marc-parser.js";
import { asNode, child, path } from "../../utils/xml.js";
import type { XmlNode } from "../../utils/xml.js";
import { buildHoldings } from "../holdings.js";
import { RecordExtractor } from "./base-extractor.js";
import type { FieldReaders } from "./base-extractor.js";

export class MarcXmlExtractor extends RecordExtractor {
  protected locate(recordData: XmlNode): XmlNode | undefined {
    const record =
      child(recordData, "record") ?? path(recordData, "collection", "record");
    return record === undefined ? undefined : asNode(record);
  }

  protected readonly readers: FieldReaders = {
    recordId: (r) => extractControlField(r, "001"),
    title: (r) => extractDataField(r, "245", "a"),
    author: (r) => extractFirstOf(r, [["100", "a"], ["700", "a"]]),
    year: (r) => extractFirstOf(r, [["264", "c"], ["260", "c"]]),
    publisher: (r) => extractFirstOf(r, [["264", "b"], ["260", "b"]]),
    isbn: (r) => extractDataField(r, "020", "a"),
  };

  protected readHoldings(root: XmlNode): HoldingEntry[] {
    return buildHoldings(
      extractAllDataFields(root, "924").map((field) => ({
        values: (code: string) => extractSubfieldValues(field, code),
      })),
    );
  }
}
