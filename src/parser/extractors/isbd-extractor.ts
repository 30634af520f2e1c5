// ---------------------------------------------------------------------------
// ISBD: a display-oriented record whose areas are separated by ". - ".
//
//   Title : subtitle / Statement of responsibility. - Edition. -
//   Place : Publisher, Year. - Extent. - ISBN 978-…
//
// Fields are read from the punctuation, so any of them may be missing.
// ---------------------------------------------------------------------------

import { deepText } from "../../utils/xml.js";
import type { XmlNode } from "../../utils/xml.js";
import { RecordExtractor } from "./base-extractor.js";
import type { FieldReaders } from "./base-extractor.js";

const AREA_SEPARATOR = ". - ";
const PUBLICATION_AREA = /:\s*([^,:;]+?),\s*(?:\[?c?)(\d{4})/;
const ISBN = /ISBN[:\s]+([0-9Xx-]{10,17})/;

function areas(root: XmlNode): string[] {
  const content = deepText(root);
  return content ? content.split(AREA_SEPARATOR).map((a) => a.trim()) : [];
}

function titleArea(root: XmlNode): string | undefined {
  return areas(root)[0];
}

function publication(root: XmlNode): RegExpExecArray | undefined {
  for (const area of areas(root).slice(1)) {
    const match = PUBLICATION_AREA.exec(area);
    if (match) return match;
  }
  return undefined;
}

export class IsbdExtractor extends RecordExtractor {
  /** The whole of recordData is the ISBD text. */
  protected locate(): XmlNode | undefined {
    return undefined;
  }

  protected readonly readers: FieldReaders = {
    title: (r) => titleArea(r)?.split(" / ")[0].split(" : ")[0].trim(),
    author: (r) => {
      const responsibility = titleArea(r)?.split(" / ")[1];
      return responsibility?.split(" ; ")[0].replace(/\.$/, "").trim();
    },
    publisher: (r) => publication(r)?.[1].trim(),
    year: (r) => publication(r)?.[2],
    isbn: (r) => ISBN.exec(deepText(r) ?? "")?.[1],
  };
}
