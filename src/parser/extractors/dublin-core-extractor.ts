// ---------------------------------------------------------------------------
// Dublin Core (oai_dc / srw_dc).  ISBNs arrive as dc:identifier values such
// as "ISBN 978-3-16-148410-0" or "urn:isbn:9783161484100".
// ---------------------------------------------------------------------------

import { asNode, child, children, text } from "../../utils/xml.js";
import type { XmlNode } from "../../utils/xml.js";
import { RecordExtractor } from "./base-extractor.js";
import type { FieldReaders } from "./base-extractor.js";

const ISBN_IDENTIFIER = /^(?:urn:isbn:|isbn:?\s*)([0-9Xx][0-9Xx\s-]{8,16})$/i;

function firstText(root: XmlNode, name: string): string | undefined {
  for (const value of children(root, name)) {
    const found = text(value);
    if (found !== undefined) return found;
  }
  return undefined;
}

function isbnIdentifier(root: XmlNode): string | undefined {
  for (const value of children(root, "identifier")) {
    const match = ISBN_IDENTIFIER.exec(text(value) ?? "");
    if (match) return match[1].trim();
  }
  return undefined;
}

export class DublinCoreExtractor extends RecordExtractor {
  protected locate(recordData: XmlNode): XmlNode | undefined {
    const dc = child(recordData, "dc");
    return dc === undefined ? undefined : asNode(dc);
  }

  protected readonly readers: FieldReaders = {
    title: (r) => firstText(r, "title"),
    author: (r) => firstText(r, "creator"),
    year: (r) => firstText(r, "date"),
    publisher: (r) => firstText(r, "publisher"),
    isbn: isbnIdentifier,
  };
}
