// ---------------------------------------------------------------------------
// MODS (3.x, including 3.6).
// ---------------------------------------------------------------------------

import { asNode, attr, child, childNodes, path, text } from "../../utils/xml.js";
import type { XmlNode } from "../../utils/xml.js";
import { RecordExtractor } from "./base-extractor.js";
import type { FieldReaders } from "./base-extractor.js";

/** First personal name, as "Family, Given" when the parts are typed. */
function personalName(root: XmlNode): string | undefined {
  const name = childNodes(root, "name").find((n) => attr(n, "type") === "personal");
  if (!name) return undefined;

  const parts = childNodes(name, "namePart");
  const family = text(parts.find((p) => attr(p, "type") === "family"));
  const given = text(parts.find((p) => attr(p, "type") === "given"));
  if (family) return given ? `${family}, ${given}` : family;

  const untyped = parts.find((p) => attr(p, "type") === undefined) ?? parts[0];
  return text(untyped);
}

/** Main title: an untyped titleInfo wins over alternative/translated ones. */
function mainTitle(root: XmlNode): string | undefined {
  const infos = childNodes(root, "titleInfo");
  const main = infos.find((info) => attr(info, "type") === undefined) ?? infos[0];
  return text(child(main, "title"));
}

function originInfoText(root: XmlNode, name: string): string | undefined {
  for (const info of childNodes(root, "originInfo")) {
    const value = text(child(info, name));
    if (value !== undefined) return value;
  }
  return undefined;
}

export class ModsExtractor extends RecordExtractor {
  protected locate(recordData: XmlNode): XmlNode | undefined {
    const mods = child(recordData, "mods") ?? path(recordData, "modsCollection", "mods");
    return mods === undefined ? undefined : asNode(mods);
  }

  protected readonly readers: FieldReaders = {
    recordId: (r) => text(path(r, "recordInfo", "recordIdentifier")),
    title: mainTitle,
    author: personalName,
    year: (r) => originInfoText(r, "dateIssued"),
    publisher: (r) => originInfoText(r, "publisher"),
    isbn: (r) =>
      text(childNodes(r, "identifier").find((id) => attr(id, "type") === "isbn")),
  };
}
