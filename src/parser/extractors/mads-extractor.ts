// ---------------------------------------------------------------------------
// MADS authority records.  The authorized heading becomes the title; a
// personal-name heading is reported as the author as well.
// ---------------------------------------------------------------------------

import { asNode, attr, child, childNodes, path, text } from "../../utils/xml.js";
import type { XmlNode } from "../../utils/xml.js";
import { RecordExtractor } from "./base-extractor.js";
import type { FieldReaders } from "./base-extractor.js";

function nameHeading(authority: XmlNode): string | undefined {
  const name = childNodes(authority, "name")[0];
  if (!name) return undefined;
  const parts = childNodes(name, "namePart")
    .filter((p) => attr(p, "type") !== "date")
    .map((p) => text(p))
    .filter((p): p is string => p !== undefined);
  return parts.length > 0 ? parts.join(", ") : undefined;
}

function heading(root: XmlNode): string | undefined {
  const authority = child(root, "authority");
  if (authority === undefined) return undefined;
  const node = asNode(authority);
  return (
    nameHeading(node) ??
    text(child(node, "topic")) ??
    text(path(node, "titleInfo", "title")) ??
    text(child(node, "geographic")) ??
    text(child(node, "genre"))
  );
}

function personalHeading(root: XmlNode): string | undefined {
  const authority = child(root, "authority");
  const name = childNodes(authority, "name")[0];
  if (!name || attr(name, "type") !== "personal") return undefined;
  return nameHeading(asNode(authority ?? {}));
}

export class MadsExtractor extends RecordExtractor {
  protected locate(recordData: XmlNode): XmlNode | undefined {
    const mads = child(recordData, "mads") ?? path(recordData, "madsCollection", "mads");
    return mads === undefined ? undefined : asNode(mads);
  }

  protected readonly readers: FieldReaders = {
    recordId: (r) => text(path(r, "recordInfo", "recordIdentifier")),
    title: heading,
    author: personalHeading,
  };
}
