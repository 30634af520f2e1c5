// ---------------------------------------------------------------------------
// XML helpers for fast-xml-parser output.
//
// The shared parser strips namespace prefixes (`zs:record` -> `record`),
// keeps attributes under an `@_` prefix and never converts text to numbers,
// so every leaf value is a string.  A repeated element becomes an array and a
// single one does not; every accessor here accepts both shapes.
// ---------------------------------------------------------------------------

import { XMLBuilder, XMLParser, XMLValidator } from "fast-xml-parser";

export type XmlValue = string | XmlNode | XmlValue[];

export interface XmlNode {
  [key: string]: XmlValue | undefined;
}

const ATTRIBUTE_PREFIX = "@_";
const TEXT_KEY = "#text";

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  removeNSPrefix: true,
  // SECURITY: entity expansion stays off so a hostile DOCTYPE cannot grow
  // the document.  The five predefined entities and character references
  // are decoded by the accessors below instead.
  processEntities: false,
  parseTagValue: false,
  parseAttributeValue: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
  trimValues: true,
});

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  processEntities: false,
  format: true,
});

// ── Parsing ─────────────────────────────────────────────────────────────────

export type XmlParseResult =
  | { ok: true; document: XmlNode }
  | { ok: false; reason: string };

/**
 * Check well-formedness and parse.  Never throws: any failure, including
 * one raised by the parser itself, is reported as `{ ok: false }`.
 */
export function parseXml(text: string): XmlParseResult {
  const validation = XMLValidator.validate(text);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    return { ok: false, reason: `${msg} (line ${line}, column ${col})` };
  }

  try {
    const document: unknown = parser.parse(text);
    if (!isXmlNode(document)) {
      return { ok: false, reason: "Document has no root element" };
    }
    return { ok: true, document };
  } catch (err: unknown) {
    return {
      ok: false,
      reason: err instanceof Error ? err.message : String(err),
    };
  }
}

/** Serialise a parsed node back to XML text. */
export function buildXml(name: string, node: XmlValue): string {
  const built: unknown = builder.build({ [name]: node });
  return typeof built === "string" ? built.trim() : "";
}

// ── Node access ─────────────────────────────────────────────────────────────

export function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Normalise a value that may be a single item or an array into an array.
 */
export function toArray<T>(value: T | T[] | undefined | null): T[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

/** All child values named `name`, in document order. */
export function children(node: XmlValue | undefined, name: string): XmlValue[] {
  if (node === undefined) return [];
  if (Array.isArray(node)) return node.flatMap((n) => children(n, name));
  if (!isXmlNode(node)) return [];
  return toArray(node[name]).flatMap((v) => (Array.isArray(v) ? v : [v]));
}

/** First child value named `name`. */
export function child(
  node: XmlValue | undefined,
  name: string,
): XmlValue | undefined {
  return children(node, name)[0];
}

/**
 * Child elements as nodes.  A text-only element is lifted into
 * `{ "#text": value }` so callers can treat every element alike.
 */
export function childNodes(node: XmlValue | undefined, name: string): XmlNode[] {
  return children(node, name).map(asNode);
}

export function asNode(value: XmlValue): XmlNode {
  if (typeof value === "string") return { [TEXT_KEY]: value };
  if (Array.isArray(value)) return value.length > 0 ? asNode(value[0]) : {};
  return value;
}

/** Follow a chain of child names, taking the first match at each step. */
export function path(
  node: XmlValue | undefined,
  ...names: string[]
): XmlValue | undefined {
  let current = node;
  for (const name of names) {
    current = child(current, name);
    if (current === undefined) return undefined;
  }
  return current;
}

/**
 * Depth-first search for every element named `name` below `node`
 * (the node itself excluded).  Matches are not searched further.
 */
export function descendants(node: XmlValue | undefined, name: string): XmlValue[] {
  const found: XmlValue[] = [];
  const visit = (value: XmlValue): void => {
    if (Array.isArray(value)) {
      value.forEach(visit);
      return;
    }
    if (!isXmlNode(value)) return;
    for (const [key, nested] of Object.entries(value)) {
      if (nested === undefined || key.startsWith(ATTRIBUTE_PREFIX)) continue;
      if (key === name) {
        found.push(...toArray(nested).flatMap((v) => (Array.isArray(v) ? v : [v])));
      } else if (key !== TEXT_KEY) {
        visit(nested);
      }
    }
  };
  if (node !== undefined) visit(node);
  return found;
}

export function descendant(
  node: XmlValue | undefined,
  name: string,
): XmlValue | undefined {
  return descendants(node, name)[0];
}

/** Decoded attribute value, or `undefined`. */
export function attr(node: XmlValue | undefined, name: string): string | undefined {
  if (node === undefined || typeof node === "string") return undefined;
  const target = Array.isArray(node) ? node[0] : node;
  if (!isXmlNode(target)) return undefined;
  const value = target[`${ATTRIBUTE_PREFIX}${name}`];
  return typeof value === "string" ? decodeEntities(value) : undefined;
}

/**
 * Direct text of an element with entities decoded, or `undefined` when the
 * element is absent or has no non-blank text.
 */
export function text(value: XmlValue | undefined): string | undefined {
  if (value === undefined) return undefined;
  if (Array.isArray(value)) return text(value[0]);
  const raw = typeof value === "string" ? value : value[TEXT_KEY];
  if (typeof raw !== "string") return undefined;
  const decoded = decodeEntities(raw).trim();
  return decoded === "" ? undefined : decoded;
}

/** Text of the first child named `name`. */
export function childText(node: XmlValue | undefined, name: string): string | undefined {
  return text(child(node, name));
}

/** All text below `value`, joined with single spaces. */
export function deepText(value: XmlValue | undefined): string | undefined {
  const parts: string[] = [];
  const visit = (v: XmlValue): void => {
    if (typeof v === "string") {
      parts.push(decodeEntities(v));
    } else if (Array.isArray(v)) {
      v.forEach(visit);
    } else {
      for (const [key, nested] of Object.entries(v)) {
        if (nested === undefined || key.startsWith(ATTRIBUTE_PREFIX)) continue;
        visit(nested);
      }
    }
  };
  if (value !== undefined) visit(value);
  const joined = parts.join(" ").replace(/\s+/g, " ").trim();
  return joined === "" ? undefined : joined;
}

/** Element names of a node (attributes and text excluded). */
export function elementNames(node: XmlValue | undefined): string[] {
  if (node === undefined || typeof node === "string" || Array.isArray(node)) {
    return [];
  }
  return Object.keys(node).filter(
    (key) => !key.startsWith(ATTRIBUTE_PREFIX) && key !== TEXT_KEY,
  );
}

// ── Entities ────────────────────────────────────────────────────────────────

const NAMED_ENTITIES: Readonly<Record<string, string>> = {
  lt: "<",
  gt: ">",
  amp: "&",
  quot: '"',
  apos: "'",
};

/**
 * Decode the five predefined XML entities and numeric character references.
 * Unknown named entities are left as they are.
 */
export function decodeEntities(value: string): string {
  if (!value.includes("&")) return value;
  return value.replace(
    /&(#x[0-9a-fA-F]+|#[0-9]+|[a-zA-Z]+);/g,
    (match, entity: string) => {
      if (entity.startsWith("#x")) {
        return fromCodePoint(parseInt(entity.slice(2), 16)) ?? match;
      }
      if (entity.startsWith("#")) {
        return fromCodePoint(parseInt(entity.slice(1), 10)) ?? match;
      }
      return NAMED_ENTITIES[entity] ?? match;
    },
  );
}

function fromCodePoint(codePoint: number): string | undefined {
  if (!Number.isInteger(codePoint) || codePoint < 0 || codePoint > 0x10ffff) {
    return undefined;
  }
  return String.fromCodePoint(codePoint);
}

// ── Character encoding ──────────────────────────────────────────────────────

const PROLOG_ENCODING = /^(?:\uFEFF|\u00EF\u00BB\u00BF)?\s*<\?xml[^>]*\bencoding\s*=\s*["']([A-Za-z0-9._-]+)["']/;

/** Encoding named in the XML declaration, if any. */
export function declaredEncoding(head: string): string | undefined {
  return PROLOG_ENCODING.exec(head)?.[1]?.toLowerCase();
}

/**
 * Decode a response body.  The encoding declared in the XML prolog wins
 * over the transport charset; UTF-8 is the fallback.  Labels the runtime
 * does not know are skipped.
 */
export function decodeBody(body: Uint8Array, transportCharset?: string): string {
  // The prolog is ASCII in every encoding a catalog will use.
  const head = new TextDecoder("latin1").decode(body.subarray(0, 200));
  const candidates = [declaredEncoding(head), transportCharset?.toLowerCase(), "utf-8"];

  for (const label of candidates) {
    if (!label) continue;
    const decoder = createDecoder(label);
    if (decoder) return decoder.decode(body);
  }
  return new TextDecoder().decode(body);
}

function createDecoder(label: string): InstanceType<typeof TextDecoder> | undefined {
  try {
    return new TextDecoder(label);
  } catch (err: unknown) {
    if (err instanceof RangeError) return undefined;
    throw err;
  }
}
