// ---------------------------------------------------------------------------
// Envelope checks shared by every SRU response parser.
//
// Order of precedence:
//   1. empty body            -> EmptyResponseError
//   2. not well-formed XML   -> MalformedResponseError (body retained)
//   3. diagnostic envelope   -> ServerDiagnosticError
//   4. unexpected root       -> MalformedResponseError
// ---------------------------------------------------------------------------

import {
  EmptyResponseError,
  MalformedResponseError,
  ServerDiagnosticError,
  SruClientError,
} from "../core/errors.js";
import { asNode, child, childNodes, elementNames, parseXml, text } from "../utils/xml.js";
import type { XmlNode } from "../utils/xml.js";

/** Root element names per operation, after namespace prefixes are removed. */
export const RESPONSE_ROOT = {
  searchRetrieve: "searchRetrieveResponse",
  scan: "scanResponse",
  explain: "explainResponse",
} as const;
export type ResponseRoot = (typeof RESPONSE_ROOT)[keyof typeof RESPONSE_ROOT];

export interface Envelope {
  /** The operation's root element. */
  root: XmlNode;
  /** The parsed document (root element included). */
  document: XmlNode;
}

/**
 * Run the envelope checks and return the root element of a response.
 */
export function openEnvelope(body: string, expectedRoot: ResponseRoot): Envelope {
  if (body.trim() === "") {
    throw new EmptyResponseError();
  }

  const parsed = parseXml(body);
  if (!parsed.ok) {
    throw new MalformedResponseError(`Invalid XML response: ${parsed.reason}`, body);
  }
  const { document } = parsed;

  const diagnostic = findDiagnostic(document);
  if (diagnostic) throw diagnostic;

  const root = child(document, expectedRoot);
  if (root === undefined) {
    const found = elementNames(document)[0] ?? "none";
    throw new MalformedResponseError(
      `Expected <${expectedRoot}> but found <${found}>`,
      body,
    );
  }

  // An empty root element parses as "".
  return { root: typeof root === "string" ? {} : asNode(root), document };
}

/**
 * Diagnostics appear inside the operation's response element or, from
 * some servers, as a standalone `<diagnostics>` document.  Only the first
 * diagnostic is reported.
 */
function findDiagnostic(document: XmlNode): ServerDiagnosticError | undefined {
  const containers = [
    ...childNodes(document, "diagnostics"),
    ...elementNames(document).flatMap((name) =>
      childNodes(child(document, name), "diagnostics"),
    ),
  ];

  for (const container of containers) {
    const diagnostic = childNodes(container, "diagnostic")[0];
    if (!diagnostic) continue;
    return new ServerDiagnosticError(
      text(child(diagnostic, "uri")) ?? "unknown",
      text(child(diagnostic, "message")) ?? "Unknown error",
      text(child(diagnostic, "details")),
    );
  }
  return undefined;
}

/**
 * Failure boundary for a parser entry point: classified client errors pass
 * through, anything else becomes a {@link MalformedResponseError} so no
 * unclassified exception escapes the parser.
 */
export function parseBoundary<T>(body: string, parse: () => T): T {
  try {
    return parse();
  } catch (err: unknown) {
    if (err instanceof SruClientError) throw err;
    const reason = err instanceof Error ? err.message : String(err);
    throw new MalformedResponseError(
      `Unreadable SRU response: ${reason}`,
      body,
      { cause: err },
    );
  }
}

/** Non-negative integer from element text, or `undefined`. */
export function readCount(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value)) return undefined;
  return Number.parseInt(value, 10);
}
