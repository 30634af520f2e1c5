// ---------------------------------------------------------------------------
// explain response parser.
//
// The ZeeRex record sits in explainResponse/record/recordData/explain
// (namespace http://explain.z3950.org/dtd/2.0/ or 2.1/; prefixes are
// stripped, so both read alike).  Index and schema lists are returned in
// full.
// ---------------------------------------------------------------------------

import type {
  DatabaseInfo,
  ExplainResponse,
  IndexInfo,
  SchemaInfo,
  ServerInfo,
} from "../core/types.js";
import { attr, child, childNodes, descendant, text } from "../utils/xml.js";
import type { XmlValue } from "../utils/xml.js";
import { RESPONSE_ROOT, openEnvelope, parseBoundary, readCount } from "./envelope.js";

/** Parse an explain response body. */
export function parseExplainResponse(body: string): ExplainResponse {
  return parseBoundary(body, () => {
    const { root } = openEnvelope(body, RESPONSE_ROOT.explain);
    const explain = descendant(root, "explain");

    return Object.freeze({
      serverInfo: Object.freeze(readServerInfo(child(explain, "serverInfo"))),
      databaseInfo: Object.freeze(readDatabaseInfo(child(explain, "databaseInfo"))),
      indices: Object.freeze(readIndices(child(explain, "indexInfo"))),
      schemas: Object.freeze(readSchemas(child(explain, "schemaInfo"))),
      warnings: Object.freeze([]),
    });
  });
}

function readServerInfo(info: XmlValue | undefined): ServerInfo {
  const server: ServerInfo = { host: text(child(info, "host")) ?? "unknown" };
  const port = readCount(text(child(info, "port")));
  if (port !== undefined) server.port = port;
  const database = text(child(info, "database"));
  if (database !== undefined) server.database = database;
  return server;
}

/** Titles may repeat per language; the one marked primary wins. */
function preferPrimary(info: XmlValue | undefined, name: string): string | undefined {
  const all = childNodes(info, name);
  const primary = all.find((n) => attr(n, "primary") === "true");
  return text(primary ?? all[0]);
}

function readDatabaseInfo(info: XmlValue | undefined): DatabaseInfo {
  const database: DatabaseInfo = { title: preferPrimary(info, "title") ?? "Unknown" };
  const description = preferPrimary(info, "description");
  if (description !== undefined) database.description = description;
  const contact = text(child(info, "contact"));
  if (contact !== undefined) database.contact = contact;
  return database;
}

/**
 * `<index><title>Titel</title><map><name set="pica">tit</name></map></index>`
 * becomes `{ title: "Titel", name: "pica.tit" }`.  Indices lacking either
 * part are skipped.
 */
function readIndices(info: XmlValue | undefined): IndexInfo[] {
  const indices: IndexInfo[] = [];
  for (const index of childNodes(info, "index")) {
    const title = preferPrimary(index, "title");
    const nameNode = childNodes(child(index, "map"), "name")[0];
    const name = text(nameNode);
    if (title === undefined || name === undefined) continue;

    const set = attr(nameNode, "set");
    const entry: IndexInfo = { title, name: set ? `${set}.${name}` : name };
    const description = preferPrimary(index, "description");
    if (description !== undefined) entry.description = description;
    indices.push(Object.freeze(entry));
  }
  return indices;
}

/**
 * `<schema identifier="info:srw/schema/1/marcxml-v1.1" name="marcxml">`.
 * The identifier falls back to the name.
 */
function readSchemas(info: XmlValue | undefined): SchemaInfo[] {
  const schemas: SchemaInfo[] = [];
  for (const schema of childNodes(info, "schema")) {
    const name = attr(schema, "name");
    const identifier = attr(schema, "identifier") ?? name;
    if (identifier === undefined) continue;

    const entry: SchemaInfo = { identifier, name: name ?? identifier };
    const title = preferPrimary(schema, "title");
    if (title !== undefined) entry.title = title;
    schemas.push(Object.freeze(entry));
  }
  return schemas;
}
