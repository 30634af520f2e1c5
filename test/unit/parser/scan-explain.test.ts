// ---------------------------------------------------------------------------
// Tests for the scan and explain response parsers.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";

import { parseScanResponse } from "../../../src/parser/scan-parser.js";
import { parseExplainResponse } from "../../../src/parser/explain-parser.js";
import {
  EmptyResponseError,
  MalformedResponseError,
  ServerDiagnosticError,
} from "../../../src/core/errors.js";
import { explainResponse, scanResponse } from "../../fixtures/sru-responses.js";

const SCAN_CONTEXT = { scanClause: "pica.per=Goe", responsePosition: 1 };

// ── Scan ────────────────────────────────────────────────────────────────────

describe("parseScanResponse", () => {
  it("reads every term with its record count", () => {
    const body = scanResponse([
      ["goebel", "12"],
      ["goedeke", "40"],
      ["goethe", "15873", "Goethe"],
      ["goetz", "310"],
      ["goez", "8"],
    ]);
    const response = parseScanResponse(body, SCAN_CONTEXT);

    expect(response.terms).toHaveLength(5);
    expect(response.scanClause).toBe("pica.per=Goe");
    expect(response.responsePosition).toBe(1);
    expect(response.terms[2]).toEqual({
      value: "goethe",
      numberOfRecords: 15873,
      displayTerm: "Goethe",
    });
    expect(response.terms.map((t) => t.numberOfRecords)).toEqual([12, 40, 15873, 310, 8]);
    expect(response.warnings).toEqual([]);
  });

  it("skips terms without a value", () => {
    const body = `<scanResponse><terms>
      <term><numberOfRecords>3</numberOfRecords></term>
      <term><value>kept</value></term>
    </terms></scanResponse>`;
    const response = parseScanResponse(body, SCAN_CONTEXT);

    expect(response.terms).toEqual([{ value: "kept", numberOfRecords: 0 }]);
    expect(response.warnings).toEqual([
      { code: "invalid-term", message: "Term at position 1 has no value", position: 1 },
    ]);
  });

  it("keeps extra term data", () => {
    const body = `<scanResponse><terms>
      <term><value>a</value><numberOfRecords>1</numberOfRecords><extraTermData>note</extraTermData></term>
    </terms></scanResponse>`;
    expect(parseScanResponse(body, SCAN_CONTEXT).terms[0].extraData).toBe("note");
  });

  it("returns no terms for an empty terms list", () => {
    const response = parseScanResponse("<scanResponse><terms/></scanResponse>", SCAN_CONTEXT);
    expect(response.terms).toEqual([]);
  });

  it("applies the same failure precedence as search", () => {
    expect(() => parseScanResponse("", SCAN_CONTEXT)).toThrow(EmptyResponseError);
    expect(() => parseScanResponse("<scanResponse>", SCAN_CONTEXT)).toThrow(
      MalformedResponseError,
    );
    const diagnostic = `<scanResponse><diagnostics><diagnostic>
      <uri>info:srw/diagnostic/1/16</uri><message>Unsupported index</message>
    </diagnostic></diagnostics></scanResponse>`;
    expect(() => parseScanResponse(diagnostic, SCAN_CONTEXT)).toThrow(ServerDiagnosticError);
  });
});

// ── Explain ─────────────────────────────────────────────────────────────────

describe("parseExplainResponse", () => {
  const response = parseExplainResponse(explainResponse());

  it("reads server and database info", () => {
    expect(response.serverInfo).toEqual({
      host: "sru.example.org",
      port: 443,
      database: "swb",
    });
    expect(response.databaseInfo).toEqual({
      title: "Union Catalog",
      description: "Test catalog",
      contact: "help@example.org",
    });
  });

  it("builds index names from set and name, skipping incomplete indices", () => {
    expect(response.indices).toEqual([
      { title: "Titel", name: "pica.tit" },
      { title: "Person", name: "pica.per" },
      { title: "Plain", name: "any" },
    ]);
  });

  it("falls back to the schema name as identifier", () => {
    expect(response.schemas).toEqual([
      {
        identifier: "info:srw/schema/1/marcxml-v1.1",
        name: "marcxml",
        title: "MARC 21 XML",
      },
      { identifier: "picaxml", name: "picaxml" },
    ]);
  });

  it("does not truncate long index lists", () => {
    const indices = Array.from(
      { length: 300 },
      (_, i) => `<index><title>Index ${i}</title><map><name set="pica">i${i}</name></map></index>`,
    ).join("");
    const body =
      `<explainResponse><record><recordData><explain>` +
      `<indexInfo>${indices}</indexInfo>` +
      `</explain></recordData></record></explainResponse>`;
    const parsed = parseExplainResponse(body);

    expect(parsed.indices).toHaveLength(300);
    expect(parsed.indices[299]).toEqual({ title: "Index 299", name: "pica.i299" });
    expect(parsed.serverInfo).toEqual({ host: "unknown" });
    expect(parsed.databaseInfo).toEqual({ title: "Unknown" });
  });

  it("rejects a search response passed as explain", () => {
    expect(() =>
      parseExplainResponse("<searchRetrieveResponse><numberOfRecords>0</numberOfRecords></searchRetrieveResponse>"),
    ).toThrow("Expected <explainResponse> but found <searchRetrieveResponse>");
  });
});
