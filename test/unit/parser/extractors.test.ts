// ---------------------------------------------------------------------------
// Tests for the per-schema field extractors.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";

import type { HoldingEntry } from "../../../src/core/types.js";
import { getExtractor, RecordExtractor } from "../../../src/parser/extractors/index.js";
import type { FieldReaders } from "../../../src/parser/extractors/base-extractor.js";
import { ModsExtractor } from "../../../src/parser/extractors/mods-extractor.js";
import { asNode, child, parseXml } from "../../../src/utils/xml.js";
import type { XmlNode } from "../../../src/utils/xml.js";

/** Parse `xml` as the contents of a recordData element. */
function recordData(xml: string): XmlNode {
  const parsed = parseXml(`<recordData>${xml}</recordData>`);
  if (!parsed.ok) throw new Error(parsed.reason);
  return asNode(child(parsed.document, "recordData") ?? {});
}

const WITH_HOLDINGS = { holdings: true };

// ── Base class ──────────────────────────────────────────────────────────────

class FlakyExtractor extends RecordExtractor {
  protected locate(): XmlNode | undefined {
    return undefined;
  }

  protected readonly readers: FieldReaders = {
    title: () => "Kept",
    author: () => {
      throw new Error("bad author");
    },
    year: () => "",
  };

  protected readHoldings(): HoldingEntry[] {
    throw new Error("bad holdings");
  }
}

describe("RecordExtractor", () => {
  it("isolates a failing reader from the other fields", () => {
    const extraction = new FlakyExtractor("marcxml").extract({}, WITH_HOLDINGS);

    expect(extraction.fields).toEqual({ title: "Kept" });
    expect(extraction.holdings).toEqual([]);
    expect(extraction.failures).toEqual([
      { field: "author", reason: "bad author" },
      { field: "holdings", reason: "bad holdings" },
    ]);
  });

  it("does not read holdings unless asked", () => {
    const extraction = new FlakyExtractor("marcxml").extract({}, { holdings: false });
    expect(extraction.failures.map((f) => f.field)).toEqual(["author"]);
  });

  it("registers one extractor per record format", () => {
    const mods36 = getExtractor("mods36");
    expect(mods36).toBeInstanceOf(ModsExtractor);
    expect(mods36.format).toBe("mods36");
    expect(getExtractor("marcxml-legacy").format).toBe("marcxml-legacy");
  });
});

// ── MODS ────────────────────────────────────────────────────────────────────

describe("ModsExtractor", () => {
  const mods = recordData(`
    <mods xmlns="http://www.loc.gov/mods/v3">
      <titleInfo type="alternative"><title>Alt</title></titleInfo>
      <titleInfo><title>Faust</title><subTitle>Eine Tragödie</subTitle></titleInfo>
      <name type="personal">
        <namePart type="family">Goethe</namePart>
        <namePart type="given">Johann Wolfgang von</namePart>
        <namePart type="date">1749-1832</namePart>
      </name>
      <originInfo><publisher>Reclam</publisher><dateIssued>1986</dateIssued></originInfo>
      <identifier type="uri">http://example.org/1</identifier>
      <identifier type="isbn">978-3-15-000001-3</identifier>
      <recordInfo><recordIdentifier>mods-1</recordIdentifier></recordInfo>
    </mods>`);

  it("reads the main title, typed name parts and origin info", () => {
    expect(getExtractor("mods").extract(mods, WITH_HOLDINGS).fields).toEqual({
      recordId: "mods-1",
      title: "Faust",
      author: "Goethe, Johann Wolfgang von",
      year: "1986",
      publisher: "Reclam",
      isbn: "978-3-15-000001-3",
    });
  });

  it("uses an untyped name part as the author", () => {
    const record = recordData(`
      <mods><name type="personal"><namePart>Schiller, Friedrich</namePart></name></mods>`);
    expect(getExtractor("mods").extract(record, WITH_HOLDINGS).fields).toEqual({
      author: "Schiller, Friedrich",
    });
  });
});

// ── PICA ────────────────────────────────────────────────────────────────────

describe("PicaExtractor", () => {
  it("reads PICA+ fields", () => {
    const record = recordData(`
      <record xmlns="info:srw/schema/5/picaXML-v1.0">
        <datafield tag="003@"><subfield code="0">267838395</subfield></datafield>
        <datafield tag="021A"><subfield code="a">Der @Zauberberg</subfield></datafield>
        <datafield tag="028A"><subfield code="d">Thomas</subfield><subfield code="a">Mann</subfield></datafield>
        <datafield tag="011@"><subfield code="a">1924</subfield></datafield>
        <datafield tag="033A"><subfield code="p">Berlin</subfield><subfield code="n">S. Fischer</subfield></datafield>
        <datafield tag="004A"><subfield code="0">978-3-10-048186-6</subfield></datafield>
      </record>`);

    expect(getExtractor("picaxml").extract(record, WITH_HOLDINGS).fields).toEqual({
      recordId: "267838395",
      title: "Der Zauberberg",
      author: "Mann, Thomas",
      year: "1924",
      publisher: "S. Fischer",
      isbn: "978-3-10-048186-6",
    });
  });

  it("falls back to a further person's display form", () => {
    const record = recordData(`
      <record>
        <datafield tag="028C"><subfield code="8">Kafka, Franz</subfield></datafield>
      </record>`);
    expect(getExtractor("picaxml").extract(record, WITH_HOLDINGS).fields).toEqual({
      author: "Kafka, Franz",
    });
  });
});

// ── Dublin Core ─────────────────────────────────────────────────────────────

describe("DublinCoreExtractor", () => {
  it("reads the first value of each element and an ISBN identifier", () => {
    const record = recordData(`
      <oai_dc:dc xmlns:oai_dc="http://www.openarchives.org/OAI/2.0/oai_dc/"
                 xmlns:dc="http://purl.org/dc/elements/1.1/">
        <dc:title>Die Verwandlung</dc:title>
        <dc:creator>Kafka, Franz</dc:creator>
        <dc:creator>Second Creator</dc:creator>
        <dc:publisher>Kurt Wolff</dc:publisher>
        <dc:date>1915</dc:date>
        <dc:identifier>http://example.org/record/123</dc:identifier>
        <dc:identifier>ISBN 978-3-596-90100-1</dc:identifier>
      </oai_dc:dc>`);

    expect(getExtractor("dc").extract(record, WITH_HOLDINGS).fields).toEqual({
      title: "Die Verwandlung",
      author: "Kafka, Franz",
      year: "1915",
      publisher: "Kurt Wolff",
      isbn: "978-3-596-90100-1",
    });
  });

  it("accepts urn:isbn identifiers", () => {
    const record = recordData(`<dc><identifier>urn:isbn:9783596901001</identifier></dc>`);
    expect(getExtractor("dc").extract(record, WITH_HOLDINGS).fields).toEqual({
      isbn: "9783596901001",
    });
  });
});

// ── ISBD ────────────────────────────────────────────────────────────────────

describe("IsbdExtractor", () => {
  it("reads fields from ISBD punctuation", () => {
    const record = recordData(
      "<isbd>Faust : eine Tragödie / Johann Wolfgang von Goethe. - " +
        "Stuttgart : Reclam, 1986. - 143 S. - ISBN 978-3-15-000001-3</isbd>",
    );

    expect(getExtractor("isbd").extract(record, WITH_HOLDINGS).fields).toEqual({
      title: "Faust",
      author: "Johann Wolfgang von Goethe",
      year: "1986",
      publisher: "Reclam",
      isbn: "978-3-15-000001-3",
    });
  });

  it("yields only a title when there is no punctuation", () => {
    const record = recordData("<isbd>Untitled fragment</isbd>");
    expect(getExtractor("isbd").extract(record, WITH_HOLDINGS).fields).toEqual({
      title: "Untitled fragment",
    });
  });
});

// ── MADS ────────────────────────────────────────────────────────────────────

describe("MadsExtractor", () => {
  it("reports a personal heading as title and author", () => {
    const record = recordData(`
      <mads xmlns="http://www.loc.gov/mads/v2">
        <authority>
          <name type="personal">
            <namePart>Goethe, Johann Wolfgang von</namePart>
            <namePart type="date">1749-1832</namePart>
          </name>
        </authority>
        <recordInfo><recordIdentifier>118540238</recordIdentifier></recordInfo>
      </mads>`);

    expect(getExtractor("mads").extract(record, WITH_HOLDINGS).fields).toEqual({
      recordId: "118540238",
      title: "Goethe, Johann Wolfgang von",
      author: "Goethe, Johann Wolfgang von",
    });
  });

  it("reports a topical heading as title only", () => {
    const record = recordData(`<mads><authority><topic>Philosophie</topic></authority></mads>`);
    expect(getExtractor("mads").extract(record, WITH_HOLDINGS).fields).toEqual({
      title: "Philosophie",
    });
  });
});

// ── TurboMARC ───────────────────────────────────────────────────────────────

describe("TurboMarcExtractor", () => {
  const record = recordData(`
    <r xmlns="http://www.indexdata.com/turbomarc">
      <c001>tm-1</c001>
      <d245 i1="1" i2="0"><sa>Der Process</sa></d245>
      <d700 i1="1" i2=" "><sa>Kafka, Franz</sa></d700>
      <d260 i1=" " i2=" "><sb>Die Schmiede</sb><sc>1925</sc></d260>
      <d924 i1="0" i2=" "><sb>DE-21</sb><sg>Freihand</sg></d924>
    </r>`);

  it("reads fields from element-encoded tags and codes", () => {
    const extraction = getExtractor("turbomarc").extract(record, WITH_HOLDINGS);
    expect(extraction.fields).toEqual({
      recordId: "tm-1",
      title: "Der Process",
      author: "Kafka, Franz",
      year: "1925",
      publisher: "Die Schmiede",
    });
    expect(extraction.holdings).toEqual([
      { libraryCode: "DE-21", libraryName: "Universität Stuttgart", collection: "Freihand" },
    ]);
  });
});
