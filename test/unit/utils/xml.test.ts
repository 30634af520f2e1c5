// ---------------------------------------------------------------------------
// Tests for the fast-xml-parser helpers and body decoding.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";

import {
  attr,
  child,
  childNodes,
  declaredEncoding,
  decodeBody,
  decodeEntities,
  deepText,
  descendants,
  parseXml,
  path,
  text,
  toArray,
} from "../../../src/utils/xml.js";

describe("parseXml", () => {
  it("strips namespace prefixes and keeps attributes", () => {
    const result = parseXml(
      `<zs:searchRetrieveResponse xmlns:zs="http://www.loc.gov/zing/srw/">` +
        `<zs:numberOfRecords>7</zs:numberOfRecords>` +
        `<zs:record kind="x"/>` +
        `</zs:searchRetrieveResponse>`,
    );
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    const root = child(result.document, "searchRetrieveResponse");
    expect(text(child(root, "numberOfRecords"))).toBe("7");
    expect(attr(child(root, "record"), "kind")).toBe("x");
  });

  it("keeps numeric text as strings", () => {
    const result = parseXml("<a><b>00123</b></a>");
    expect(result.ok && path(result.document, "a", "b")).toBe("00123");
  });

  it("reports malformed input instead of throwing", () => {
    const result = parseXml("<a><b></a>");
    expect(result.ok).toBe(false);
  });

  it("reports plain text as malformed", () => {
    expect(parseXml("Service Unavailable").ok).toBe(false);
  });
});

describe("node access", () => {
  const doc = {
    list: {
      item: [{ "@_id": "1", "#text": "one" }, "two"],
    },
  };

  it("toArray normalises single values and absence", () => {
    expect(toArray(undefined)).toEqual([]);
    expect(toArray("x")).toEqual(["x"]);
    expect(toArray(["x", "y"])).toEqual(["x", "y"]);
  });

  it("childNodes lifts text-only elements into nodes", () => {
    expect(childNodes(doc.list, "item")).toEqual([
      { "@_id": "1", "#text": "one" },
      { "#text": "two" },
    ]);
  });

  it("descendants finds elements at any depth", () => {
    const tree = { a: { b: { target: "deep" }, target: "shallow" } };
    expect(descendants(tree, "target")).toEqual(["deep", "shallow"]);
  });

  it("deepText joins all text below a node", () => {
    const node = { title: "Faust", part: { "#text": "Eine Tragödie", "@_lang": "de" } };
    expect(deepText(node)).toBe("Faust Eine Tragödie");
  });

  it("text returns undefined for blank content", () => {
    expect(text("  ")).toBeUndefined();
    expect(text({ "@_a": "1" })).toBeUndefined();
  });
});

describe("decodeEntities", () => {
  it("decodes predefined and numeric entities", () => {
    expect(decodeEntities("&lt;a&gt; &amp; &quot;b&quot; &#228; &#xFC;")).toBe('<a> & "b" ä ü');
  });

  it("leaves unknown entities alone", () => {
    expect(decodeEntities("&nbsp;")).toBe("&nbsp;");
  });
});

describe("decodeBody", () => {
  it("decodes UTF-8 umlauts by default", () => {
    const bytes = new TextEncoder().encode("<t>Müller, Jürgen: Öl und Straße</t>");
    expect(decodeBody(bytes)).toBe("<t>Müller, Jürgen: Öl und Straße</t>");
  });

  it("prefers the prolog encoding over the transport charset", () => {
    // "ä" as a single ISO-8859-1 byte
    const prolog = `<?xml version="1.0" encoding="ISO-8859-1"?><t>`;
    const bytes = new Uint8Array([
      ...new TextEncoder().encode(prolog),
      0xe4,
      ...new TextEncoder().encode("</t>"),
    ]);
    expect(decodeBody(bytes, "utf-8")).toBe(`${prolog}ä</t>`);
  });

  it("uses the transport charset when the prolog names none", () => {
    const bytes = new Uint8Array([0x3c, 0x74, 0x3e, 0xfc, 0x3c, 0x2f, 0x74, 0x3e]);
    expect(decodeBody(bytes, "iso-8859-1")).toBe("<t>ü</t>");
  });

  it("skips encoding labels the runtime does not know", () => {
    const body = `<?xml version="1.0" encoding="x-unknown-charset"?><t>ö</t>`;
    expect(decodeBody(new TextEncoder().encode(body))).toBe(body);
  });

  it("reads the declared encoding", () => {
    expect(declaredEncoding(`<?xml version="1.0" encoding="UTF-8"?>`)).toBe("utf-8");
    expect(declaredEncoding("<root/>")).toBeUndefined();
  });
});
