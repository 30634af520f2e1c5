// ---------------------------------------------------------------------------
// SRU response bodies shared by parser, client and CLI tests.
// ---------------------------------------------------------------------------

export interface MarcRecordFields {
  id?: string;
  title?: string;
  author?: string;
  year?: string;
  publisher?: string;
  isbn?: string;
  /** Extra datafields, inserted verbatim. */
  extra?: string;
}

function datafield(tag: string, code: string, value: string | undefined): string {
  return value === undefined
    ? ""
    : `<datafield tag="${tag}" ind1=" " ind2=" "><subfield code="${code}">${value}</subfield></datafield>`;
}

/** A MARC 21 slim record, without surrounding whitespace. */
export function marcRecord(fields: MarcRecordFields): string {
  return [
    `<record xmlns="http://www.loc.gov/MARC21/slim">`,
    fields.id === undefined ? "" : `<controlfield tag="001">${fields.id}</controlfield>`,
    datafield("020", "a", fields.isbn),
    datafield("100", "a", fields.author),
    datafield("245", "a", fields.title),
    datafield("264", "b", fields.publisher),
    datafield("264", "c", fields.year),
    fields.extra ?? "",
    `</record>`,
  ].join("");
}

export interface SearchEnvelope {
  version?: string;
  total?: string;
  /** recordData contents, one per record. */
  records?: readonly string[];
  next?: string;
  /** Inserted after the records container. */
  extra?: string;
}

/** A searchRetrieveResponse with `zs:` prefixes, as SRU 1.1 servers send it. */
export function searchResponse(envelope: SearchEnvelope): string {
  const records = envelope.records ?? [];
  const recordElements = records
    .map(
      (data, i) =>
        `<zs:record><zs:recordSchema>marcxml</zs:recordSchema>` +
        `<zs:recordPacking>xml</zs:recordPacking>` +
        `<zs:recordData>${data}</zs:recordData>` +
        `<zs:recordPosition>${i + 1}</zs:recordPosition></zs:record>`,
    )
    .join("\n    ");

  return `<?xml version="1.0" encoding="UTF-8"?>
<zs:searchRetrieveResponse xmlns:zs="http://www.loc.gov/zing/srw/">
  <zs:version>${envelope.version ?? "1.1"}</zs:version>
  ${envelope.total === undefined ? "" : `<zs:numberOfRecords>${envelope.total}</zs:numberOfRecords>`}
  ${records.length === 0 ? "" : `<zs:records>\n    ${recordElements}\n  </zs:records>`}
  ${envelope.next === undefined ? "" : `<zs:nextRecordPosition>${envelope.next}</zs:nextRecordPosition>`}
  ${envelope.extra ?? ""}
</zs:searchRetrieveResponse>`;
}

/** Three complete records, as in a first page of a title search. */
export function threeRecordResponse(): string {
  return searchResponse({
    total: "42",
    next: "4",
    records: [
      marcRecord({
        id: "1001",
        title: "Python programming",
        author: "Lutz, Mark",
        year: "2013",
        publisher: "O'Reilly",
        isbn: "978-1-4493-5573-9",
      }),
      marcRecord({
        id: "1002",
        title: "Python programming for beginners",
        author: "Schmidt, Anna",
        year: "2020",
        publisher: "Rheinwerk",
        isbn: "978-3-8362-7522-2",
      }),
      marcRecord({
        id: "1003",
        title: "Programming Python",
        author: "Weber, Jörg",
        year: "2011",
        publisher: "dpunkt",
        isbn: "978-3-89864-701-4",
      }),
    ],
  });
}

export function diagnosticResponse(uri: string, message: string, details?: string): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<zs:searchRetrieveResponse xmlns:zs="http://www.loc.gov/zing/srw/">
  <zs:version>1.1</zs:version>
  <zs:numberOfRecords>0</zs:numberOfRecords>
  <zs:diagnostics>
    <diag:diagnostic xmlns:diag="http://www.loc.gov/zing/srw/diagnostic/">
      <diag:uri>${uri}</diag:uri>
      <diag:message>${message}</diag:message>
      ${details === undefined ? "" : `<diag:details>${details}</diag:details>`}
    </diag:diagnostic>
  </zs:diagnostics>
</zs:searchRetrieveResponse>`;
}

/** A scanResponse listing `terms` as [value, count, displayTerm?]. */
export function scanResponse(terms: ReadonlyArray<readonly [string, string, string?]>): string {
  const items = terms
    .map(
      ([value, count, display]) =>
        `<zs:term><zs:value>${value}</zs:value>` +
        `<zs:numberOfRecords>${count}</zs:numberOfRecords>` +
        (display === undefined ? "" : `<zs:displayTerm>${display}</zs:displayTerm>`) +
        `</zs:term>`,
    )
    .join("\n    ");
  return `<?xml version="1.0" encoding="UTF-8"?>
<zs:scanResponse xmlns:zs="http://www.loc.gov/zing/srw/">
  <zs:version>1.1</zs:version>
  <zs:terms>
    ${items}
  </zs:terms>
</zs:scanResponse>`;
}

export function explainResponse(): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<zs:explainResponse xmlns:zs="http://www.loc.gov/zing/srw/">
  <zs:version>1.1</zs:version>
  <zs:record>
    <zs:recordSchema>http://explain.z3950.org/dtd/2.0/</zs:recordSchema>
    <zs:recordPacking>xml</zs:recordPacking>
    <zs:recordData>
      <explain xmlns="http://explain.z3950.org/dtd/2.0/">
        <serverInfo protocol="SRU" version="1.1">
          <host>sru.example.org</host>
          <port>443</port>
          <database>swb</database>
        </serverInfo>
        <databaseInfo>
          <title lang="de">Verbundkatalog</title>
          <title lang="en" primary="true">Union Catalog</title>
          <description lang="en">Test catalog</description>
          <contact>help@example.org</contact>
        </databaseInfo>
        <indexInfo>
          <set identifier="info:srw/cql-context-set/1/pica" name="pica"/>
          <index>
            <title>Titel</title>
            <map><name set="pica">tit</name></map>
          </index>
          <index>
            <title>Person</title>
            <map><name set="pica">per</name></map>
          </index>
          <index>
            <title>Without map</title>
          </index>
          <index>
            <title>Plain</title>
            <map><name>any</name></map>
          </index>
        </indexInfo>
        <schemaInfo>
          <schema identifier="info:srw/schema/1/marcxml-v1.1" name="marcxml">
            <title>MARC 21 XML</title>
          </schema>
          <schema name="picaxml"/>
          <schema/>
        </schemaInfo>
      </explain>
    </zs:recordData>
  </zs:record>
</zs:explainResponse>`;
}
