// ---------------------------------------------------------------------------
// Extractor registry: one extractor per record schema.
// ---------------------------------------------------------------------------

import { RecordFormat } from "../../core/types.js";
import type { RecordExtractor } from "./base-extractor.js";
import { DublinCoreExtractor } from "./dublin-core-extractor.js";
import { IsbdExtractor } from "./isbd-extractor.js";
import { MadsExtractor } from "./mads-extractor.js";
import { MarcXmlExtractor } from "./marcxml-extractor.js";
import { ModsExtractor } from "./mods-extractor.js";
import { PicaExtractor } from "./pica-extractor.js";
import { TurboMarcExtractor } from "./turbomarc-extractor.js";

const EXTRACTORS: Readonly<Record<RecordFormat, RecordExtractor>> = {
  [RecordFormat.MARCXML]: new MarcXmlExtractor(RecordFormat.MARCXML),
  [RecordFormat.MARCXML_LEGACY]: new MarcXmlExtractor(RecordFormat.MARCXML_LEGACY),
  [RecordFormat.TURBOMARC]: new TurboMarcExtractor(),
  [RecordFormat.MODS]: new ModsExtractor(RecordFormat.MODS),
  [RecordFormat.MODS36]: new ModsExtractor(RecordFormat.MODS36),
  [RecordFormat.PICA]: new PicaExtractor(RecordFormat.PICA),
  [RecordFormat.DUBLIN_CORE]: new DublinCoreExtractor(RecordFormat.DUBLIN_CORE),
  [RecordFormat.ISBD]: new IsbdExtractor(RecordFormat.ISBD),
  [RecordFormat.MADS]: new MadsExtractor(RecordFormat.MADS),
};

/** The extractor for a record schema. */
export function getExtractor(format: RecordFormat): RecordExtractor {
  return EXTRACTORS[format];
}

export { RecordExtractor } from "./base-extractor.js";
export type {
  ExtractedFields,
  Extraction,
  FieldFailure,
  FieldName,
} from "./base-extractor.js";
