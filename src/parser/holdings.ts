// ---------------------------------------------------------------------------
// Local holdings (MARC 924).
//
// K10plus-family catalogs embed one 924 per holding library:
//   924$b - ISIL of the library (occurrence ignored without it)
//   924$g - Collection / call number area
//   924$k - Access URL
//   924$l - Access note (repeatable)
// ---------------------------------------------------------------------------

import fs from "node:fs";
import { z } from "zod";

import type { HoldingEntry } from "../core/types.js";
import { ConfigurationError } from "../core/errors.js";

/** Subfield access for one 924 occurrence, whatever its XML encoding. */
export interface HoldingField {
  values(code: string): string[];
}

const LIBRARY_NAMES_FILE = new URL("../../data/library-names.json", import.meta.url);

const LibraryNamesSchema = z.record(z.string().min(1));

let libraryNames: Readonly<Record<string, string>> | undefined;

function loadLibraryNames(): Readonly<Record<string, string>> {
  if (libraryNames) return libraryNames;

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(LIBRARY_NAMES_FILE, "utf-8"));
  } catch (err: unknown) {
    throw new ConfigurationError(
      `Cannot read library name table ${LIBRARY_NAMES_FILE.pathname}`,
      { cause: err },
    );
  }

  const parsed = LibraryNamesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Library name table is invalid: ${parsed.error.issues[0]?.message ?? "unknown"}`,
    );
  }
  libraryNames = parsed.data;
  return libraryNames;
}

/**
 * Human-readable name for an ISIL.  Unknown German ISILs become
 * `German Library (DE-…)`, anything else `Library (…)`.
 */
export function resolveLibraryName(code: string): string {
  const known = loadLibraryNames()[code];
  if (known) return known;
  return code.startsWith("DE-")
    ? `German Library (${code})`
    : `Library (${code})`;
}

/**
 * Turn 924 occurrences into holding entries, in document order.
 */
export function buildHoldings(fields: readonly HoldingField[]): HoldingEntry[] {
  const holdings: HoldingEntry[] = [];

  for (const field of fields) {
    const libraryCode = field.values("b")[0]?.trim();
    if (!libraryCode) continue;

    const entry: HoldingEntry = {
      libraryCode,
      libraryName: resolveLibraryName(libraryCode),
    };

    const collection = field.values("g")[0]?.trim();
    if (collection) entry.collection = collection;

    const accessUrl = field.values("k")[0]?.trim();
    if (accessUrl) entry.accessUrl = accessUrl;

    const notes = field.values("l").map((n) => n.trim()).filter((n) => n !== "");
    if (notes.length > 0) entry.accessNote = notes.join(" / ");

    holdings.push(Object.freeze(entry));
  }

  return holdings;
}
