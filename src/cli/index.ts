// ---------------------------------------------------------------------------
// sru-catalog: command-line front end for the SRU client.
//
// Usage:
//   sru-catalog search <query> [--index title] [--max 10] [--start 1] ...
//   sru-catalog isbn <isbn>
//   sru-catalog issn <issn>
//   sru-catalog related <ppn> --relation child [--record-type bibliographic]
//   sru-catalog scan <clause> [--terms 20] [--position 1]
//   sru-catalog explain
//   sru-catalog profiles
//
// Common options:
//   --profile <name>   Catalog profile (default: swb, or SRU_PROFILE)
//   --url <url>        Custom SRU endpoint; overrides --profile
//   --json             Print the response as JSON
//   --verbose          Debug logging to stderr
// ---------------------------------------------------------------------------

import { parseArgs } from "node:util";

import {
  RecordFormat,
  RecordPacking,
  RecordType,
  RelationType,
  SearchIndex,
  SortBy,
  SortOrder,
} from "../core/types.js";
import { ValidationError } from "../core/errors.js";
import { loadConfig } from "../config/config.js";
import { listProfiles } from "../config/profiles.js";
import { createLogger } from "../logging/logger.js";
import { SruClient } from "../client/sru-client.js";
import {
  formatError,
  formatExplainResponse,
  formatProfiles,
  formatScanResponse,
  formatSearchResponse,
} from "./format.js";

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

const processIo: CliIo = {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
};

export const EXIT = {
  OK: 0,
  FAILURE: 1,
  USAGE: 2,
} as const;

const USAGE = `Usage: sru-catalog <command> [arguments] [options]

Commands:
  search <query>     Search the catalog (default index: title)
  isbn <isbn>        Search by ISBN
  issn <issn>        Search by ISSN
  related <ppn>      Records linked to a PPN (--relation required)
  scan <clause>      Browse index terms, e.g. "pica.per=Goe"
  explain            Show server capabilities
  profiles           List catalog profiles

Options:
  --profile <name>       Catalog profile
  --url <url>            Custom SRU endpoint URL
  --index <name>         title, author, subject, isbn, issn, publisher, year, all, keyword, cql
  --format <name>        marcxml, marcxml-legacy, mods, mods36, picaxml, dc, isbd, turbomarc, mads
  --max <n>              Records per page (default 10)
  --start <n>            First record position (default 1)
  --sort <key>           relevance, year, author, title
  --order <dir>          ascending, descending (default descending)
  --facets <list>        Comma-separated facet indices (SRU 2.0)
  --facet-limit <n>      Values per facet (default 10)
  --packing <mode>       xml or string
  --no-holdings          Skip holdings extraction
  --relation <type>      family, parent, child, related, thesaurus
  --record-type <type>   bibliographic or authority
  --terms <n>            Scan: number of terms (default 20)
  --position <n>         Scan: response position (default 1)
  --json                 Print JSON
  --verbose              Debug logging to stderr
  --help                 Show this help`;

const OPTIONS = {
  profile: { type: "string" },
  url: { type: "string" },
  index: { type: "string" },
  format: { type: "string" },
  max: { type: "string" },
  start: { type: "string" },
  sort: { type: "string" },
  order: { type: "string" },
  facets: { type: "string" },
  "facet-limit": { type: "string" },
  packing: { type: "string" },
  "no-holdings": { type: "boolean", default: false },
  relation: { type: "string" },
  "record-type": { type: "string" },
  terms: { type: "string" },
  position: { type: "string" },
  json: { type: "boolean", default: false },
  verbose: { type: "boolean", default: false },
  help: { type: "boolean", short: "h", default: false },
} as const;

// ── Option conversion ───────────────────────────────────────────────────────

/** Accept an enum member by key (`title`) or by wire value (`pica.tit`). */
export function pickEnum<T extends string>(
  members: Readonly<Record<string, T>>,
  input: string,
  flag: string,
): T {
  const wanted = input.trim().toLowerCase();
  for (const [key, value] of Object.entries(members)) {
    if (key.toLowerCase() === wanted || value.toLowerCase() === wanted) return value;
  }
  const keys = Object.keys(members).map((k) => k.toLowerCase()).join(", ");
  throw new ValidationError(`Unknown ${flag} "${input}". Choose one of: ${keys}`, [
    { path: flag, message: "unknown value" },
  ]);
}

const RELATION_ALIASES: Readonly<Record<string, RelationType>> = {
  family: RelationType.FAMILY,
  parent: RelationType.PARENT,
  child: RelationType.CHILD,
  related: RelationType.RELATED,
  thesaurus: RelationType.THESAURUS,
};

const RECORD_TYPE_ALIASES: Readonly<Record<string, RecordType>> = {
  bibliographic: RecordType.BIBLIOGRAPHIC,
  authority: RecordType.AUTHORITY,
};

function toInt(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  if (!/^-?\d+$/.test(value.trim())) {
    throw new ValidationError(`--${flag} must be an integer, got "${value}"`, [
      { path: flag, message: "not an integer" },
    ]);
  }
  return Number.parseInt(value, 10);
}

function parseCommandLine(argv: readonly string[]) {
  return parseArgs({ args: [...argv], options: OPTIONS, allowPositionals: true });
}

// ── Entry point ─────────────────────────────────────────────────────────────

/**
 * Run one CLI invocation.
 *
 * @returns  Process exit code.
 */
export async function main(
  argv: readonly string[],
  io: CliIo = processIo,
  env: Record<string, string | undefined> = process.env,
): Promise<number> {
  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(argv);
  } catch (err: unknown) {
    io.err(err instanceof Error ? err.message : String(err));
    io.err(USAGE);
    return EXIT.USAGE;
  }
  const { values, positionals } = parsed;
  const [command, argument] = positionals;

  if (values.help) {
    io.out(USAGE);
    return EXIT.OK;
  }
  if (command === undefined) {
    io.err(USAGE);
    return EXIT.USAGE;
  }

  let client: SruClient | undefined;
  try {
    const config = loadConfig(env);
    const profile = values.profile ?? config.profile;

    if (command === "profiles") {
      const profiles = listProfiles();
      if (values.json) io.out(JSON.stringify(profiles, null, 2));
      else formatProfiles(profiles, profile).forEach((line) => io.out(line));
      return EXIT.OK;
    }

    const logger = createLogger({
      ...config.logging,
      level: values.verbose ? "debug" : "warn",
    });
    client = SruClient.fromConfig(
      { ...config, profile, ...(values.url !== undefined ? { baseUrl: values.url } : {}) },
      logger,
    );

    const needArgument = (what: string): string => {
      if (argument === undefined) {
        throw new ValidationError(`The ${command} command needs ${what}`, [
          { path: what, message: "missing argument" },
        ]);
      }
      return argument;
    };

    const common = {
      format: values.format === undefined ? undefined : pickEnum(RecordFormat, values.format, "format"),
      maximumRecords: toInt(values.max, "max"),
      startRecord: toInt(values.start, "start"),
      recordPacking:
        values.packing === undefined ? undefined : pickEnum(RecordPacking, values.packing, "packing"),
      holdings: values["no-holdings"] ? false : undefined,
    };
    const sorting = {
      sortBy: values.sort === undefined ? undefined : pickEnum(SortBy, values.sort, "sort"),
      sortOrder: values.order === undefined ? undefined : pickEnum(SortOrder, values.order, "order"),
    };
    const startRecord = common.startRecord ?? 1;

    switch (command) {
      case "search": {
        const query = needArgument("a query");
        const index =
          values.index === undefined
            ? undefined
            : values.index.toLowerCase() === "cql"
              ? null
              : pickEnum(SearchIndex, values.index, "index");
        const facets = values.facets
          ?.split(",")
          .map((f) => f.trim())
          .filter((f) => f !== "");
        const response = await client.search(query, {
          ...common,
          ...sorting,
          index,
          facets,
          facetLimit: toInt(values["facet-limit"], "facet-limit"),
        });
        print(io, values.json, response, () => formatSearchResponse(response, startRecord));
        return EXIT.OK;
      }

      case "isbn":
      case "issn": {
        const identifier = needArgument(`an ${command.toUpperCase()}`);
        const response =
          command === "isbn"
            ? await client.searchByIsbn(identifier, common)
            : await client.searchByIssn(identifier, common);
        print(io, values.json, response, () => formatSearchResponse(response, startRecord));
        return EXIT.OK;
      }

      case "related": {
        const ppn = needArgument("a PPN");
        if (values.relation === undefined) {
          throw new ValidationError("The related command needs --relation", [
            { path: "relation", message: "missing option" },
          ]);
        }
        const relation = pickEnum(RELATION_ALIASES, values.relation, "relation");
        const recordType =
          values["record-type"] === undefined
            ? undefined
            : pickEnum(RECORD_TYPE_ALIASES, values["record-type"], "record-type");
        const response = await client.searchRelated(ppn, relation, {
          ...common,
          ...sorting,
          recordType,
        });
        print(io, values.json, response, () => formatSearchResponse(response, startRecord));
        return EXIT.OK;
      }

      case "scan": {
        const clause = needArgument("a scan clause");
        const response = await client.scan(
          clause,
          {
            maximumTerms: toInt(values.terms, "terms"),
            responsePosition: toInt(values.position, "position"),
          },
        );
        print(io, values.json, response, () => formatScanResponse(response));
        return EXIT.OK;
      }

      case "explain": {
        const response = await client.explain();
        print(io, values.json, response, () => formatExplainResponse(response));
        return EXIT.OK;
      }

      default:
        io.err(`Unknown command "${command}"`);
        io.err(USAGE);
        return EXIT.USAGE;
    }
  } catch (err: unknown) {
    io.err(formatError(err));
    return EXIT.FAILURE;
  } finally {
    client?.close();
  }
}

function print(io: CliIo, json: boolean, value: unknown, render: () => string[]): void {
  if (json) {
    io.out(JSON.stringify(value, null, 2));
    return;
  }
  for (const line of render()) io.out(line);
}
