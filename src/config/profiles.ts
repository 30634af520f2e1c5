// ---------------------------------------------------------------------------
// Catalog profile loader.
// Reads named SRU endpoints from config/profiles.yaml and validates them
// with Zod.
// ---------------------------------------------------------------------------

import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { parse } from "yaml";
import { z } from "zod";

import type { CatalogProfile } from "../core/types.js";
import { ConfigurationError } from "../core/errors.js";

export const DEFAULT_PROFILE = "swb";

export const DEFAULT_PROFILES_FILE = fileURLToPath(
  new URL("../../config/profiles.yaml", import.meta.url),
);

// ── Zod schemas ─────────────────────────────────────────────────────────────

export const CatalogProfileSchema = z.object({
  name: z
    .string()
    .min(1)
    .transform((name) => name.toLowerCase()),
  url: z.string().url(),
  displayName: z.string().min(1),
  description: z.string().default(""),
  region: z.string().default(""),
  capabilities: z
    .object({
      sru2: z.boolean().default(true),
      bareIdentifiers: z.boolean().default(false),
    })
    .default({}),
});

const ProfilesFileSchema = z.object({
  profiles: z.array(CatalogProfileSchema).min(1),
});

// ── Loading ─────────────────────────────────────────────────────────────────

const cache = new Map<string, ReadonlyMap<string, CatalogProfile>>();

/**
 * Load and validate a profiles file.  Results are cached per path.
 *
 * @throws ConfigurationError  when the file is missing, not YAML, fails
 *   validation or defines a name twice.
 */
export function loadProfiles(
  file: string = DEFAULT_PROFILES_FILE,
): ReadonlyMap<string, CatalogProfile> {
  const cached = cache.get(file);
  if (cached) return cached;

  let raw: unknown;
  try {
    raw = parse(fs.readFileSync(file, "utf-8"));
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Cannot read profiles from ${file}: ${msg}`, {
      cause: err,
    });
  }

  const result = ProfilesFileSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigurationError(
      `Invalid profiles file ${file}: ${issue?.path.join(".") ?? ""} ${issue?.message ?? ""}`.trim(),
      { cause: result.error },
    );
  }

  const profiles = new Map<string, CatalogProfile>();
  for (const profile of result.data.profiles) {
    if (profiles.has(profile.name)) {
      throw new ConfigurationError(`Duplicate profile "${profile.name}" in ${file}`);
    }
    profiles.set(profile.name, Object.freeze(profile));
  }

  cache.set(file, profiles);
  return profiles;
}

/**
 * Look a profile up by name, ignoring case.
 *
 * @throws ConfigurationError  for an unknown name; the message lists the
 *   available profiles.
 */
export function getProfile(name: string, file?: string): CatalogProfile {
  const profiles = loadProfiles(file);
  const profile = profiles.get(name.trim().toLowerCase());
  if (!profile) {
    const available = [...profiles.keys()].sort().join(", ");
    throw new ConfigurationError(
      `Unknown profile '${name}'. Available profiles: ${available}`,
    );
  }
  return profile;
}

/** All profiles, sorted by name. */
export function listProfiles(file?: string): CatalogProfile[] {
  return [...loadProfiles(file).values()].sort((a, b) => a.name.localeCompare(b.name));
}
