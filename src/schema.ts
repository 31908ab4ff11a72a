import { InvalidChannelFileError } from "./errors.js";
import { SchemaMajor, SchemaVersion } from "./schema-version.js";
import { JsonObject, JsonValue, LibraryRecord, PackageRecord, ReleaseRecord } from "./types.js";

/**
 * Per-generation layout of a channel document.
 *
 * @property packagesKey - Top-level key holding `repository URL -> package records`.
 * @property librariesKey - Top-level key holding `repository URL -> library records`.
 * @property nameMapFromDocument - `package_name_map` is read from the document; later generations retired it.
 * @property renamedFromDocument - `renamed_packages` is read from the document instead of derived from `previous_names`.
 * @property releasesFromPlatforms - Packages carry `platforms` instead of a `releases` list.
 * @property renameDependencies - Releases name required libraries `dependencies` rather than `libraries`.
 */
export interface SchemaStrategy {
  readonly packagesKey: "packages" | "packages_cache";
  readonly librariesKey: "dependencies_cache" | "libraries_cache";
  readonly nameMapFromDocument: boolean;
  readonly renamedFromDocument: boolean;
  readonly releasesFromPlatforms: boolean;
  readonly renameDependencies: boolean;
}

const CACHED_RELEASES: SchemaStrategy = {
  packagesKey: "packages_cache",
  librariesKey: "dependencies_cache",
  nameMapFromDocument: false,
  renamedFromDocument: false,
  releasesFromPlatforms: false,
  renameDependencies: true
};

export const SCHEMA_STRATEGIES: Record<SchemaMajor, SchemaStrategy> = {
  1: {
    packagesKey: "packages",
    librariesKey: "dependencies_cache",
    nameMapFromDocument: true,
    renamedFromDocument: true,
    releasesFromPlatforms: true,
    renameDependencies: true
  },
  2: CACHED_RELEASES,
  3: CACHED_RELEASES,
  4: {
    ...CACHED_RELEASES,
    librariesKey: "libraries_cache",
    renameDependencies: false
  }
};

/**
 * Layout of the channel's schema generation.
 */
export function strategyFor(version: SchemaVersion): SchemaStrategy {
  return SCHEMA_STRATEGIES[version.major];
}

export function isRecord(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read a string field; numbers are stringified, anything else yields `null`.
 */
export function asString(value: JsonValue | undefined): string | null {
  if (typeof value === "string") {
    return value;
  }
  return typeof value === "number" ? String(value) : null;
}

/**
 * Accept both a bare string and a list of strings; anything else yields an empty list.
 */
export function asStringList(value: JsonValue | undefined): string[] {
  if (typeof value === "string") {
    return [value];
  }
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === "string");
  }
  return [];
}

/**
 * Keep the object entries of a list; a non-list yields an empty list.
 */
export function asRecordList(value: JsonValue | undefined): JsonObject[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

function asAuthor(value: JsonValue | undefined): string | readonly string[] | null {
  if (Array.isArray(value)) {
    return asStringList(value);
  }
  return asString(value);
}

export function omitKey(raw: JsonObject, key: string): JsonObject {
  return Object.fromEntries(Object.entries(raw).filter(([name]) => name !== key));
}

function extraFields(raw: JsonObject, modeled: ReadonlySet<string>): JsonObject {
  return Object.fromEntries(Object.entries(raw).filter(([key]) => !modeled.has(key)));
}

const RELEASE_KEYS = new Set(["sublime_text", "platforms", "version", "url", "date", "libraries", "sha256"]);

const PACKAGE_KEYS = new Set([
  "name",
  "description",
  "author",
  "homepage",
  "last_modified",
  "releases",
  "previous_names",
  "labels",
  "readme",
  "issues",
  "donate",
  "buy"
]);

const LIBRARY_KEYS = new Set(["name", "load_order", "description", "author", "issues", "releases"]);

/**
 * Convert one raw release into its canonical shape. `platforms: "*"` becomes `["*"]`, a missing
 * `platforms` defaults to `["*"]`, and an explicit empty list stays empty.
 */
export function toReleaseRecord(raw: JsonObject): ReleaseRecord {
  const sha256 = asString(raw.sha256);
  return {
    sublime_text: asString(raw.sublime_text) ?? "*",
    platforms: raw.platforms === undefined ? ["*"] : asStringList(raw.platforms),
    version: asString(raw.version) ?? "",
    url: asString(raw.url),
    date: asString(raw.date),
    ...(raw.libraries !== undefined ? { libraries: asStringList(raw.libraries) } : {}),
    ...(sha256 !== null ? { sha256 } : {}),
    extra: extraFields(raw, RELEASE_KEYS)
  };
}

/**
 * Read the required `name` of a package or library record.
 *
 * @throws InvalidChannelFileError when the record has no string name.
 */
export function requireName(raw: JsonObject, channel: string, cacheKey: string): string {
  const name = raw.name;
  if (typeof name !== "string" || name === "") {
    throw new InvalidChannelFileError(channel, `a record under "${cacheKey}" has no "name".`);
  }
  return name;
}

/**
 * Build a canonical package with defaults for every field older generations omit.
 */
export function toPackageRecord(
  raw: JsonObject,
  name: string,
  releases: readonly ReleaseRecord[],
  lastModified: string | null
): PackageRecord {
  return {
    name,
    description: asString(raw.description),
    author: asAuthor(raw.author),
    homepage: asString(raw.homepage),
    last_modified: lastModified,
    releases,
    previous_names: asStringList(raw.previous_names),
    labels: asStringList(raw.labels),
    readme: asString(raw.readme),
    issues: asString(raw.issues),
    donate: asString(raw.donate),
    buy: asString(raw.buy),
    extra: extraFields(raw, PACKAGE_KEYS)
  };
}

/**
 * Build a canonical library; `load_order` and the descriptive fields default to `null`.
 */
export function toLibraryRecord(raw: JsonObject, name: string, releases: readonly ReleaseRecord[]): LibraryRecord {
  return {
    name,
    load_order: asString(raw.load_order),
    description: asString(raw.description),
    author: asAuthor(raw.author),
    issues: asString(raw.issues),
    releases,
    extra: extraFields(raw, LIBRARY_KEYS)
  };
}
