import { debug } from "./logger.js";
import { SchemaStrategy, asRecordList, asString, asStringList, isRecord, toReleaseRecord } from "./schema.js";
import { JsonObject, JsonValue, ReleaseRecord } from "./types.js";

const ALL_PLATFORMS = ["linux", "osx", "windows"];

/**
 * Releases of a record together with the newest release date.
 */
export interface NormalizedReleases {
  readonly releases: ReleaseRecord[];
  readonly lastModified: string | null;
}

function coversAllPlatforms(platforms: readonly string[]): boolean {
  const unique = [...new Set(platforms)].sort();
  return unique.length === ALL_PLATFORMS.length && unique.every((platform, index) => platform === ALL_PLATFORMS[index]);
}

/**
 * Build a releases list for a first-generation package, which lists downloads under `platforms`.
 *
 * Accepts both layouts seen in the wild:
 * - `platforms: { "<platform>": [{ version, url }] }`, grouping identical downloads across platforms;
 * - `platforms: ["<platform>", ...]` with `version`, `url` and `date` on the package itself.
 */
export function platformsToReleases(record: JsonObject, debugEnabled = false): JsonObject[] {
  const platforms = record.platforms;
  const output: JsonObject[] = [];

  if (isRecord(platforms)) {
    const grouped = new Map<string, { readonly entry: JsonObject; readonly platforms: string[] }>();
    for (const [platform, downloads] of Object.entries(platforms)) {
      if (!Array.isArray(downloads)) {
        continue;
      }
      for (const download of downloads.filter(isRecord)) {
        const key = `${asString(download.version) ?? ""}-${asString(download.url) ?? ""}`;
        const existing = grouped.get(key);
        if (existing) {
          existing.platforms.push(platform);
        } else {
          grouped.set(key, { entry: download, platforms: [platform] });
        }
      }
    }
    for (const { entry, platforms: names } of grouped.values()) {
      output.push({
        ...entry,
        platforms: coversAllPlatforms(names) ? ["*"] : names,
        sublime_text: "<3000"
      });
    }
  } else {
    const single: { [key: string]: JsonValue } = {
      version: record.version ?? "",
      url: record.url ?? null,
      platforms: platforms === undefined ? ["*"] : asStringList(platforms),
      sublime_text: "<3000"
    };
    if (record.date !== undefined) {
      single.date = record.date;
    }
    output.push(single);
  }

  debug(`Synthesized ${output.length} release(s) for ${asString(record.name) ?? "unnamed package"}`, debugEnabled);
  return output;
}

function renameDependencies(release: JsonObject): JsonObject {
  if (release.dependencies === undefined) {
    return release;
  }
  const { dependencies, ...rest } = release;
  return { ...rest, libraries: dependencies };
}

/**
 * Produce the canonical, still unsorted releases of a raw package or library record.
 *
 * The raw record is left untouched.
 */
export function normalizeReleases(
  record: JsonObject,
  strategy: SchemaStrategy,
  debugEnabled = false
): NormalizedReleases {
  if (strategy.releasesFromPlatforms) {
    return {
      releases: platformsToReleases(record, debugEnabled).map(release => toReleaseRecord(renameDependencies(release))),
      lastModified: asString(record.last_modified)
    };
  }

  let lastModified: string | null = null;
  const releases: ReleaseRecord[] = [];
  for (const raw of asRecordList(record.releases)) {
    const release = toReleaseRecord(strategy.renameDependencies ? renameDependencies(raw) : raw);
    if (release.date !== null && (lastModified === null || release.date > lastModified)) {
      lastModified = release.date;
    }
    releases.push(release);
  }
  return { releases, lastModified };
}
