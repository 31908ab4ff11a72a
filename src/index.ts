#!/usr/bin/env node
import { pathToFileURL } from "url";
import { runCli } from "./cli.js";

const executedDirectly = process.argv[1]
  ? pathToFileURL(process.argv[1]).href === import.meta.url
  : false;

if (executedDirectly) {
  void runCli(process.argv);
}

export { runCli };
export { ChannelProvider } from "./channel.js";
export { ChannelFetcher } from "./fetcher.js";
export type { ChannelDownloader, FetchedChannel } from "./fetcher.js";
export { DEFAULT_SETTINGS, loadSettings } from "./config.js";
export { ChannelError, DownloaderError, InvalidChannelFileError, SchemaVersionError } from "./errors.js";
export { SchemaVersion, SCHEMA_MAJORS } from "./schema-version.js";
export type { SchemaMajor } from "./schema-version.js";
export { SCHEMA_STRATEGIES, strategyFor } from "./schema.js";
export type { SchemaStrategy } from "./schema.js";
export { normalizeReleases, platformsToReleases } from "./releases.js";
export { Downloader } from "./utils/http.js";
export { resolveRepositoryUrl, updateUrl } from "./utils/url.js";
export { compareVersions, parseVersion, versionSort } from "./utils/versions.js";
export type {
  ChannelSettings,
  JsonObject,
  JsonValue,
  LibraryRecord,
  PackageRecord,
  RecordMap,
  ReleaseRecord
} from "./types.js";
