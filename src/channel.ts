import { InvalidChannelFileError } from "./errors.js";
import { ChannelDownloader, ChannelFetcher, FetchedChannel } from "./fetcher.js";
import { normalizeReleases } from "./releases.js";
import { SchemaVersion } from "./schema-version.js";
import {
  SchemaStrategy,
  asRecordList,
  asStringList,
  isRecord,
  omitKey,
  requireName,
  strategyFor,
  toLibraryRecord,
  toPackageRecord
} from "./schema.js";
import { ChannelSettings, JsonObject, JsonValue, LibraryRecord, PackageRecord, RecordMap } from "./types.js";
import { versionSort } from "./utils/versions.js";
import { resolveRepositoryUrl, updateUrl } from "./utils/url.js";

function stringMap(value: JsonValue | undefined): Record<string, string> {
  if (!isRecord(value)) {
    return {};
  }
  return Object.fromEntries(
    Object.entries(value).filter((pair): pair is [string, string] => typeof pair[1] === "string")
  );
}

/**
 * Retrieves a channel and provides an API into the information it caches.
 *
 * A channel lists repository URLs and caches the packages and libraries each of them publishes,
 * so clients do not have to query every repository. The document is loaded on the first query
 * and reused afterwards; construct a new provider to load it again.
 *
 * @example
 * const provider = new ChannelProvider("https://example.com/channel.json", loadSettings());
 * const repositories = await provider.getRepositories();
 * const packages = await provider.getPackages(repositories[0]);
 */
export class ChannelProvider {
  private readonly fetcher: ChannelFetcher;

  constructor(
    readonly channelUrl: string,
    readonly settings: ChannelSettings,
    downloader?: ChannelDownloader
  ) {
    this.fetcher = new ChannelFetcher(channelUrl, settings, downloader);
  }

  /**
   * Indicates if this provider can handle the provided channel URL.
   */
  static matchUrl(_channelUrl: string): boolean {
    return true;
  }

  /**
   * Load the channel ahead of the first query.
   */
  async prefetch(): Promise<void> {
    await this.fetcher.fetch();
  }

  /**
   * Retrieve and validate the channel document. Runs once per provider.
   */
  fetch(): Promise<FetchedChannel> {
    return this.fetcher.fetch();
  }

  /**
   * Schema generation of the loaded channel.
   */
  async getSchemaVersion(): Promise<SchemaVersion> {
    const { schemaVersion } = await this.fetcher.fetch();
    return schemaVersion;
  }

  /**
   * @returns Mapping of URL slug to package name; empty from schema 2.0 on.
   */
  async getNameMap(): Promise<Record<string, string>> {
    const { document, schemaVersion } = await this.fetcher.fetch();
    return strategyFor(schemaVersion).nameMapFromDocument ? stringMap(document.package_name_map) : {};
  }

  /**
   * @returns Mapping of previous package name to current name.
   */
  async getRenamedPackages(): Promise<Record<string, string>> {
    const { document, schemaVersion } = await this.fetcher.fetch();
    const strategy = strategyFor(schemaVersion);
    if (strategy.renamedFromDocument) {
      return stringMap(document.renamed_packages);
    }

    const cache = document[strategy.packagesKey];
    if (!isRecord(cache)) {
      return {};
    }
    const renamed: Array<[string, string]> = [];
    for (const records of Object.values(cache)) {
      for (const raw of asRecordList(records)) {
        const name = requireName(raw, this.channelUrl, strategy.packagesKey);
        for (const previousName of asStringList(raw.previous_names)) {
          renamed.push([previousName, name]);
        }
      }
    }
    return Object.fromEntries(renamed);
  }

  /**
   * @returns Repository URLs and paths, relative entries resolved against the channel location.
   * @throws InvalidChannelFileError when the channel has no `repositories` key.
   */
  async getRepositories(): Promise<string[]> {
    const { document } = await this.fetcher.fetch();
    if (document.repositories === undefined) {
      throw new InvalidChannelFileError(this.channelUrl, 'the "repositories" JSON key is missing.');
    }
    if (!Array.isArray(document.repositories)) {
      throw new InvalidChannelFileError(this.channelUrl, 'the "repositories" JSON key is not a list.');
    }
    const output: string[] = [];
    for (const entry of asStringList(document.repositories)) {
      const resolved = resolveRepositoryUrl(entry, this.channelUrl, this.settings.debug);
      if (resolved !== null) {
        output.push(resolved);
      }
    }
    return output;
  }

  /**
   * @returns URLs and paths directly referenced by the channel.
   */
  getSources(): Promise<string[]> {
    return this.getRepositories();
  }

  /**
   * Cached package info of one repository, keyed by package name.
   *
   * @param repoUrl - Repository URL in any historical form.
   * @returns Empty mapping when the channel caches nothing for the repository.
   */
  async getPackages(repoUrl: string): Promise<RecordMap<PackageRecord>> {
    const { document, schemaVersion } = await this.fetcher.fetch();
    const strategy = strategyFor(schemaVersion);

    const output: Array<[string, PackageRecord]> = [];
    for (const raw of this.cachedRecords(document, strategy.packagesKey, repoUrl)) {
      const name = requireName(raw, this.channelUrl, strategy.packagesKey);
      const { releases, lastModified } = normalizeReleases(raw, strategy, this.settings.debug);
      // first-generation packages keep their downloads under `platforms`, now folded into `releases`
      const source = strategy.releasesFromPlatforms ? omitKey(raw, "platforms") : raw;
      output.push([name, toPackageRecord(source, name, versionSort(releases, "platforms", true), lastModified)]);
    }
    return Object.fromEntries(output);
  }

  /**
   * Cached library info of one repository, keyed by library name.
   *
   * @param repoUrl - Repository URL in any historical form.
   */
  async getLibraries(repoUrl: string): Promise<RecordMap<LibraryRecord>> {
    const { document, schemaVersion } = await this.fetcher.fetch();
    const strategy = strategyFor(schemaVersion);
    const librariesStrategy: SchemaStrategy = { ...strategy, releasesFromPlatforms: false };

    const output: Array<[string, LibraryRecord]> = [];
    for (const raw of this.cachedRecords(document, strategy.librariesKey, repoUrl)) {
      const name = requireName(raw, this.channelUrl, strategy.librariesKey);
      const { releases } = normalizeReleases(raw, librariesStrategy, this.settings.debug);
      output.push([name, toLibraryRecord(raw, name, versionSort(releases, "platforms", true))]);
    }
    return Object.fromEntries(output);
  }

  private cachedRecords(document: JsonObject, cacheKey: string, repoUrl: string): JsonObject[] {
    const cache = document[cacheKey];
    if (!isRecord(cache)) {
      return [];
    }
    return asRecordList(cache[updateUrl(repoUrl, this.settings.debug)]);
  }
}
