import fs from "fs-extra";
import { ChannelError, InvalidChannelFileError, SchemaVersionError } from "./errors.js";
import { debug } from "./logger.js";
import { SchemaVersion } from "./schema-version.js";
import { isRecord, strategyFor } from "./schema.js";
import { ChannelSettings, JsonObject, JsonValue } from "./types.js";
import { Downloader } from "./utils/http.js";
import { isHttpUrl, updateUrl } from "./utils/url.js";

/**
 * A validated channel document and the schema generation it was written in.
 */
export interface FetchedChannel {
  readonly document: JsonObject;
  readonly schemaVersion: SchemaVersion;
}

type FetchState =
  | { readonly status: "unfetched" }
  | { readonly status: "fetching"; readonly pending: Promise<FetchedChannel> }
  | { readonly status: "fetched"; readonly channel: FetchedChannel };

/**
 * Minimal transport contract the fetcher depends on.
 */
export interface ChannelDownloader {
  fetch(url: string, errorContext: string): Promise<Buffer>;
}

function rewriteCacheKeys(cache: JsonValue, debugEnabled: boolean): JsonValue {
  if (!isRecord(cache)) {
    return cache;
  }
  return Object.fromEntries(
    Object.entries(cache).map(([repository, records]) => [updateUrl(repository, debugEnabled), records])
  );
}

/**
 * Loads a channel document once and keeps it for the lifetime of the instance.
 *
 * Concurrent callers share one in-flight load. A failed load leaves the fetcher unfetched,
 * so every later call reproduces the failure instead of returning a partial document.
 */
export class ChannelFetcher {
  private state: FetchState = { status: "unfetched" };
  private readonly downloader: ChannelDownloader;

  constructor(
    readonly channelUrl: string,
    private readonly settings: ChannelSettings,
    downloader?: ChannelDownloader
  ) {
    this.downloader = downloader ?? new Downloader(settings);
  }

  /**
   * @throws InvalidChannelFileError when the JSON or its `schema_version` is unusable.
   * @throws ChannelError when a filesystem channel does not exist.
   * @throws DownloaderError when an HTTP(S) channel cannot be downloaded.
   */
  async fetch(): Promise<FetchedChannel> {
    switch (this.state.status) {
      case "fetched":
        return this.state.channel;
      case "fetching":
        return this.state.pending;
      case "unfetched": {
        const pending = this.load();
        this.state = { status: "fetching", pending };
        try {
          const channel = await pending;
          this.state = { status: "fetched", channel };
          return channel;
        } catch (loadError) {
          this.state = { status: "unfetched" };
          throw loadError;
        }
      }
    }
  }

  private async readBytes(): Promise<Buffer> {
    if (isHttpUrl(this.channelUrl)) {
      return this.downloader.fetch(this.channelUrl, "Error downloading channel.");
    }
    if (!(await fs.pathExists(this.channelUrl))) {
      throw new ChannelError(`Error, file ${this.channelUrl} does not exist`, { channel: this.channelUrl });
    }
    debug(`Loading ${this.channelUrl} as a channel`, this.settings.debug);
    try {
      return await fs.readFile(this.channelUrl);
    } catch (readError) {
      const reason = readError instanceof Error ? readError.message : String(readError);
      throw new ChannelError(`Error reading channel file ${this.channelUrl}: ${reason}`, {
        channel: this.channelUrl,
        cause: readError
      });
    }
  }

  private async load(): Promise<FetchedChannel> {
    const bytes = await this.readBytes();

    let parsed: JsonValue;
    try {
      parsed = JSON.parse(new TextDecoder("utf-8", { fatal: true }).decode(bytes));
    } catch (parseError) {
      throw new InvalidChannelFileError(this.channelUrl, "parsing JSON failed.", { cause: parseError });
    }
    if (!isRecord(parsed)) {
      throw new InvalidChannelFileError(this.channelUrl, "parsing JSON failed.");
    }

    if (parsed.schema_version === undefined) {
      throw new InvalidChannelFileError(this.channelUrl, 'the "schema_version" JSON key is missing.');
    }
    let schemaVersion: SchemaVersion;
    try {
      schemaVersion = SchemaVersion.parse(parsed.schema_version);
    } catch (versionError) {
      if (versionError instanceof SchemaVersionError) {
        throw new InvalidChannelFileError(this.channelUrl, versionError.message, { cause: versionError });
      }
      throw versionError;
    }

    const { packagesKey, librariesKey } = strategyFor(schemaVersion);
    const document: { [key: string]: JsonValue } = { ...parsed };
    for (const key of [packagesKey, librariesKey]) {
      if (document[key] !== undefined) {
        document[key] = rewriteCacheKeys(document[key], this.settings.debug);
      }
    }

    debug(`Loaded channel ${this.channelUrl} (schema ${schemaVersion.toString()})`, this.settings.debug);
    return { document, schemaVersion };
  }
}
