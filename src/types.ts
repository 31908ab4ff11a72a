/**
 * JSON-like value type used for permissive properties without `any` usage.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Plain JSON object as decoded from a channel file.
 */
export type JsonObject = { readonly [key: string]: JsonValue };

/**
 * Settings shared by a channel provider and its downloader.
 *
 * @property cacheLength - Seconds a downloaded response stays in the in-memory cache; 0 disables it.
 * @property debug - Emit diagnostic output for this provider regardless of the log level.
 * @property timeout - Request timeout in seconds.
 * @property userAgent - Value of the User-Agent header.
 * @property queryStringParams - Extra query parameters appended to requests, keyed by host name.
 */
export interface ChannelSettings {
  readonly cacheLength: number;
  readonly debug: boolean;
  readonly timeout: number;
  readonly userAgent: string;
  readonly httpProxy?: string;
  readonly httpsProxy?: string;
  readonly proxyUsername?: string;
  readonly proxyPassword?: string;
  readonly queryStringParams?: { readonly [host: string]: { readonly [param: string]: string } };
}

/**
 * A single downloadable release of a package or library.
 *
 * @property sublime_text - Version constraint of the host editor, e.g. `*` or `>=4000`.
 * @property platforms - Platform identifiers; `["*"]` means every platform.
 * @property libraries - Names of libraries the release requires.
 * @property sha256 - Hex digest, only present on library releases.
 * @property extra - Fields not modeled above, retained as published.
 */
export interface ReleaseRecord {
  readonly sublime_text: string;
  readonly platforms: readonly string[];
  readonly version: string;
  readonly url: string | null;
  readonly date: string | null;
  readonly libraries?: readonly string[];
  readonly sha256?: string;
  readonly extra: JsonObject;
}

/**
 * Canonical package entry returned by `ChannelProvider.getPackages`.
 *
 * Invariant: `releases` is ordered newest first.
 */
export interface PackageRecord {
  readonly name: string;
  readonly description: string | null;
  readonly author: string | readonly string[] | null;
  readonly homepage: string | null;
  readonly last_modified: string | null;
  readonly releases: readonly ReleaseRecord[];
  readonly previous_names: readonly string[];
  readonly labels: readonly string[];
  readonly readme: string | null;
  readonly issues: string | null;
  readonly donate: string | null;
  readonly buy: string | null;
  readonly extra: JsonObject;
}

/**
 * Canonical library entry returned by `ChannelProvider.getLibraries`.
 *
 * @property load_order - Two character string controlling load sequence.
 */
export interface LibraryRecord {
  readonly name: string;
  readonly load_order: string | null;
  readonly description: string | null;
  readonly author: string | readonly string[] | null;
  readonly issues: string | null;
  readonly releases: readonly ReleaseRecord[];
  readonly extra: JsonObject;
}

/**
 * Mapping of record name to record, as returned by the query API.
 */
export type RecordMap<T> = { readonly [name: string]: T };
