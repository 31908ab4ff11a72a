import path from "node:path";
import { debug } from "../logger.js";

const SCHEME_PATTERN = /^(https?:)\/\//i;

const RETIRED_CHANNELS = new Set([
  "https://sublime.wbond.net/repositories.json",
  "https://sublime.wbond.net/channel.json"
]);

const CURRENT_CHANNEL = "https://packagecontrol.io/channel_v3.json";

/**
 * Whether a channel location is fetched over HTTP(S) rather than read from disk.
 */
export function isHttpUrl(location: string): boolean {
  return SCHEME_PATTERN.test(location);
}

/**
 * Map URLs of retired hosting endpoints to their current equivalents.
 *
 * Pure apart from the optional debug line; URLs that need no change are returned as given.
 */
export function updateUrl(url: string, debugEnabled = false): string {
  if (!url) {
    return url;
  }
  let updated = url
    .replace("://raw.github.com/", "://raw.githubusercontent.com/")
    .replace("://nodeload.github.com/", "://codeload.github.com/")
    .replace(/^(https:\/\/codeload\.github\.com\/[^/#?]+\/[^/#?]+\/)zipball(\/.*)$/, "$1zip$2");

  if (RETIRED_CHANNELS.has(updated)) {
    updated = CURRENT_CHANNEL;
  }

  if (updated !== url) {
    debug(`Fixed URL from ${url} to ${updated}`, debugEnabled);
  }
  return updated;
}

/**
 * Resolve a repository entry of a channel against the channel's own location.
 *
 * @param entry - Value from the channel's `repositories` list.
 * @param channelLocation - URL or filesystem path the channel was loaded from.
 * @returns Absolute URL or path, or `null` for root-absolute entries, which channels may not reference.
 */
export function resolveRepositoryUrl(entry: string, channelLocation: string, debugEnabled = false): string | null {
  let resolved = entry;
  if (entry.startsWith("//")) {
    const scheme = SCHEME_PATTERN.exec(channelLocation);
    resolved = `${scheme ? scheme[1] : "https:"}${entry}`;
  } else if (entry.startsWith("/")) {
    return null;
  } else if (entry.startsWith("./") || entry.startsWith("../")) {
    resolved = isHttpUrl(channelLocation)
      ? new URL(entry, channelLocation).toString()
      : path.normalize(path.join(path.dirname(channelLocation), entry));
  }
  return updateUrl(resolved, debugEnabled);
}
