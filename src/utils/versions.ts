import { warn } from "../logger.js";

/**
 * Parsed form of a release version such as `1.4.2`, `v2.0.0-beta.3` or the date-style `2014.05.09.18.30.00`.
 */
export interface ParsedVersion {
  readonly release: readonly number[];
  readonly prerelease: readonly string[];
}

const VERSION_PATTERN = /^v?(\d+(?:\.\d+)*)(?:-([0-9A-Za-z.-]+))?(?:\+[0-9A-Za-z.-]+)?$/;

export function parseVersion(text: string): ParsedVersion | null {
  const match = VERSION_PATTERN.exec(text.trim());
  if (!match) {
    return null;
  }
  return {
    release: match[1].split(".").map(part => Number.parseInt(part, 10)),
    prerelease: match[2] === undefined ? [] : match[2].split(".")
  };
}

function compareIdentifiers(a: string, b: string): number {
  const aNumeric = /^\d+$/.test(a);
  const bNumeric = /^\d+$/.test(b);
  if (aNumeric && bNumeric) {
    return Number.parseInt(a, 10) - Number.parseInt(b, 10);
  }
  if (aNumeric !== bNumeric) {
    return aNumeric ? -1 : 1;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Order two parsed versions. Missing release parts count as 0 and a prerelease sorts before its release.
 */
export function compareVersions(a: ParsedVersion, b: ParsedVersion): number {
  const length = Math.max(a.release.length, b.release.length);
  for (let i = 0; i < length; i += 1) {
    const diff = (a.release[i] ?? 0) - (b.release[i] ?? 0);
    if (diff !== 0) {
      return Math.sign(diff);
    }
  }
  if (a.prerelease.length === 0 || b.prerelease.length === 0) {
    return Math.sign(b.prerelease.length - a.prerelease.length);
  }
  const identifiers = Math.max(a.prerelease.length, b.prerelease.length);
  for (let i = 0; i < identifiers; i += 1) {
    const left = a.prerelease[i];
    const right = b.prerelease[i];
    if (left === undefined || right === undefined) {
      return left === undefined ? -1 : 1;
    }
    const diff = compareIdentifiers(left, right);
    if (diff !== 0) {
      return Math.sign(diff);
    }
  }
  return 0;
}

function compareLists(a: readonly string[], b: readonly string[]): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i += 1) {
    if (a[i] !== b[i]) {
      return a[i] < b[i] ? -1 : 1;
    }
  }
  return a.length - b.length;
}

type Sortable<K extends string> = { readonly version: string } & Readonly<Record<K, readonly string[]>>;

/**
 * Stable sort of release-like items by version, ties broken by the list stored under `platformKey`.
 *
 * Items whose version cannot be parsed rank below every parseable one and keep their relative order.
 */
export function versionSort<K extends string, T extends Sortable<K>>(
  items: readonly T[],
  platformKey: K,
  reverse = false
): T[] {
  const keyed = items.map((item, index) => ({ item, index, parsed: parseVersion(item.version) }));
  const unparseable = keyed.filter(entry => entry.parsed === null);
  if (unparseable.length > 0) {
    warn(`Unable to parse version(s) ${unparseable.map(entry => JSON.stringify(entry.item.version)).join(", ")}`);
  }
  const platformsOf = (item: Readonly<Record<K, readonly string[]>>): readonly string[] => item[platformKey];
  const direction = reverse ? -1 : 1;
  keyed.sort((a, b) => {
    if (a.parsed === null || b.parsed === null) {
      if (a.parsed === b.parsed) {
        return a.index - b.index;
      }
      // unparseable versions always trail
      return a.parsed === null ? 1 : -1;
    }
    const order = compareVersions(a.parsed, b.parsed) || compareLists(platformsOf(a.item), platformsOf(b.item));
    return order === 0 ? a.index - b.index : order * direction;
  });
  return keyed.map(entry => entry.item);
}
