import { SchemaVersionError } from "./errors.js";
import { JsonValue } from "./types.js";

/**
 * Schema generations this resolver understands.
 */
export const SCHEMA_MAJORS = [1, 2, 3, 4] as const;

export type SchemaMajor = (typeof SCHEMA_MAJORS)[number];

const KNOWN_VERSIONS = ["1.0", "1.1", "1.2", "2.0", "3.0.0", "4.0.0"] as const;

const VERSION_PATTERN = /^(\d+)(?:\.(\d+))?(?:\.(\d+))?$/;

function isSchemaMajor(value: number): value is SchemaMajor {
  return SCHEMA_MAJORS.some(major => major === value);
}

function unrecognized(): SchemaVersionError {
  const head = KNOWN_VERSIONS.slice(0, -1).join(", ");
  const last = KNOWN_VERSIONS[KNOWN_VERSIONS.length - 1];
  return new SchemaVersionError(`the "schema_version" is not recognized. Must be one of: ${head} or ${last}.`);
}

/**
 * Parsed `schema_version` of a channel document.
 *
 * Legacy documents store the version as a bare number (`2`, `3.0`); current ones as a string (`"4.0.0"`).
 */
export class SchemaVersion {
  private constructor(
    readonly raw: string,
    readonly major: SchemaMajor,
    readonly minor: number,
    readonly patch: number
  ) {}

  /**
   * @throws SchemaVersionError when the value is missing, not a number or string, or names an unknown major version.
   */
  static parse(raw: JsonValue | undefined): SchemaVersion {
    let text: string;
    if (typeof raw === "number") {
      text = Number.isInteger(raw) ? `${raw}.0` : String(raw);
    } else if (typeof raw === "string") {
      text = raw.trim();
    } else {
      throw unrecognized();
    }

    const match = VERSION_PATTERN.exec(text);
    if (!match) {
      throw unrecognized();
    }
    const major = Number.parseInt(match[1], 10);
    if (!isSchemaMajor(major)) {
      throw unrecognized();
    }
    return new SchemaVersion(
      text,
      major,
      match[2] === undefined ? 0 : Number.parseInt(match[2], 10),
      match[3] === undefined ? 0 : Number.parseInt(match[3], 10)
    );
  }

  toString(): string {
    return this.raw;
  }
}
