import path from "node:path";
import { fileURLToPath } from "node:url";
import fs from "fs-extra";
import { describe, expect, it, vi } from "vitest";
import { ChannelProvider } from "../src/channel.js";
import { DEFAULT_SETTINGS } from "../src/config.js";
import { ChannelError, DownloaderError, InvalidChannelFileError } from "../src/errors.js";
import { ChannelSettings } from "../src/types.js";

const fixturesDir = path.dirname(fileURLToPath(new URL("./fixtures/channel-v4.json", import.meta.url)));
const fixture = (name: string): string => path.join(fixturesDir, name);

const settings: ChannelSettings = { ...DEFAULT_SETTINGS, cacheLength: 0 };

const CHANNEL_URL = "http://example.com/channels/channel.json";
const GITHUB_REPO = "https://raw.githubusercontent.com/owner/repo/master/repository.json";

async function httpProvider(name: string) {
  const bytes = await fs.readFile(fixture(name));
  const fetchMock = vi.fn(async (_url: string, _errorContext: string) => bytes);
  return { provider: new ChannelProvider(CHANNEL_URL, settings, { fetch: fetchMock }), fetchMock };
}

function bytesProvider(bytes: Buffer) {
  const fetchMock = vi.fn(async (_url: string, _errorContext: string) => bytes);
  return { provider: new ChannelProvider(CHANNEL_URL, settings, { fetch: fetchMock }), fetchMock };
}

describe("ChannelProvider with a schema 4 channel over HTTP", () => {
  it("resolves repositories against the channel URL and drops root-absolute entries", async () => {
    const { provider } = await httpProvider("channel-v4.json");
    expect(await provider.getRepositories()).toEqual([
      "https://example.com/repo.json",
      "http://cdn.example.com/repo.json",
      "http://example.com/channels/local.json",
      GITHUB_REPO
    ]);
  });

  it("returns the same list from getSources", async () => {
    const { provider } = await httpProvider("channel-v4.json");
    expect(await provider.getSources()).toEqual(await provider.getRepositories());
  });

  it("downloads the channel once across queries", async () => {
    const { provider, fetchMock } = await httpProvider("channel-v4.json");
    await provider.prefetch();
    await Promise.all([provider.getRepositories(), provider.getPackages(GITHUB_REPO)]);
    await provider.getRenamedPackages();
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock).toHaveBeenCalledWith(CHANNEL_URL, "Error downloading channel.");
  });

  it("shares one download between concurrent first queries", async () => {
    const bytes = await fs.readFile(fixture("channel-v4.json"));
    const fetchMock = vi.fn(
      (_url: string, _errorContext: string) =>
        new Promise<Buffer>(resolve => {
          setTimeout(() => resolve(bytes), 10);
        })
    );
    const provider = new ChannelProvider(CHANNEL_URL, settings, { fetch: fetchMock });

    const [repositories, nameMap, renamed] = await Promise.all([
      provider.getRepositories(),
      provider.getNameMap(),
      provider.getRenamedPackages()
    ]);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(repositories).toHaveLength(4);
    expect(nameMap).toEqual({});
    expect(renamed).toEqual({ OldAlpha: "Alpha", OldBeta: "Beta" });
  });

  it("normalizes packages with sorted releases and defaults", async () => {
    const { provider } = await httpProvider("channel-v4.json");
    const packages = await provider.getPackages(GITHUB_REPO);

    expect(Object.keys(packages)).toEqual(["Alpha", "Beta"]);
    expect(packages.Alpha).toEqual({
      name: "Alpha",
      description: "First package",
      author: "alpha-dev",
      homepage: "https://example.com/alpha",
      last_modified: "2021-05-01 00:00:00",
      releases: [
        {
          sublime_text: ">=4000",
          platforms: ["windows"],
          version: "1.2.0",
          url: "https://example.com/alpha-1.2.0.zip",
          date: "2021-05-01 00:00:00",
          libraries: ["lib-a"],
          extra: {}
        },
        {
          sublime_text: "*",
          platforms: ["*"],
          version: "1.0.0",
          url: "https://example.com/alpha-1.0.0.zip",
          date: "2020-01-01 00:00:00",
          extra: {}
        }
      ],
      previous_names: ["OldAlpha"],
      labels: ["linting"],
      readme: null,
      issues: null,
      donate: null,
      buy: null,
      extra: {}
    });
    expect(packages.Beta.last_modified).toBeNull();
    expect(packages.Beta.releases).toEqual([]);
    expect(packages.Beta.labels).toEqual([]);
  });

  it("finds packages when the caller passes a retired repository URL", async () => {
    const { provider } = await httpProvider("channel-v4.json");
    const legacy = await provider.getPackages("https://raw.github.com/owner/repo/master/repository.json");
    expect(Object.keys(legacy)).toEqual(["Alpha", "Beta"]);
  });

  it("returns identical output when queried twice", async () => {
    const { provider } = await httpProvider("channel-v4.json");
    const first = await provider.getPackages(GITHUB_REPO);
    const second = await provider.getPackages(GITHUB_REPO);
    expect(second).toEqual(first);
  });

  it("returns an empty mapping for repositories the channel does not cache", async () => {
    const { provider } = await httpProvider("channel-v4.json");
    expect(await provider.getPackages("https://example.com/unknown.json")).toEqual({});
    expect(await provider.getLibraries("https://example.com/unknown.json")).toEqual({});
  });

  it("maps previous names given as a string or a list", async () => {
    const { provider } = await httpProvider("channel-v4.json");
    expect(await provider.getRenamedPackages()).toEqual({ OldAlpha: "Alpha", OldBeta: "Beta" });
  });

  it("has no name map", async () => {
    const { provider } = await httpProvider("channel-v4.json");
    expect(await provider.getNameMap()).toEqual({});
  });

  it("reads libraries from libraries_cache newest first", async () => {
    const { provider } = await httpProvider("channel-v4.json");
    const libraries = await provider.getLibraries("https://example.com/repo.json");
    expect(libraries["lib-a"]).toEqual({
      name: "lib-a",
      load_order: "01",
      description: "Shared helpers",
      author: "lib-dev",
      issues: "https://example.com/lib-a/issues",
      releases: [
        {
          sublime_text: "*",
          platforms: ["*"],
          version: "2.0.0",
          url: "https://example.com/lib-a-2.0.0.zip",
          date: "2022-02-01 00:00:00",
          sha256: "bbbb",
          extra: {}
        },
        {
          sublime_text: "*",
          platforms: ["*"],
          version: "1.0.0",
          url: "https://example.com/lib-a-1.0.0.zip",
          date: "2020-02-01 00:00:00",
          sha256: "aaaa",
          extra: {}
        }
      ],
      extra: {}
    });
  });

  it("reports the schema version", async () => {
    const { provider } = await httpProvider("channel-v4.json");
    const version = await provider.getSchemaVersion();
    expect(version.major).toBe(4);
  });

  it("retries the download on the next query after a transport failure", async () => {
    const failure = new DownloaderError("Error downloading channel. HTTP error 503 downloading x.", {
      url: CHANNEL_URL,
      status: 503
    });
    const fetchMock = vi.fn(async (_url: string, _errorContext: string): Promise<Buffer> => {
      throw failure;
    });
    const provider = new ChannelProvider(CHANNEL_URL, settings, { fetch: fetchMock });

    await expect(provider.getRepositories()).rejects.toBe(failure);
    await expect(provider.getPackages(GITHUB_REPO)).rejects.toBe(failure);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });
});

describe("ChannelProvider with names taken from the document", () => {
  const document = {
    schema_version: "4.0.0",
    repositories: [],
    packages_cache: {
      "https://example.com/repo.json": [{ name: "__proto__", previous_names: ["__proto__", "Old"], releases: [] }]
    }
  };

  it("keeps a previous name of __proto__ as an own key", async () => {
    const { provider } = bytesProvider(Buffer.from(JSON.stringify(document)));
    const renamed = await provider.getRenamedPackages();
    expect(Object.keys(renamed)).toEqual(["__proto__", "Old"]);
    expect(Object.getPrototypeOf(renamed)).toBe(Object.prototype);
  });

  it("keeps a package named __proto__ as an own key", async () => {
    const { provider } = bytesProvider(Buffer.from(JSON.stringify(document)));
    const packages = await provider.getPackages("https://example.com/repo.json");
    expect(Object.keys(packages)).toEqual(["__proto__"]);
    expect(Object.getPrototypeOf(packages)).toBe(Object.prototype);
  });
});

describe("ChannelProvider with a schema 3 channel file", () => {
  const provider = () => new ChannelProvider(fixture("channel-v3.json"), settings);

  it("renames release dependencies to libraries", async () => {
    const packages = await provider().getPackages("https://example.com/repo.json");
    const [release] = packages.Gamma.releases;
    expect(release.libraries).toEqual(["lib-a"]);
    expect(Object.keys(release)).not.toContain("dependencies");
    expect(release.extra).toEqual({});
  });

  it("reads libraries from dependencies_cache", async () => {
    const libraries = await provider().getLibraries("https://example.com/repo.json");
    expect(libraries["lib-a"].load_order).toBe("50");
    expect(libraries["lib-a"].releases[0].sha256).toBe("cccc");
    expect(libraries["lib-a"].releases[0].date).toBeNull();
  });

  it("derives an empty rename map when no package has previous names", async () => {
    expect(await provider().getRenamedPackages()).toEqual({});
  });
});

describe("ChannelProvider with a schema 1 channel file", () => {
  const channelPath = fixture("channel-v1.json");
  const provider = () => new ChannelProvider(channelPath, settings);

  it("resolves relative repositories against the channel directory", async () => {
    expect(await provider().getRepositories()).toEqual([
      path.join(path.dirname(fixturesDir), "repos", "repository.json"),
      "https://example.com/repo.json"
    ]);
  });

  it("returns the name map and renamed packages stored in the document", async () => {
    const channel = provider();
    expect(await channel.getNameMap()).toEqual({ "delta-package": "Delta" });
    expect(await channel.getRenamedPackages()).toEqual({ OldDelta: "Delta" });
  });

  it("builds releases from a flat platforms list and drops the platforms key", async () => {
    const packages = await provider().getPackages("https://example.com/repo.json");
    const delta = packages.Delta;
    expect(delta.releases).toEqual([
      {
        sublime_text: "<3000",
        platforms: ["*"],
        version: "1.0.0",
        url: "https://example.com/delta.zip",
        date: null,
        extra: {}
      }
    ]);
    expect(delta.extra).toEqual({ version: "1.0.0", url: "https://example.com/delta.zip" });
    expect(Object.keys(delta)).not.toContain("platforms");
    expect(delta.last_modified).toBeNull();
  });

  it("groups downloads shared by every platform", async () => {
    const packages = await provider().getPackages("https://example.com/repo.json");
    expect(packages.Epsilon.releases.map(release => [release.version, release.platforms])).toEqual([
      ["2.0.0", ["*"]],
      ["1.0.0", ["linux"]]
    ]);
  });
});

describe("ChannelProvider validation", () => {
  it("rejects a channel without repositories", async () => {
    const channelPath = fixture("no-repositories.json");
    const provider = new ChannelProvider(channelPath, settings);
    const expected = `Channel ${channelPath} does not appear to be a valid channel file because the "repositories" JSON key is missing.`;

    await expect(provider.getRepositories()).rejects.toThrow(InvalidChannelFileError);
    await expect(provider.getRepositories()).rejects.toThrow(expected);
    await expect(provider.getSources()).rejects.toThrow(expected);
  });

  it("rejects a channel without schema_version", async () => {
    const channelPath = fixture("no-schema-version.json");
    const provider = new ChannelProvider(channelPath, settings);
    await expect(provider.getNameMap()).rejects.toThrow(
      `Channel ${channelPath} does not appear to be a valid channel file because the "schema_version" JSON key is missing.`
    );
  });

  it("rejects an unsupported schema_version", async () => {
    const provider = new ChannelProvider(fixture("future-schema.json"), settings);
    await expect(provider.getRepositories()).rejects.toThrow('the "schema_version" is not recognized');
  });

  it("rejects malformed JSON", async () => {
    const channelPath = fixture("broken.json");
    const provider = new ChannelProvider(channelPath, settings);
    await expect(provider.getPackages("https://example.com/repo.json")).rejects.toThrow(
      `Channel ${channelPath} does not appear to be a valid channel file because parsing JSON failed.`
    );
  });

  it("rejects a channel that is not valid UTF-8", async () => {
    const { provider } = bytesProvider(Buffer.from([0x7b, 0xff, 0x7d]));
    await expect(provider.getRepositories()).rejects.toThrow(
      `Channel ${CHANNEL_URL} does not appear to be a valid channel file because parsing JSON failed.`
    );
  });

  it("rejects a JSON document whose root is not an object", async () => {
    const { provider } = bytesProvider(Buffer.from("[1, 2]"));
    await expect(provider.getRepositories()).rejects.toThrow(
      `Channel ${CHANNEL_URL} does not appear to be a valid channel file because parsing JSON failed.`
    );
  });

  it("reports a missing channel file on every query", async () => {
    const channelPath = fixture("missing.json");
    const provider = new ChannelProvider(channelPath, settings);
    await expect(provider.getRepositories()).rejects.toThrow(ChannelError);
    await expect(provider.getRepositories()).rejects.toThrow(`Error, file ${channelPath} does not exist`);
  });

  it("handles any channel URL", () => {
    expect(ChannelProvider.matchUrl("file:///tmp/channel.json")).toBe(true);
  });
});
