import { Command } from "commander";
import { ChannelProvider } from "./channel.js";
import { loadSettings } from "./config.js";
import { error as logError, info, setLogLevel } from "./logger.js";
import { LibraryRecord, PackageRecord, RecordMap } from "./types.js";

type GlobalOptions = {
  readonly debug?: boolean;
  readonly timeout?: string;
};

function providerFor(channel: string, options: GlobalOptions): ChannelProvider {
  const timeout = options.timeout === undefined ? Number.NaN : Number.parseFloat(options.timeout);
  const settings = loadSettings({
    ...(options.debug ? { debug: true } : {}),
    ...(Number.isFinite(timeout) && timeout > 0 ? { timeout } : {})
  });
  return new ChannelProvider(channel, settings);
}

/**
 * One table row per record with its newest version, ordered by name.
 */
export function summarizeRecords(
  records: RecordMap<PackageRecord | LibraryRecord>
): Array<{ readonly name: string; readonly version: string; readonly releases: number }> {
  return Object.values(records)
    .map(record => ({
      name: record.name,
      version: record.releases[0]?.version ?? "",
      releases: record.releases.length
    }))
    .sort((a, b) => a.name.localeCompare(b.name));
}

/**
 * Print every repository the channel references, one per line.
 */
export async function repositoriesAction(channel: string, options: GlobalOptions): Promise<void> {
  const repositories = await providerFor(channel, options).getRepositories();
  for (const repository of repositories) {
    console.log(repository);
  }
  info(`${repositories.length} repositories listed by ${channel}`);
}

/**
 * Print a summary table of the packages cached for a repository.
 */
export async function packagesAction(channel: string, repository: string, options: GlobalOptions): Promise<void> {
  const packages = await providerFor(channel, options).getPackages(repository);
  console.table(summarizeRecords(packages));
}

/**
 * Print a summary table of the libraries cached for a repository.
 */
export async function librariesAction(channel: string, repository: string, options: GlobalOptions): Promise<void> {
  const libraries = await providerFor(channel, options).getLibraries(repository);
  console.table(summarizeRecords(libraries));
}

/**
 * Print previous package names with their current name.
 */
export async function renamedAction(channel: string, options: GlobalOptions): Promise<void> {
  const renamed = await providerFor(channel, options).getRenamedPackages();
  for (const [previous, current] of Object.entries(renamed)) {
    console.log(`${previous} -> ${current}`);
  }
}

/**
 * Construct commander program with configured commands.
 */
export function buildProgram(): Command {
  const program = new Command();
  program
    .name("channel-resolver")
    .description("Inspect package channel documents")
    .version("1.0.0")
    .option("--debug", "print diagnostic output")
    .option("--timeout <seconds>", "download timeout in seconds")
    .hook("preAction", command => {
      if (command.opts<GlobalOptions>().debug) {
        setLogLevel("debug");
      }
    });

  const channelCommand = program.command("channel").description("Channel queries");
  channelCommand
    .command("repositories <channel>")
    .description("List repository URLs referenced by a channel")
    .action(async (channel: string) => repositoriesAction(channel, program.opts<GlobalOptions>()));
  channelCommand
    .command("packages <channel> <repository>")
    .description("List packages a channel caches for a repository")
    .action(async (channel: string, repository: string) => packagesAction(channel, repository, program.opts<GlobalOptions>()));
  channelCommand
    .command("libraries <channel> <repository>")
    .description("List libraries a channel caches for a repository")
    .action(async (channel: string, repository: string) =>
      librariesAction(channel, repository, program.opts<GlobalOptions>())
    );
  channelCommand
    .command("renamed <channel>")
    .description("List renamed packages as previous -> current")
    .action(async (channel: string) => renamedAction(channel, program.opts<GlobalOptions>()));

  return program;
}

/**
 * Execute CLI with provided argv array.
 */
export async function runCli(argv: readonly string[]): Promise<void> {
  const program = buildProgram();
  try {
    await program
      .configureOutput({
        outputError: (str: string) => logError(str.trim())
      })
      .parseAsync([...argv]);
  } catch (caught) {
    const message = caught instanceof Error ? caught.message : String(caught);
    logError(`CLI failed: ${message}`);
    process.exitCode = 1;
  }
}
