// pattern: Imperative Shell
// CLI command for searching packages across registries

import { Command, InvalidArgumentError } from "@commander-js/extra-typings";
import chalk, { Chalk } from "chalk";

import { loadSettings } from "../config/loaders/settings-file.js";
import { resolveSearchSettings, toSourceSettings } from "../config/mergers/search-settings.js";
import { RegistrySourceFactory } from "../registry/factory.js";
import { isRegistryId, REGISTRY_IDS } from "../registry/types.js";
import { PackageSearcher } from "../search/package-searcher.js";

import { withErrorHandling } from "./_utils/with-error-handling.js";
import { formatSearchResults, toJsonReport } from "./output/printer.js";
import { CLI_LOGGER } from "./_deps.js";

import type { SearchSettings } from "../config/types/index.js";
import type { RegistryId } from "../registry/types.js";

export interface SearchCommandOptions {
  registry: RegistryId[];
  concurrency?: number | undefined;
  timeout?: number | undefined;
  prerelease?: boolean | undefined;
  json: boolean;
  config?: string | undefined;
}

const NO_REGISTRIES: RegistryId[] = [];

/**
 * Collects repeated --registry values, rejecting unknown ids
 */
export function collectRegistry(value: string, previous: RegistryId[]): RegistryId[] {
  if (!isRegistryId(value)) {
    throw new InvalidArgumentError(
      `Unknown registry "${value}". Known registries: ${REGISTRY_IDS.join(", ")}`
    );
  }
  return previous.includes(value) ? previous : [...previous, value];
}

export function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Create the 'pkgscout search' command (the default command)
 */
export function makeSearchCommand() {
  return new Command("search")
    .description("Search for packages across registries")
    .argument("<names...>", "Names of the packages to search for")
    .addHelpText(
      "after",
      `
Examples:
  pkgscout fastqc samtools                 Search the default registries
  pkgscout search bwa --registry bioconda  Search one registry
  pkgscout multiqc --json                  Print results as JSON
      `
    )
    .option(
      "--registry <id>",
      "Search only this registry (can be repeated; results follow the order given)",
      collectRegistry,
      NO_REGISTRIES
    )
    .option("--concurrency <n>", "Maximum registry requests in flight", parsePositiveInteger)
    .option("--timeout <ms>", "Per-registry request budget in milliseconds", parsePositiveInteger)
    .option("--prerelease", "Include pre-release versions, whatever the settings file says")
    .option("--no-prerelease", "Leave out pre-release versions")
    .option("--json", "Output results as JSON", false)
    .option("--config <path>", "Read settings from this file")
    .action(withErrorHandling(runSearch));
}

/**
 * Command-line values override the settings file only where given
 */
export async function resolveCommandSettings(
  options: SearchCommandOptions
): Promise<SearchSettings> {
  const { settings: file, path } = await loadSettings({ configPath: options.config });
  if (path) {
    CLI_LOGGER.debug(`Using settings from ${path}`);
  }

  return resolveSearchSettings(
    {
      registries: options.registry.length > 0 ? options.registry : undefined,
      concurrency: options.concurrency,
      timeoutMs: options.timeout,
      // Unset unless --prerelease or --no-prerelease was given
      includePrerelease: options.prerelease,
    },
    file
  );
}

async function runSearch(names: string[], options: SearchCommandOptions): Promise<void> {
  const settings = await resolveCommandSettings(options);
  const sources = RegistrySourceFactory.createSources(
    toSourceSettings(settings),
    settings.registries
  );

  const searcher = new PackageSearcher({
    sources,
    concurrency: settings.concurrency,
    timeoutMs: settings.timeoutMs,
    logger: CLI_LOGGER,
    onProgress: ({ completed, total }) => {
      CLI_LOGGER.debug(`Progress: ${completed}/${total} searches completed`);
    },
  });

  CLI_LOGGER.info(
    `Searching for ${names.length} package(s) across ${sources.length} registries...`
  );
  const results = await searcher.searchPackages(names);

  if (options.json) {
    process.stdout.write(`${JSON.stringify(toJsonReport(results), null, 2)}\n`);
  } else {
    const colors = process.stdout.isTTY ? chalk : new Chalk({ level: 0 });
    process.stdout.write(`${formatSearchResults(results, colors)}\n`);
  }
}
