// pattern: Imperative Shell

import { type Logger } from "pino";

import { createSilentLogger } from "../logger/config.js";
import { RegistrySourceFactory } from "../registry/factory.js";
import { failed, toRegistrySearchError } from "../registry/utils.js";
import { mapWithConcurrency } from "../utils/concurrency/index.js";
import { UsageError } from "../utils/errors.js";
import { aggregateResults, type RegistryOutcome } from "./result-aggregator.js";

import type {
  RegistryFindResult,
  RegistryId,
  RegistrySource,
  SearchResult,
} from "../registry/types.js";

export const DEFAULT_CONCURRENCY = 8;
export const DEFAULT_TIMEOUT_MS = 15_000;

export interface SearchProgress {
  /** Calls settled so far, this one included */
  completed: number;
  total: number;
  packageName: string;
  registry: RegistryId;
}

export interface PackageSearcherOptions {
  /** Sources in the order their results are reported; default: the built-in default set */
  sources?: readonly RegistrySource[];
  /** Maximum `find` calls in flight */
  concurrency?: number;
  /** Per-call budget; an expired call becomes a `timeout` error */
  timeoutMs?: number;
  logger?: Logger;
  onProgress?: (progress: SearchProgress) => void;
}

interface SearchTask {
  packageName: string;
  sourceIndex: number;
}

function requirePositiveInteger(value: number, option: string): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new UsageError(`${option} must be a positive integer, got ${value}`, option);
  }
  return value;
}

/**
 * Trim, reject blanks and drop repeats, keeping first-seen order
 */
export function normalizePackageNames(names: readonly string[]): string[] {
  if (names.length === 0) {
    throw new UsageError("At least one package name is required", "names");
  }

  const normalized = names.map(name => name.trim());
  if (normalized.some(name => name.length === 0)) {
    throw new UsageError("Package names must not be blank", "names");
  }
  return [...new Set(normalized)];
}

/**
 * Fans every (package name, registry) pair out to the configured sources
 * through a bounded pool, then aggregates each name's outcomes in source
 * order once all of its calls have settled.
 */
export class PackageSearcher {
  readonly sources: readonly RegistrySource[];
  private readonly concurrency: number;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly onProgress: ((progress: SearchProgress) => void) | undefined;

  constructor(options: PackageSearcherOptions = {}) {
    this.sources = options.sources ?? RegistrySourceFactory.createDefaultSources();
    if (this.sources.length === 0) {
      throw new UsageError("At least one registry source is required", "sources");
    }
    this.concurrency = requirePositiveInteger(
      options.concurrency ?? DEFAULT_CONCURRENCY,
      "concurrency"
    );
    this.timeoutMs = requirePositiveInteger(
      options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      "timeoutMs"
    );
    this.logger = options.logger ?? createSilentLogger();
    this.onProgress = options.onProgress;
  }

  async searchPackage(packageName: string): Promise<SearchResult> {
    const [name] = normalizePackageNames([packageName]);
    const results = await this.searchPackages([packageName]);
    const result = name === undefined ? undefined : results.get(name);
    if (!result) {
      throw new Error(`No result recorded for ${packageName}`);
    }
    return result;
  }

  /**
   * Resolves to a map keyed by trimmed package name, in first-seen order.
   * Only usage errors reject; registry failures end up in each result's
   * error ledger.
   */
  async searchPackages(names: readonly string[]): Promise<Map<string, SearchResult>> {
    const packageNames = normalizePackageNames(names);
    const tasks: SearchTask[] = packageNames.flatMap(packageName =>
      this.sources.map((_source, sourceIndex) => ({ packageName, sourceIndex }))
    );
    const total = tasks.length;
    let completed = 0;

    this.logger.debug(
      {
        packages: packageNames,
        registries: this.sources.map(source => source.config.id),
        concurrency: this.concurrency,
        timeoutMs: this.timeoutMs,
      },
      `Searching ${packageNames.length} package(s) across ${this.sources.length} registries`
    );

    const outcomes = await mapWithConcurrency(tasks, this.concurrency, async task => {
      const source = this.sourceAt(task.sourceIndex);
      const outcome: RegistryOutcome = {
        repository: source.config.id,
        result: await this.findWithTimeout(source, task.packageName),
      };

      completed++;
      this.logOutcome(task.packageName, outcome);
      this.reportProgress({
        completed,
        total,
        packageName: task.packageName,
        registry: source.config.id,
      });
      return { packageName: task.packageName, outcome };
    });

    // Join point: every call has settled, so each name aggregates in source order
    const results = new Map<string, SearchResult>();
    for (const packageName of packageNames) {
      const forName = outcomes
        .filter(entry => entry.packageName === packageName)
        .map(entry => entry.outcome);
      const result = aggregateResults(forName);
      results.set(packageName, result);

      this.logger.debug(
        { packageName, found: result.infos.length, errors: result.errors.length },
        `Finished searching for ${packageName}`
      );
    }

    return results;
  }

  private sourceAt(index: number): RegistrySource {
    const source = this.sources[index];
    if (!source) {
      throw new Error(`No registry source at index ${index}`);
    }
    return source;
  }

  /**
   * Never rejects: adapter exceptions and expired calls both become
   * error values
   */
  private async findWithTimeout(
    source: RegistrySource,
    packageName: string
  ): Promise<RegistryFindResult> {
    const { id, displayName } = source.config;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const expired = new Promise<RegistryFindResult>(resolve => {
      timer = setTimeout(() => {
        controller.abort();
        resolve(
          failed({
            repository: id,
            packageName,
            reason: "timeout",
            detail: `${displayName} did not answer within ${this.timeoutMs} ms`,
          })
        );
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([
        this.callSource(source, packageName, controller.signal),
        expired,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  // Sources are meant to resolve errors as values; this catches those that don't
  private async callSource(
    source: RegistrySource,
    packageName: string,
    signal: AbortSignal
  ): Promise<RegistryFindResult> {
    try {
      return await source.find(packageName, { signal });
    } catch (error) {
      return failed(toRegistrySearchError(error, source.config.id, packageName));
    }
  }

  // A failing progress callback must not fail the search
  private reportProgress(progress: SearchProgress): void {
    try {
      this.onProgress?.(progress);
    } catch (error) {
      this.logger.debug({ err: error, ...progress }, "Progress callback threw");
    }
  }

  private logOutcome(packageName: string, { repository, result }: RegistryOutcome): void {
    if (result.success) {
      this.logger.debug(
        { packageName, registry: repository, found: result.infos.length },
        result.infos.length > 0
          ? `Found ${packageName} in ${repository}`
          : `${packageName} not in ${repository}`
      );
    } else {
      this.logger.debug(
        { packageName, registry: repository, reason: result.error.reason, detail: result.error.detail },
        `Could not check ${repository} for ${packageName}`
      );
    }
  }
}
