// pattern: Functional Core

import type {
  PackageInfo,
  RegistryFindResult,
  RegistryId,
  RegistrySearchError,
  SearchResult,
} from "../registry/types.js";

/**
 * One settled `find` call, tagged with the registry that produced it
 */
export interface RegistryOutcome {
  repository: RegistryId;
  result: RegistryFindResult;
}

/**
 * Merge one package name's outcomes, given in registry order. Successful
 * records keep that order; every failure lands in the error ledger.
 */
export function aggregateResults(outcomes: readonly RegistryOutcome[]): SearchResult {
  const infos: PackageInfo[] = [];
  const errors: RegistrySearchError[] = [];

  for (const { result } of outcomes) {
    if (result.success) {
      infos.push(...result.infos);
    } else {
      errors.push(result.error);
    }
  }

  return Object.freeze({
    infos: Object.freeze(infos),
    errors: Object.freeze(errors),
  });
}

/**
 * No records and no errors: every registry checked and none has the
 * package. An empty result with errors is "could not check", not this.
 */
export function isNotFound(result: SearchResult): boolean {
  return result.infos.length === 0 && result.errors.length === 0;
}

/**
 * Registries that returned at least one record, in result order
 */
export function foundIn(result: SearchResult): RegistryId[] {
  return [...new Set(result.infos.map(info => info.repository))];
}
