// pattern: Imperative Shell

import { Command } from "@commander-js/extra-typings";
import Table from "cli-table3";

import { RegistrySourceFactory } from "../registry/factory.js";

import { withErrorHandling } from "./_utils/with-error-handling.js";

/**
 * Rows of the registry listing, in search order
 */
export function registryTableRows(): string[][] {
  return RegistrySourceFactory.getSupportedRegistries().map(registry => [
    registry.id,
    registry.displayName,
    registry.defaultEnabled ? "yes" : "no (opt-in)",
  ]);
}

/**
 * Create the 'pkgscout registries' command
 */
export function makeRegistriesCommand(): Command {
  return new Command("registries")
    .description("List the registries pkgscout can search")
    .option("--json", "Output the list as JSON", false)
    .action(
      withErrorHandling((options: { json: boolean }) => {
        if (options.json) {
          process.stdout.write(
            `${JSON.stringify(RegistrySourceFactory.getSupportedRegistries(), null, 2)}\n`
          );
          return;
        }

        const table = new Table({
          head: ["Id", "Registry", "Default"],
          wordWrap: true,
        });
        table.push(...registryTableRows());

        process.stdout.write(`${table.toString()}\n`);
      })
    );
}
