#!/usr/bin/env node
// pattern: Imperative Shell

import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";

import { Command, Option } from "@commander-js/extra-typings";

import {
  isLogFormat,
  isLogLevel,
  LOG_FORMATS,
  LOG_LEVELS,
  type LogFormat,
  type LogLevel,
} from "../logger/index.js";

import { CLI_LOGGER, initializeLogger, setCliLogLevel } from "./_deps.js";
import { makeRegistriesCommand } from "./registries.js";
import { makeSearchCommand } from "./search.js";

function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new Error(
      `Invalid log level: ${value}. Valid levels are: ${LOG_LEVELS.join(", ")}`
    );
  }
  return value;
}

function parseLogFormat(value: string): LogFormat {
  if (!isLogFormat(value)) {
    throw new Error(
      `Invalid log format: ${value}. Valid formats are: ${LOG_FORMATS.join(", ")}`
    );
  }
  return value;
}

// Determine defaults based on environment
function getDefaultLogLevel(): LogLevel {
  const envLevel = process.env["PKGSCOUT_LOG_LEVEL"];
  return envLevel && isLogLevel(envLevel) ? envLevel : "info";
}

function isNonInteractive(): boolean {
  return !process.stdout.isTTY || process.env["PKGSCOUT_NON_INTERACTIVE"] === "1";
}

function getDefaultLogFormat(): LogFormat {
  return isNonInteractive() ? "json" : "nice";
}

// Define the root command
export const rootCommand = new Command("pkgscout")
  .version("0.1.0")
  .description("find a package across language, bioinformatics and container registries")
  .addOption(
    new Option("-l, --log-level <level>", "Set log level")
      .choices(LOG_LEVELS)
      .default(getDefaultLogLevel())
      .argParser(parseLogLevel)
  )
  .addOption(
    new Option("--non-interactive", "Disable colours and interactive output").default(
      isNonInteractive()
    )
  )
  .addOption(
    new Option("-f, --format <format>", "Log output format")
      .choices(LOG_FORMATS)
      .default(getDefaultLogFormat())
      .argParser(parseLogFormat)
  )
  .hook("preAction", thisCommand => {
    // Configure CLI_LOGGER before any action runs
    const { logLevel, format, nonInteractive } = thisCommand.opts();

    initializeLogger(format, nonInteractive);
    setCliLogLevel(logLevel);
    CLI_LOGGER.debug(
      `Log level configured to: ${logLevel}, format: ${format}, non-interactive: ${nonInteractive}`
    );
  })
  .addCommand(makeSearchCommand(), { isDefault: true })
  .addCommand(makeRegistriesCommand());

/**
 * True when this module is the script node was started with, including
 * through the npm bin symlink
 */
function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isMainModule()) {
  // Initialize logger so errors before the preAction hook are still logged
  // The preAction hook will re-initialize based on CLI flags
  initializeLogger(getDefaultLogFormat(), isNonInteractive());

  await rootCommand.parseAsync(process.argv);
}
