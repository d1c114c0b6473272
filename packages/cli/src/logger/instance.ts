// pattern: Imperative Shell

import { type Logger } from "pino";

import { createLogger, mapLogLevelToPinoLevel } from "./config.js";
import { type LogFormat, type LogLevel } from "./types.js";

// Global logger instance
let LOGGER: Logger | undefined;

export function initializeLogger(format: LogFormat, nonInteractive: boolean): void {
  LOGGER = createLogger(format, nonInteractive);
}

export function setCliLogLevel(logLevel: LogLevel): void {
  getCliLogger().level = mapLogLevelToPinoLevel(logLevel);
}

export function getCliLogger(): Logger {
  if (!LOGGER) {
    throw new Error("Logger not initialized. Call initializeLogger() first.");
  }
  return LOGGER;
}

// A proxy that always refers to the current logger instance
export const CLI_LOGGER: Logger = new Proxy(createLogger("json", true), {
  get(_target, prop): unknown {
    const logger = getCliLogger();
    const value: unknown = Reflect.get(logger, prop, logger);
    if (typeof value === "function") {
      return value.bind(logger);
    }
    return value;
  },
  set(_target, prop, value: unknown): boolean {
    return Reflect.set(getCliLogger(), prop, value);
  },
});
