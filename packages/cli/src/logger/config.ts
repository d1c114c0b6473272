// pattern: Functional Core

import pino, {
  type DestinationStream,
  type LevelWithSilent,
  type Logger,
  type LoggerOptions,
} from "pino";

import createRenderer from "./renderer.js";
import { type LogFormat, type LogLevel } from "./types.js";

export function mapLogLevelToPinoLevel(logLevel: LogLevel): LevelWithSilent {
  switch (logLevel) {
    case "error":
      return "error";
    case "warn":
      return "warn";
    case "info":
      return "info";
    case "debug":
      return "debug";
    case "trace":
      return "trace";
    default:
      return "info";
  }
}

function isErrorLike(value: unknown): value is { message?: unknown; stack?: unknown } {
  return typeof value === "object" && value !== null;
}

// Create pino logger with stream configuration
export function createLogger(format: LogFormat, nonInteractive: boolean): Logger {
  const baseConfig: LoggerOptions = {
    name: "pkgscout",
    level: "info",
    serializers: {
      err: (err: unknown) => {
        if (!isErrorLike(err)) return err;

        // The nice renderer prints message + a short stack itself
        if (format === "nice" && !nonInteractive) {
          return {
            message: typeof err.message === "string" ? err.message : undefined,
            stack:
              typeof err.stack === "string"
                ? err.stack.split("\n").slice(1, 9)
                : undefined,
          };
        }

        return err instanceof Error ? pino.stdSerializers.err(err) : err;
      },
    },
  };

  let stream: DestinationStream;
  if (format === "nice") {
    const renderer = createRenderer({ colorize: !nonInteractive });
    renderer.pipe(process.stderr);
    stream = renderer;
  } else {
    stream = pino.destination(2); // stderr
  }

  return pino(baseConfig, stream);
}

/**
 * Logger handed to library code when the caller does not supply one
 */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
