// pattern: Functional Core

import { Chalk, type ChalkInstance } from "chalk";
import { Transform } from "node:stream";

interface PinoLogObject {
  level: number;
  msg?: string;
  [key: string]: unknown;
}

interface RendererOptions {
  colorize?: boolean;
}

function isPinoLogObject(value: unknown): value is PinoLogObject {
  return (
    typeof value === "object" &&
    value !== null &&
    "level" in value &&
    typeof value.level === "number"
  );
}

// Format error object with stack trace
function formatErrorObject(err: unknown, chalk: ChalkInstance): string {
  if (!err || typeof err !== "object") {
    return "";
  }

  const lines: string[] = [];

  if ("message" in err && typeof err.message === "string") {
    lines.push(chalk.yellow(`    ${err.message}`));
  }

  // The serializer already trimmed nice-format stacks to an array of lines
  if ("stack" in err) {
    const stackLines = Array.isArray(err.stack)
      ? err.stack.filter((line): line is string => typeof line === "string")
      : typeof err.stack === "string"
        ? err.stack.split("\n").slice(1, 9)
        : [];

    for (const line of stackLines) {
      const trimmedLine = line.trim();
      if (trimmedLine) {
        lines.push(chalk.dim(chalk.yellow(`        ${trimmedLine}`)));
      }
    }
  }

  return lines.length > 0 ? `\n${lines.join("\n")}` : "";
}

function levelDisplayFor(
  level: number,
  chalk: ChalkInstance
): { marker: string; color: ChalkInstance } {
  switch (level) {
    case 10: // trace
      return { marker: chalk.green("+"), color: chalk.reset };
    case 20: // debug
      return { marker: chalk.cyan("="), color: chalk.reset };
    case 30: // info
      return { marker: chalk.gray(">"), color: chalk.reset };
    case 40: // warn
      return { marker: chalk.yellowBright("W"), color: chalk.yellow };
    case 50: // error
      return { marker: chalk.inverse.red("E"), color: chalk.red };
    case 60: // fatal
      return { marker: chalk.inverse.redBright("E"), color: chalk.red };
    default:
      return { marker: chalk.gray("  LOG  "), color: chalk.reset };
  }
}

/**
 * Format a single pino log object to one display line
 */
export function formatLogObject(
  logObj: PinoLogObject,
  chalk: ChalkInstance
): string {
  const {
    level,
    msg,
    err,
    time: _time,
    pid: _pid,
    hostname: _hostname,
    name: _name,
    ...extra
  } = logObj;

  const { marker, color } = levelDisplayFor(level, chalk);
  const formattedMsg = color(msg ?? "");
  const errorStr = err ? formatErrorObject(err, chalk) : "";
  const extraStr =
    Object.keys(extra).length > 0 ? ` ${chalk.dim(JSON.stringify(extra))}` : "";

  return `${marker} ${formattedMsg}${extraStr}${errorStr}\n`;
}

/**
 * Format one newline-delimited pino chunk; unparseable lines pass through
 */
export function formatLogChunk(chunk: string, chalk: ChalkInstance): string {
  const formattedLines: string[] = [];

  for (const line of chunk.split("\n")) {
    if (!line.trim()) {
      continue;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      formattedLines.push(`${line}\n`);
      continue;
    }

    formattedLines.push(
      isPinoLogObject(parsed) ? formatLogObject(parsed, chalk) : `${line}\n`
    );
  }

  return formattedLines.join("");
}

// Create a pretty renderer stream like pino-pretty
export default function createRenderer(options: RendererOptions = {}): Transform {
  const chalk = new Chalk({ level: options.colorize === false ? 0 : 1 });

  return new Transform({
    objectMode: false, // Pino sends newline-delimited JSON strings, not objects
    transform(chunk: Buffer | string, _encoding, callback): void {
      callback(null, formatLogChunk(chunk.toString(), chalk));
    },
  });
}
