// pattern: Functional Core

import type { ThreadingSupport } from "./types.js";

export interface ThreadingClassification {
  support: ThreadingSupport;
  /** Matched command-line flags, in table order */
  flags: string[];
}

interface ThreadFlag {
  flag: string;
  /** Only counts when a number follows, e.g. "-p 8" */
  needsNumber: boolean;
}

const THREAD_FLAGS: readonly ThreadFlag[] = [
  { flag: "-t", needsNumber: false },
  { flag: "--threads", needsNumber: false },
  { flag: "-threads", needsNumber: false },
  { flag: "--thread", needsNumber: false },
  { flag: "-thread", needsNumber: false },
  { flag: "--nthreads", needsNumber: false },
  { flag: "-nthreads", needsNumber: false },
  { flag: "--num-threads", needsNumber: false },
  { flag: "--cores", needsNumber: false },
  { flag: "-cores", needsNumber: false },
  { flag: "--num-cores", needsNumber: false },
  { flag: "-p", needsNumber: true },
  { flag: "-n", needsNumber: true },
];

const THREAD_PHRASES: readonly string[] = [
  "parallel",
  "multithread",
  "multi-thread",
  "multi thread",
  "multi-threaded",
  "concurrent",
  "cpu cores",
  "processor cores",
  "openmp",
  "pthreads",
];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// A flag must stand alone: "--threads" does not also count as "-threads"
const FLAG_PATTERNS: readonly { flag: string; pattern: RegExp }[] =
  THREAD_FLAGS.map(({ flag, needsNumber }) => {
    const after = needsNumber ? "(?=[\\s=]*\\d)" : "(?=$|[\\s=,;:)\\]\"'`.]|\\d)";
    return {
      flag,
      pattern: new RegExp(`(?<=^|[\\s(\\["'\`])${escapeRegExp(flag)}${after}`),
    };
  });

/**
 * Heuristic scan of free text for signs of multi-threading support
 */
export function classifyThreading(
  description: string | undefined,
  readme?: string
): ThreadingClassification {
  const text = [description ?? "", readme ?? ""]
    .map(part => part.trim())
    .filter(part => part.length > 0)
    .join("\n")
    .toLowerCase();

  if (!text) {
    return { support: "unknown", flags: [] };
  }

  const flags = FLAG_PATTERNS.filter(({ pattern }) => pattern.test(text)).map(
    ({ flag }) => flag
  );
  const hasPhrase = THREAD_PHRASES.some(phrase => text.includes(phrase));

  return {
    support: flags.length > 0 || hasPhrase ? "explicit" : "none-detected",
    flags,
  };
}
