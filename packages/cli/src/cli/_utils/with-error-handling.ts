// pattern: Imperative Shell

import { CLI_LOGGER } from "../_deps.js";

import { analyzeError } from "./error-analysis.js";

/**
 * Wraps a Commander action so that anything it throws is logged as a
 * user-facing message with suggestions and the process exits with code 1.
 *
 * Registry failures never get here; they are part of the search result.
 */
export function withErrorHandling<T extends unknown[]>(
  action: (...args: T) => Promise<void> | void
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await action(...args);
    } catch (error) {
      const analyzed = analyzeError(error);

      CLI_LOGGER.error(analyzed.userMessage);
      for (const suggestion of analyzed.suggestions) {
        CLI_LOGGER.error(`  • ${suggestion}`);
      }

      if (CLI_LOGGER.isLevelEnabled("debug")) {
        CLI_LOGGER.debug(
          { err: error, category: analyzed.category },
          `Technical error details: ${analyzed.technicalMessage}`
        );
      }

      // Ensure logs are flushed before exit
      CLI_LOGGER.flush();
      process.exitCode = 1;
    }
  };
}
