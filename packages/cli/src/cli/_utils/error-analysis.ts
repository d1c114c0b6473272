// pattern: Functional Core

import {
  ConfigurationError,
  FileSystemError,
  PkgscoutError,
  UsageError,
  ValidationError,
} from "../../utils/errors.js";

/**
 * Represents a categorized error with user-friendly messaging
 */
export interface AnalyzedError {
  category: "filesystem" | "validation" | "configuration" | "usage" | "unknown";
  userMessage: string;
  technicalMessage: string;
  suggestions: string[];
}

const DEBUG_SUGGESTION = "Run with --log-level debug for more detailed information";

function isKnownCategory(category: string): category is AnalyzedError["category"] {
  return ["filesystem", "validation", "configuration", "usage"].includes(category);
}

/**
 * Analyzes an error and provides structured information with user-friendly messages.
 * Only fatal errors reach here: per-registry failures are reported with the
 * search results and never thrown.
 */
export function analyzeError(error: unknown): AnalyzedError {
  // First check for typed pkgscout errors
  if (error instanceof PkgscoutError) {
    const errorMessage = error.message;

    if (error instanceof FileSystemError) {
      const suggestions = [
        "Verify the file or directory path exists",
        "Check that you have the necessary permissions",
      ];
      if (error.operation === "read") {
        suggestions.push("Ensure the file exists and is readable");
      }

      return {
        category: "filesystem",
        userMessage: errorMessage,
        technicalMessage: errorMessage,
        suggestions,
      };
    }

    if (error instanceof ValidationError) {
      const suggestions = [
        "Check your pkgscout settings file against the documented fields",
        "Run `pkgscout registries` to list valid registry ids",
      ];
      if (error.validationErrors && error.validationErrors.length > 0) {
        suggestions.push(...error.validationErrors.map(e => `- ${e}`));
      }

      return {
        category: "validation",
        userMessage: errorMessage,
        technicalMessage: errorMessage,
        suggestions,
      };
    }

    if (error instanceof ConfigurationError) {
      let suggestions = ["Check your pkgscout settings file for errors", DEBUG_SUGGESTION];

      // Provide specific suggestions based on the error message
      const errorLower = errorMessage.toLowerCase();
      if (errorLower.includes("multiple pkgscout settings files")) {
        suggestions = [
          "Keep only one of pkgscout.yaml, pkgscout.yml, pkgscout.json or pkgscout.toml",
          "Or point at one explicitly with --config <path>",
        ];
      } else if (errorLower.includes("unsupported file format")) {
        suggestions = ["Use a .yaml, .yml, .json or .toml settings file"];
      }

      return {
        category: "configuration",
        userMessage: errorMessage,
        technicalMessage: errorMessage,
        suggestions,
      };
    }

    if (error instanceof UsageError) {
      return {
        category: "usage",
        userMessage: errorMessage,
        technicalMessage: errorMessage,
        suggestions: ["Run `pkgscout --help` for usage"],
      };
    }

    // Generic PkgscoutError handling - use the actual error message
    return {
      category: isKnownCategory(error.category) ? error.category : "unknown",
      userMessage: errorMessage,
      technicalMessage: errorMessage,
      suggestions: ["Check the error message for details", DEBUG_SUGGESTION],
    };
  }

  // Fall back to string-based analysis for everything else
  const errorMessage = getErrorMessage(error);
  const errorString = errorMessage.toLowerCase();

  if (errorString.includes("eacces") || errorString.includes("permission denied")) {
    return {
      category: "filesystem",
      userMessage: "Permission denied accessing files or directories",
      technicalMessage: errorMessage,
      suggestions: [
        "Check that you can read the settings file",
        "Verify the file or directory ownership is correct",
      ],
    };
  }

  if (errorString.includes("enoent")) {
    return {
      category: "filesystem",
      userMessage: "Required file or directory not found",
      technicalMessage: errorMessage,
      suggestions: [
        "Verify the file or directory path exists",
        "Check the path given to --config",
      ],
    };
  }

  if (errorString.includes("eisdir")) {
    return {
      category: "filesystem",
      userMessage: "Expected a file but found a directory",
      technicalMessage: errorMessage,
      suggestions: ["Check the file path is correct"],
    };
  }

  if (errorString.includes("invalid") || errorString.includes("validation")) {
    return {
      category: "validation",
      userMessage: "Configuration or input validation failed",
      technicalMessage: errorMessage,
      suggestions: [
        "Check the command-line arguments",
        "Verify your settings file syntax",
      ],
    };
  }

  // Unknown errors
  return {
    category: "unknown",
    userMessage: "An unexpected error occurred",
    technicalMessage: errorMessage,
    suggestions: [
      "Try the operation again",
      "Check the command syntax and arguments",
      DEBUG_SUGGESTION,
    ],
  };
}

/**
 * Extracts a string message from various error types
 */
function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  if (error && typeof error === "object" && "message" in error) {
    return String(error.message);
  }
  return String(error);
}
