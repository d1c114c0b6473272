// pattern: Functional Core

import { describe, expect, it } from "vitest";

import {
  ConfigurationError,
  FileSystemError,
  UsageError,
  ValidationError,
} from "../../utils/errors.js";

import { analyzeError } from "./error-analysis.js";

describe("analyzeError", () => {
  describe("typed errors", () => {
    it("should keep the message of a usage error", () => {
      const result = analyzeError(new UsageError("At least one package name is required"));

      expect(result).toEqual({
        category: "usage",
        userMessage: "At least one package name is required",
        technicalMessage: "At least one package name is required",
        suggestions: ["Run `pkgscout --help` for usage"],
      });
    });

    it("should list validation errors as suggestions", () => {
      const result = analyzeError(
        new ValidationError("Settings validation failed", ["/concurrency: must be >= 1"])
      );

      expect(result.category).toBe("validation");
      expect(result.suggestions).toContain("- /concurrency: must be >= 1");
    });

    it("should give specific advice for several settings files", () => {
      const result = analyzeError(
        new ConfigurationError(
          "Multiple pkgscout settings files found in /work: pkgscout.yaml, pkgscout.json. Please use only one settings file per directory."
        )
      );

      expect(result.category).toBe("configuration");
      expect(result.suggestions).toEqual([
        "Keep only one of pkgscout.yaml, pkgscout.yml, pkgscout.json or pkgscout.toml",
        "Or point at one explicitly with --config <path>",
      ]);
    });

    it("should add a read hint for unreadable files", () => {
      const result = analyzeError(
        new FileSystemError("Cannot read settings file", "read", "/work/pkgscout.yaml")
      );

      expect(result.category).toBe("filesystem");
      expect(result.suggestions).toContain("Ensure the file exists and is readable");
    });
  });

  describe("untyped errors", () => {
    it("should categorize EACCES errors", () => {
      const result = analyzeError(new Error("EACCES: permission denied, open '/etc/test'"));

      expect(result.category).toBe("filesystem");
      expect(result.userMessage).toBe("Permission denied accessing files or directories");
    });

    it("should categorize ENOENT errors", () => {
      const result = analyzeError(new Error("ENOENT: no such file or directory"));

      expect(result.category).toBe("filesystem");
      expect(result.userMessage).toBe("Required file or directory not found");
    });

    it("should accept plain strings", () => {
      const result = analyzeError("invalid option value");

      expect(result.category).toBe("validation");
      expect(result.technicalMessage).toBe("invalid option value");
    });

    it("should fall back to unknown", () => {
      const result = analyzeError({ message: "something odd" });

      expect(result.category).toBe("unknown");
      expect(result.userMessage).toBe("An unexpected error occurred");
      expect(result.technicalMessage).toBe("something odd");
    });
  });
});
