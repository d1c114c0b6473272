// pattern: Functional Core

/**
 * Base class for pkgscout application errors.
 * These are fatal: they abort the command that raised them. Per-registry
 * failures during a search are values (see RegistrySearchError), not these.
 */
export abstract class PkgscoutError extends Error {
  public readonly category: string;

  protected constructor(category: string, message: string) {
    super(message);
    this.name = this.constructor.name;
    this.category = category;

    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Errors related to settings files
 */
export class ConfigurationError extends PkgscoutError {
  constructor(message: string) {
    super("configuration", message);
  }
}

/**
 * Errors related to file system operations
 */
export class FileSystemError extends PkgscoutError {
  public readonly operation?: string;
  public readonly filePath?: string;

  constructor(message: string, operation?: string, filePath?: string) {
    super("filesystem", message);
    if (operation) {
      this.operation = operation;
    }
    if (filePath) {
      this.filePath = filePath;
    }
  }
}

/**
 * Errors related to validation failures
 */
export class ValidationError extends PkgscoutError {
  public readonly validationErrors?: string[];

  constructor(message: string, validationErrors?: string[]) {
    super("validation", message);
    if (validationErrors) {
      this.validationErrors = validationErrors;
    }
  }
}

/**
 * Programming or usage errors made by the caller of the search API or CLI,
 * such as an empty list of package names
 */
export class UsageError extends PkgscoutError {
  public readonly argument?: string;

  constructor(message: string, argument?: string) {
    super("usage", message);
    if (argument) {
      this.argument = argument;
    }
  }
}
