// pattern: Imperative Shell
import { parse as parseToml } from "@iarna/toml";
import { access, constants, readFile } from "fs/promises";
import { extname, join, resolve } from "path";
import { parse as parseYaml } from "yaml";

import { ajv } from "../../utils/ajv.js";
import { ConfigurationError, FileSystemError, ValidationError } from "../../utils/errors.js";
import { Settings } from "../types/index.js";

// Compile schema once for reuse
const validateSettings = ajv.compile<Settings>(Settings);

export const SETTINGS_FILENAMES = [
  "pkgscout.yaml",
  "pkgscout.yml",
  "pkgscout.json",
  "pkgscout.toml",
] as const;

/**
 * Loads and parses a settings file, detecting the format by extension
 * (.json, .yaml/.yml, .toml)
 */
export async function loadSettingsFromFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(filePath, "utf8");
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new FileSystemError(
      `Cannot read settings file ${filePath}: ${detail}`,
      "read",
      filePath
    );
  }

  const ext = extname(filePath).toLowerCase();
  try {
    switch (ext) {
      case ".json":
        return JSON.parse(content);
      case ".yaml":
      case ".yml":
        return parseYaml(content);
      case ".toml":
        return parseToml(content);
      default:
        throw new ConfigurationError(
          `Unsupported file format: ${ext}. Supported formats: .json, .yaml, .yml, .toml`
        );
    }
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw error;
    }
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot parse settings file ${filePath}: ${detail}`);
  }
}

/**
 * Validates a parsed settings object against the schema
 */
export function validateSettingsObject(data: unknown): data is Settings {
  if (!validateSettings(data)) {
    const errorMessages = (validateSettings.errors ?? []).map(
      err => `${err.instancePath || "root"}: ${err.message ?? "is invalid"}`
    );
    throw new ValidationError(
      `Settings validation failed: ${errorMessages.join(", ")}`,
      errorMessages
    );
  }

  return true;
}

/**
 * Find the settings file in `dir`. Settings are per directory; parents
 * are not searched. More than one candidate is an error.
 */
export async function findSettingsFile(dir: string = process.cwd()): Promise<string | null> {
  const directory = resolve(dir);
  const found: string[] = [];

  for (const filename of SETTINGS_FILENAMES) {
    const candidate = join(directory, filename);
    if (await fileExists(candidate)) {
      found.push(candidate);
    }
  }

  if (found.length > 1) {
    const names = found.map(path => path.slice(directory.length + 1));
    throw new ConfigurationError(
      `Multiple pkgscout settings files found in ${directory}: ${names.join(", ")}. Please use only one settings file per directory.`
    );
  }

  return found[0] ?? null;
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Loads and validates a settings file
 */
export async function loadAndValidateSettings(filePath: string): Promise<Settings> {
  const data = await loadSettingsFromFile(filePath);

  if (validateSettingsObject(data)) {
    return data;
  }

  // This should never be reached due to the throw in validateSettingsObject
  throw new Error("Unexpected validation state");
}

/**
 * Settings from an explicit path, else from the working directory's
 * settings file, else none
 */
export async function loadSettings(options: {
  configPath?: string | undefined;
  cwd?: string;
}): Promise<{ settings: Settings | undefined; path: string | undefined }> {
  const path = options.configPath
    ? resolve(options.cwd ?? process.cwd(), options.configPath)
    : ((await findSettingsFile(options.cwd)) ?? undefined);

  if (!path) {
    return { settings: undefined, path: undefined };
  }
  return { settings: await loadAndValidateSettings(path), path };
}
