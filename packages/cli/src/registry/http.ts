// pattern: Imperative Shell

import type { ValidateFunction } from "ajv";

import type { RegistryErrorReason } from "./types.js";

export const DEFAULT_USER_AGENT = "pkgscout";

/**
 * Thrown by the request helpers; adapters let it propagate to `find`,
 * where `toRegistrySearchError` turns it into a value
 */
export class RegistryRequestError extends Error {
  constructor(
    message: string,
    public readonly reason: RegistryErrorReason,
    public readonly status?: number
  ) {
    super(message);
    this.name = "RegistryRequestError";
  }
}

export interface RequestOptions {
  signal?: AbortSignal | undefined;
  headers?: Record<string, string>;
  userAgent?: string | undefined;
}

export function classifyHttpStatus(status: number): RegistryErrorReason {
  if (status === 429) return "rate_limited";
  return "network_failure";
}

export function isAbortError(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === "AbortError" || error.name === "TimeoutError")
  );
}

function isNotFoundStatus(status: number): boolean {
  return status === 404 || status === 410;
}

async function request(
  url: string,
  accept: string,
  options: RequestOptions
): Promise<Response | null> {
  let response: Response;
  try {
    response = await fetch(url, {
      headers: {
        Accept: accept,
        "User-Agent": options.userAgent ?? DEFAULT_USER_AGENT,
        ...options.headers,
      },
      ...(options.signal ? { signal: options.signal } : {}),
    });
  } catch (error) {
    // Aborts keep their own identity so they can be reported as timeouts
    if (isAbortError(error)) {
      throw error;
    }
    const detail = error instanceof Error ? error.message : String(error);
    throw new RegistryRequestError(
      `Network request failed for ${url}: ${detail}`,
      "network_failure"
    );
  }

  if (isNotFoundStatus(response.status)) {
    return null;
  }

  if (!response.ok) {
    throw new RegistryRequestError(
      `HTTP ${response.status} for ${url}`,
      classifyHttpStatus(response.status),
      response.status
    );
  }

  return response;
}

/**
 * GET a JSON document and validate it. Resolves to null when the registry
 * answers 404/410.
 */
export async function fetchJson<T>(
  url: string,
  validate: ValidateFunction<T>,
  options: RequestOptions = {}
): Promise<T | null> {
  const response = await request(url, "application/json", options);
  if (!response) {
    return null;
  }

  const body = await response.text();
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch {
    throw new RegistryRequestError(
      `Failed to parse JSON from ${url}`,
      "parse_failure",
      response.status
    );
  }

  if (!validate(data)) {
    const reasons = (validate.errors ?? [])
      .map(err => `${err.instancePath || "/"} ${err.message ?? "is invalid"}`)
      .join("; ");
    throw new RegistryRequestError(
      `Unexpected response shape from ${url}: ${reasons}`,
      "parse_failure",
      response.status
    );
  }

  return data;
}

/**
 * GET a text document (HTML, DCF, YAML). Resolves to null on 404/410.
 */
export async function fetchText(
  url: string,
  options: RequestOptions = {}
): Promise<string | null> {
  const response = await request(url, "text/html, text/plain, */*", options);
  if (!response) {
    return null;
  }
  return response.text();
}

/**
 * Run a request that only enriches a lookup. Resolves to undefined on a
 * miss or on any failure except an abort, which still has to surface as a
 * timeout.
 */
export async function fetchOptional<T>(
  load: () => Promise<T | null>,
  signal?: AbortSignal
): Promise<T | undefined> {
  try {
    return (await load()) ?? undefined;
  } catch (error) {
    if (signal?.aborted || isAbortError(error)) {
      throw error;
    }
    return undefined;
  }
}
