import { SourceUnavailableError, errorMessage } from "../errors.js";
import { sourceLogger } from "../logger.js";

import type { ProviderName } from "../types/index.js";

export interface RequestOptions {
  headers?: Record<string, string>;
  timeoutMs: number;
}

const DEFAULT_HEADERS = {
  Accept: "application/json",
  "User-Agent": "fixture-sync/0.1",
};

const SECRET_PARAMS = ["key", "api_key", "token"];

/**
 * Strip credentials from a URL before it is logged
 */
export function redactUrl(url: string): string {
  const parsed = new URL(url);
  for (const param of SECRET_PARAMS) {
    if (parsed.searchParams.has(param)) {
      parsed.searchParams.set(param, "****");
    }
  }
  return parsed.toString();
}

/**
 * Build a URL from a base, a path and query parameters, skipping undefined
 * values
 */
export function buildUrl(
  baseUrl: string,
  path: string,
  params: Record<string, string | number | undefined> = {}
): string {
  const url = new URL(`${baseUrl}${path}`);
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) {
      continue;
    }
    url.searchParams.set(key, String(value));
  }
  return url.toString();
}

async function send(
  provider: ProviderName,
  url: string,
  options: RequestOptions
): Promise<Response> {
  const safeUrl = redactUrl(url);
  sourceLogger.debug({ provider, url: safeUrl }, "Sending request to provider");

  const startTime = performance.now();
  try {
    const response = await fetch(url, {
      headers: { ...DEFAULT_HEADERS, ...options.headers },
      signal: AbortSignal.timeout(options.timeoutMs),
    });
    const duration = Math.round(performance.now() - startTime);

    sourceLogger.info(
      {
        provider,
        url: safeUrl,
        status: response.status,
        duration: `${String(duration)}ms`,
      },
      "Received response from provider"
    );

    return response;
  } catch (error) {
    sourceLogger.warn(
      { provider, url: safeUrl, error: errorMessage(error) },
      "Provider request failed"
    );
    throw new SourceUnavailableError(
      provider,
      `Request failed: ${errorMessage(error)}`,
      { cause: error }
    );
  }
}

/**
 * GET a JSON document from a provider.
 *
 * Network errors, timeouts, non-2xx statuses and unparseable bodies all
 * reject with SourceUnavailableError.
 */
export async function requestJson<T>(
  provider: ProviderName,
  url: string,
  options: RequestOptions
): Promise<T> {
  const response = await send(provider, url, options);

  if (!response.ok) {
    sourceLogger.warn(
      {
        provider,
        url: redactUrl(url),
        status: response.status,
        statusText: response.statusText,
      },
      "Provider returned an error status"
    );
    throw new SourceUnavailableError(
      provider,
      `HTTP ${String(response.status)} ${response.statusText}`,
      { status: response.status }
    );
  }

  try {
    return (await response.json()) as T;
  } catch (error) {
    sourceLogger.warn(
      { provider, url: redactUrl(url), error: errorMessage(error) },
      "Provider returned an unparseable body"
    );
    throw new SourceUnavailableError(provider, "Invalid JSON response", {
      cause: error,
    });
  }
}

/**
 * Lightweight reachability check: true only for an HTTP 200 answer
 */
export async function probe(
  provider: ProviderName,
  url: string,
  options: RequestOptions
): Promise<boolean> {
  try {
    const response = await send(provider, url, options);
    return response.status === 200;
  } catch (error) {
    sourceLogger.debug(
      { provider, error: errorMessage(error) },
      "Provider probe failed"
    );
    return false;
  }
}

/**
 * Run the mapping of a decoded body. A body that does not have the
 * documented shape rejects like any other provider failure.
 */
export function parseBody<T>(
  provider: ProviderName,
  what: string,
  parse: () => T
): T {
  try {
    return parse();
  } catch (error) {
    throw new SourceUnavailableError(
      provider,
      `Malformed ${what}: ${errorMessage(error)}`,
      { cause: error }
    );
  }
}
