/**
 * HTTP fetching for detail and listing pages
 */

import type { Logger } from "./logger.js";
import { errorMessage } from "./logger.js";
import { delay } from "./utils.js";

/** Identifies the client to the sites being scraped */
export const DEFAULT_USER_AGENT = "Mozilla/5.0 (compatible; book-metadata-scraper/1.0)";

export const DEFAULT_TIMEOUT_MS = 10_000;
export const DEFAULT_MAX_ATTEMPTS = 3;
/** Fixed pause between attempts; there is no backoff */
export const DEFAULT_RETRY_DELAY_MS = 2000;

/** Transport-level or HTTP status failure for a single request */
export class FetchError extends Error {
  constructor(
    message: string,
    readonly url: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = "FetchError";
  }
}

export interface FetchOptions {
  timeoutMs?: number;
  userAgent?: string;
}

export interface RetryOptions extends FetchOptions {
  maxAttempts?: number;
  retryDelayMs?: number;
}

/** Fetches a page body, resolving to null when the page could not be retrieved */
export type PageFetcher = (url: string) => Promise<string | null>;

/**
 * Fetch a page body with a single request.
 *
 * @throws {FetchError} On a non-2xx status, a timeout, a connection error or a broken body
 */
export async function fetchHtml(url: string, options: FetchOptions = {}): Promise<string> {
  const { timeoutMs = DEFAULT_TIMEOUT_MS, userAgent = DEFAULT_USER_AGENT } = options;

  let response: Response;
  try {
    response = await fetch(url, {
      headers: {
        "User-Agent": userAgent,
        Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
      },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    throw new FetchError(`Request failed: ${errorMessage(error)}`, url);
  }

  if (!response.ok) {
    // Release the connection; the error body is not needed
    await response.body?.cancel();
    throw new FetchError(`HTTP ${response.status}`, url, response.status);
  }

  try {
    return await response.text();
  } catch (error) {
    throw new FetchError(`Failed to read response body: ${errorMessage(error)}`, url, response.status);
  }
}

/**
 * Fetch a page, retrying a fixed number of times with a fixed pause.
 * Every failed attempt is logged as a warning; exhaustion is logged as an error.
 *
 * @returns The page body, or null after all attempts failed
 */
export async function fetchWithRetry(url: string, logger: Logger, options: RetryOptions = {}): Promise<string | null> {
  const { maxAttempts = DEFAULT_MAX_ATTEMPTS, retryDelayMs = DEFAULT_RETRY_DELAY_MS, ...fetchOptions } = options;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fetchHtml(url, fetchOptions);
    } catch (error) {
      logger.warn(`Attempt ${attempt}/${maxAttempts} failed for ${url}: ${errorMessage(error)}`);
    }

    if (attempt < maxAttempts) {
      await delay(retryDelayMs);
    }
  }

  logger.error(`Failed to fetch URL after ${maxAttempts} attempts: ${url}`);
  return null;
}

/**
 * Bind retry settings and a logger into a PageFetcher.
 */
export function createPageFetcher(logger: Logger, options: RetryOptions = {}): PageFetcher {
  return (url) => fetchWithRetry(url, logger, options);
}
