/**
 * Discover book detail-page URLs from paginated listing pages
 *
 * Usage: npm run discover -- --url <listing-url> [options]
 * Example: npm run discover -- --url https://www.goodreads.com/shelf/show/fantasy --max 50 --delay 1
 *
 * Options:
 *   --url <url>       Listing, shelf or search page to start from (required)
 *   --max <n>         Maximum number of book URLs to collect (default: 20)
 *   --delay <s>       Pause between listing pages in seconds (default: 2)
 *   --output <file>   Output file: .json array or .txt lines (default: book-urls.json)
 */

import * as path from "node:path";
import * as cheerio from "cheerio";
import { fetchHtml } from "./fetcher.js";
import { createLogger, errorMessage, type Logger } from "./logger.js";
import { saveUrlList } from "./storage.js";
import {
  delay,
  getBaseUrl,
  getNullableStringArg,
  getNumberArg,
  getStringArg,
  hasHelpFlag,
  setupSignalHandlers,
  validateUrl,
} from "./utils.js";

export const DEFAULT_MAX_URLS = 20;
export const DEFAULT_PAGE_DELAY = 2;
export const DEFAULT_URL_LIST = "book-urls.json";

/** Links from a listing page to book detail pages */
export const BOOK_LINK_SELECTOR = "a.bookTitle[href]";

/** Collaborators of the crawler, replaceable in tests */
export interface DiscoverDeps {
  logger: Logger;
  /** Single best-effort request; throws on failure */
  fetchPage: (url: string) => Promise<string>;
  sleep: (ms: number) => Promise<void>;
}

export interface DiscoverOptions {
  maxUrls: number;
  delayMs: number;
}

/** Configuration options for the discover command */
export interface DiscoverCliOptions {
  url: string | null;
  maxUrls: number;
  delay: number;
  output: string;
  showHelp: boolean;
}

/**
 * Print usage information for the discover command.
 */
function showUsage(): void {
  console.log("Usage: npm run discover -- --url <listing-url> [options]");
  console.log("");
  console.log("Collect unique book URLs from a paginated shelf, list or search page.");
  console.log("");
  console.log("Options:");
  console.log("  --url <url>          Listing page to start from (required)");
  console.log(`  --max <n>            Maximum number of URLs (default: ${DEFAULT_MAX_URLS})`);
  console.log(`  --delay <s>          Pause between pages in seconds (default: ${DEFAULT_PAGE_DELAY})`);
  console.log(`  --output <file>      .json array or .txt lines (default: ${DEFAULT_URL_LIST})`);
  console.log("  --help, -h           Show this help message");
}

/**
 * Parse command line arguments for the discover command.
 *
 * @param args - Command line arguments (defaults to process.argv)
 * @returns Parsed discover options
 */
export function parseArgs(args: string[] = process.argv.slice(2)): DiscoverCliOptions {
  return {
    url: getNullableStringArg(args, "--url"),
    maxUrls: Math.floor(getNumberArg(args, "--max", DEFAULT_MAX_URLS)),
    delay: getNumberArg(args, "--delay", DEFAULT_PAGE_DELAY),
    output: getStringArg(args, "--output", DEFAULT_URL_LIST),
    showHelp: hasHelpFlag(args),
  };
}

/**
 * Set (or overwrite) the `page` query parameter, keeping all others.
 *
 * @example
 * buildPageUrl('https://example.com/shelf/show/fantasy?page=4', 2)
 * // 'https://example.com/shelf/show/fantasy?page=2'
 */
export function buildPageUrl(baseUrl: string, page: number): string {
  const url = new URL(baseUrl);
  url.searchParams.set("page", String(page));
  return url.href;
}

/**
 * Extract book detail links from a listing page, resolved against the site origin.
 */
export function extractBookLinks(html: string, origin: string): string[] {
  const $ = cheerio.load(html);
  const links: string[] = [];
  for (const anchor of $(BOOK_LINK_SELECTOR).toArray()) {
    const href = $(anchor).attr("href");
    if (!href || !URL.canParse(href, origin)) continue;
    links.push(new URL(href, origin).href);
  }
  return links;
}

/**
 * Walk listing pages from page 1, collecting unique book URLs in discovery order.
 *
 * Stops when `maxUrls` is reached, when a page cannot be fetched, when a page
 * has no book links, or when a page adds nothing new.
 */
export async function discoverBookUrls(baseUrl: string, deps: DiscoverDeps, options: DiscoverOptions): Promise<string[]> {
  const { logger, fetchPage, sleep } = deps;
  const { maxUrls, delayMs } = options;
  const origin = getBaseUrl(baseUrl);
  const seen = new Set<string>();
  const urls: string[] = [];
  let page = 1;

  logger.info("Starting discovery session...");

  while (urls.length < maxUrls) {
    const pageUrl = buildPageUrl(baseUrl, page);
    logger.info(`Fetching page ${page}: ${pageUrl}`);

    let html: string;
    try {
      html = await fetchPage(pageUrl);
    } catch (error) {
      logger.error(`Request failed on page ${page}: ${errorMessage(error)}`);
      logger.info("Stopping due to network error.");
      break;
    }

    const links = extractBookLinks(html, origin);
    if (links.length === 0) {
      logger.info("No book links found on this page. Possibly last page.");
      break;
    }

    let added = 0;
    for (const link of links) {
      if (seen.has(link)) continue;
      seen.add(link);
      urls.push(link);
      added++;
      if (urls.length >= maxUrls) break;
    }

    logger.info(`Found ${added} new URL(s) on page ${page}. Total: ${urls.length}/${maxUrls}`);

    if (added === 0) {
      logger.info("Page repeated earlier results. Stopping.");
      break;
    }
    if (urls.length >= maxUrls) break;

    page++;
    await sleep(delayMs);
  }

  logger.info(`Collected ${urls.length} unique book URL(s).`);
  return urls;
}

/**
 * Main entry point for the discover command.
 *
 * @throws Exits with code 1 if the URL is missing or invalid, or the output cannot be written
 */
export async function main(): Promise<void> {
  const options = parseArgs();

  if (options.showHelp) {
    showUsage();
    process.exit(0);
  }

  if (!options.url) {
    showUsage();
    process.exit(1);
  }

  const urlValidation = validateUrl(options.url);
  if (!urlValidation.isValid) {
    console.error(`Error: ${urlValidation.error}`);
    process.exit(1);
  }

  const logger = createLogger();
  logger.info(`Target URL:  ${options.url}`);
  logger.info(`Max URLs:    ${options.maxUrls}`);
  logger.info(`Delay:       ${options.delay} second(s)`);
  logger.info(`Output file: ${options.output}`);

  const urls = await discoverBookUrls(
    options.url,
    { logger, fetchPage: (url) => fetchHtml(url), sleep: delay },
    { maxUrls: options.maxUrls, delayMs: options.delay * 1000 },
  );

  if (urls.length === 0) {
    logger.warn("No URLs collected. Output file was not created.");
    return;
  }

  try {
    await saveUrlList(urls, options.output);
    logger.info(`Book URLs saved to: ${path.resolve(options.output)}`);
  } catch (error) {
    logger.error(`Failed to write output to ${path.resolve(options.output)}: ${errorMessage(error)}`);
    process.exit(1);
  }
}

// Only run main when executed directly (not when imported for testing)
if (import.meta.url === `file://${process.argv[1]}`) {
  setupSignalHandlers("Discovery");
  main().catch((error) => {
    console.error("Error:", error);
    process.exit(1);
  });
}
