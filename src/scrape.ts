/**
 * Scrape book metadata from detail pages
 *
 * Usage: npm run scrape -- [url-list-file] [options]
 * Example: npm run scrape -- book-urls.json --output books --format json,csv
 *
 * Options:
 *   --input <file>        URL list (JSON array or one URL per line, default: book-urls.json)
 *   --output <base>       Output file name without extension (default: books)
 *   --format <list>       Comma-separated formats: json, csv (default: json,csv)
 *   --retries <n>         Attempts per page (default: 3)
 *   --min-delay <s>       Minimum pause between pages in seconds (default: 1)
 *   --max-delay <s>       Maximum pause between pages in seconds (default: 3)
 *   --genres <n>          Keep at most n genres per book (default: all)
 *   --short-description   Keep only the first sentence of descriptions
 */

import { createPageFetcher, DEFAULT_MAX_ATTEMPTS, type PageFetcher } from "./fetcher.js";
import { createLogger, errorMessage, type Logger } from "./logger.js";
import { parseBookPage } from "./parse.js";
import { loadUrlList, saveRecords } from "./storage.js";
import type { BookRecord, DescriptionMode, RandomSource } from "./types.js";
import {
  delay,
  getNullableStringArg,
  getNumberArg,
  getPositionalArg,
  getStringArg,
  hasFlag,
  hasHelpFlag,
  isValidUrl,
  mathRandom,
  randomBetween,
  setupSignalHandlers,
} from "./utils.js";

export const DEFAULT_INPUT = "book-urls.json";
export const DEFAULT_OUTPUT = "books";
export const DEFAULT_FORMATS = ["json", "csv"];
// Courtesy pause between detail pages, in seconds
export const DEFAULT_MIN_DELAY = 1;
export const DEFAULT_MAX_DELAY = 3;

/** Collaborators of the batch scraper, replaceable in tests */
export interface ScrapeDeps {
  logger: Logger;
  fetchPage: PageFetcher;
  sleep: (ms: number) => Promise<void>;
  random: RandomSource;
}

export interface ScrapeOptions {
  minDelayMs: number;
  maxDelayMs: number;
  maxCategories?: number;
  descriptionMode?: DescriptionMode;
}

/** Configuration options for the scrape command */
export interface ScrapeCliOptions {
  input: string;
  output: string;
  formats: string[];
  retries: number;
  minDelay: number;
  maxDelay: number;
  maxCategories: number | null;
  shortDescription: boolean;
  showHelp: boolean;
}

/**
 * Print usage information for the scrape command.
 */
function showUsage(): void {
  console.log("Usage: npm run scrape -- [url-list-file] [options]");
  console.log("");
  console.log("Scrape book metadata from the detail pages listed in a URL list file.");
  console.log("");
  console.log("Options:");
  console.log(`  --input <file>        URL list file (default: ${DEFAULT_INPUT})`);
  console.log(`  --output <base>       Output name without extension (default: ${DEFAULT_OUTPUT})`);
  console.log(`  --format <list>       Comma-separated formats: json, csv (default: ${DEFAULT_FORMATS.join(",")})`);
  console.log(`  --retries <n>         Attempts per page (default: ${DEFAULT_MAX_ATTEMPTS})`);
  console.log(`  --min-delay <s>       Minimum pause between pages (default: ${DEFAULT_MIN_DELAY})`);
  console.log(`  --max-delay <s>       Maximum pause between pages (default: ${DEFAULT_MAX_DELAY})`);
  console.log("  --genres <n>          Keep at most n genres per book (default: all)");
  console.log("  --short-description   Keep only the first sentence of descriptions");
  console.log("  --help, -h            Show this help message");
  console.log("");
  console.log("Note: price, likesCount and stockCount are simulated random values, not scraped.");
}

/** Flags that take values, used for positional argument detection */
const SCRAPE_VALUE_FLAGS = ["--input", "--output", "--format", "--retries", "--min-delay", "--max-delay", "--genres"];

/**
 * Parse a comma-separated format list.
 *
 * @example
 * parseFormats('json, CSV') // ['json', 'csv']
 */
export function parseFormats(value: string): string[] {
  return value
    .split(",")
    .map((format) => format.trim().toLowerCase())
    .filter((format) => format.length > 0);
}

/**
 * Parse command line arguments for the scrape command.
 *
 * @param args - Command line arguments (defaults to process.argv)
 * @returns Parsed scrape options
 */
export function parseArgs(args: string[] = process.argv.slice(2)): ScrapeCliOptions {
  const genres = getNullableStringArg(args, "--genres");
  const maxCategories = genres === null ? NaN : parseInt(genres, 10);

  return {
    input: getNullableStringArg(args, "--input") ?? (getPositionalArg(args, SCRAPE_VALUE_FLAGS) || DEFAULT_INPUT),
    output: getStringArg(args, "--output", DEFAULT_OUTPUT),
    formats: parseFormats(getStringArg(args, "--format", DEFAULT_FORMATS.join(","))),
    retries: Math.max(1, Math.floor(getNumberArg(args, "--retries", DEFAULT_MAX_ATTEMPTS))),
    minDelay: getNumberArg(args, "--min-delay", DEFAULT_MIN_DELAY),
    maxDelay: getNumberArg(args, "--max-delay", DEFAULT_MAX_DELAY),
    maxCategories: isNaN(maxCategories) || maxCategories < 0 ? null : maxCategories,
    shortDescription: hasFlag(args, "--short-description"),
    showHelp: hasHelpFlag(args),
  };
}

/**
 * Drop records whose title was already seen. The first occurrence wins and
 * the relative order of kept records is preserved.
 */
export function dedupeByTitle(records: BookRecord[]): BookRecord[] {
  const seen = new Set<string>();
  return records.filter((record) => {
    if (seen.has(record.title)) return false;
    seen.add(record.title);
    return true;
  });
}

/**
 * Scrape every URL in order, one at a time.
 * Invalid URLs, unreachable pages and unparseable pages are logged and
 * skipped; they never abort the batch. Between requests the scraper pauses
 * for a random duration in [minDelayMs, maxDelayMs].
 *
 * @returns Parsed books, deduplicated by title
 */
export async function scrapeBooks(urls: string[], deps: ScrapeDeps, options: ScrapeOptions): Promise<BookRecord[]> {
  const { logger, fetchPage, sleep, random } = deps;
  const books: BookRecord[] = [];

  for (let i = 0; i < urls.length; i++) {
    const url = urls[i];
    if (!isValidUrl(url)) {
      logger.warn(`Invalid URL skipped: ${url}`);
      continue;
    }

    const html = await fetchPage(url);
    if (html !== null) {
      const result = parseBookPage(html, url, {
        random,
        maxCategories: options.maxCategories,
        descriptionMode: options.descriptionMode,
      });
      if (result.success) {
        books.push(result.book);
        logger.info(`[${i + 1}/${urls.length}] Scraped data for book: ${result.book.title}`);
      } else {
        logger.error(`Error occurred while parsing ${url}: ${result.error}`);
      }
    }

    if (i < urls.length - 1) {
      await sleep(randomBetween(random, options.minDelayMs, options.maxDelayMs));
    }
  }

  const unique = dedupeByTitle(books);
  if (unique.length < books.length) {
    logger.info(`Removed ${books.length - unique.length} duplicate title(s)`);
  }
  return unique;
}

/**
 * Save records in every requested format.
 *
 * @returns False when any write failed
 */
export async function saveAll(records: BookRecord[], formats: string[], basename: string, logger: Logger): Promise<boolean> {
  let ok = true;
  for (const format of formats) {
    if (!(await saveRecords(records, format, basename, logger))) ok = false;
  }
  return ok;
}

/**
 * Main entry point for the scrape command.
 * Reads the URL list, scrapes each page and appends results to the stores.
 *
 * @throws Exits with code 1 if the URL list cannot be read or a store cannot be written
 */
export async function main(): Promise<void> {
  const options = parseArgs();

  if (options.showHelp) {
    showUsage();
    process.exit(0);
  }

  const logger = createLogger();

  let urls: string[];
  try {
    urls = await loadUrlList(options.input);
  } catch (error) {
    logger.error(`Could not read URL list ${options.input}: ${errorMessage(error)}`);
    process.exit(1);
  }

  logger.info(`Scraping ${urls.length} URL(s) from ${options.input}`);

  const books = await scrapeBooks(
    urls,
    {
      logger,
      fetchPage: createPageFetcher(logger, { maxAttempts: options.retries }),
      sleep: delay,
      random: mathRandom,
    },
    {
      minDelayMs: options.minDelay * 1000,
      maxDelayMs: Math.max(options.minDelay, options.maxDelay) * 1000,
      maxCategories: options.maxCategories ?? undefined,
      descriptionMode: options.shortDescription ? "first-sentence" : "full",
    },
  );

  const saved = await saveAll(books, options.formats, options.output, logger);
  logger.info(`Scraping and saving completed: ${books.length} book(s).`);

  if (!saved) {
    process.exit(1);
  }
}

// Only run main when executed directly (not when imported for testing)
if (import.meta.url === `file://${process.argv[1]}`) {
  setupSignalHandlers("Scraping");
  main().catch((error) => {
    console.error("Error:", error);
    process.exit(1);
  });
}
