/**
 * Run full pipeline: discover → scrape → save
 *
 * Usage: npm run all -- <listing-url> [options]
 */

import { discoverBookUrls, DEFAULT_MAX_URLS, DEFAULT_PAGE_DELAY, type DiscoverDeps } from "./discover.js";
import { createPageFetcher, DEFAULT_MAX_ATTEMPTS, fetchHtml } from "./fetcher.js";
import { createLogger, errorMessage, type Logger } from "./logger.js";
import {
  DEFAULT_FORMATS,
  DEFAULT_MAX_DELAY,
  DEFAULT_MIN_DELAY,
  DEFAULT_OUTPUT,
  parseFormats,
  saveAll,
  scrapeBooks,
  type ScrapeDeps,
} from "./scrape.js";
import { saveUrlList } from "./storage.js";
import {
  delay,
  getNullableStringArg,
  getNumberArg,
  getPositionalArg,
  getStringArg,
  hasFlag,
  hasHelpFlag,
  mathRandom,
  setupSignalHandlers,
  validateUrl,
} from "./utils.js";

/**
 * Format duration in milliseconds to human-readable string
 * Exported for testing
 */
export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;

  if (minutes > 0) {
    return `${minutes}m ${remainingSeconds}s`;
  }
  return `${seconds}s`;
}

export interface StepTiming {
  step: string;
  duration: number;
}

export interface PipelineOptions {
  listingUrl: string;
  maxUrls: number;
  /** Pause between listing pages, seconds */
  pageDelay: number;
  /** Courtesy pause range between detail pages, seconds */
  minDelay: number;
  maxDelay: number;
  output: string;
  formats: string[];
  /** Attempts per detail page */
  retries: number;
  /** Keep at most this many genres per book */
  maxCategories: number | null;
  shortDescription: boolean;
  /** Where to keep the discovered URL list, if anywhere */
  urlList: string | null;
  showHelp: boolean;
}

/** Flags that take values, used for positional argument detection */
const PIPELINE_VALUE_FLAGS = [
  "--max",
  "--delay",
  "--min-delay",
  "--max-delay",
  "--output",
  "--format",
  "--retries",
  "--genres",
  "--url-list",
];

/**
 * Parse command line arguments from an array
 * Exported for testing
 */
export function parseArgs(args: string[] = process.argv.slice(2)): PipelineOptions {
  const genres = getNullableStringArg(args, "--genres");
  const maxCategories = genres === null ? NaN : parseInt(genres, 10);

  return {
    listingUrl: getPositionalArg(args, PIPELINE_VALUE_FLAGS),
    maxUrls: Math.floor(getNumberArg(args, "--max", DEFAULT_MAX_URLS)),
    pageDelay: getNumberArg(args, "--delay", DEFAULT_PAGE_DELAY),
    minDelay: getNumberArg(args, "--min-delay", DEFAULT_MIN_DELAY),
    maxDelay: getNumberArg(args, "--max-delay", DEFAULT_MAX_DELAY),
    output: getStringArg(args, "--output", DEFAULT_OUTPUT),
    formats: parseFormats(getStringArg(args, "--format", DEFAULT_FORMATS.join(","))),
    retries: Math.max(1, Math.floor(getNumberArg(args, "--retries", DEFAULT_MAX_ATTEMPTS))),
    maxCategories: isNaN(maxCategories) || maxCategories < 0 ? null : maxCategories,
    shortDescription: hasFlag(args, "--short-description"),
    urlList: getNullableStringArg(args, "--url-list"),
    showHelp: hasHelpFlag(args),
  };
}

/**
 * Run one pipeline step with a description header and timing
 * Exported for testing
 */
export async function runStep<T>(
  description: string,
  step: () => Promise<T>,
  timings: StepTiming[],
): Promise<T> {
  console.log(`\n${"=".repeat(50)}`);
  console.log(`Step: ${description}`);
  console.log("=".repeat(50));

  const start = Date.now();
  const result = await step();
  const duration = Date.now() - start;

  console.log(`\n  Completed in ${formatDuration(duration)}`);
  timings.push({ step: description, duration });

  return result;
}

/** Collaborators of the pipeline, replaceable in tests */
export interface PipelineDeps {
  logger: Logger;
  discover: DiscoverDeps;
  scrape: ScrapeDeps;
}

export interface PipelineResult {
  urls: string[];
  /** Books scraped this run, whether or not they reached the stores */
  scraped: number;
  /** False when a store (or the URL list) could not be written */
  ok: boolean;
  timings: StepTiming[];
}

/**
 * Discover URLs, scrape them and append the books to the stores.
 */
export async function runPipeline(options: PipelineOptions, deps: PipelineDeps): Promise<PipelineResult> {
  const timings: StepTiming[] = [];

  const urls = await runStep(
    "Discovering book URLs",
    () =>
      discoverBookUrls(options.listingUrl, deps.discover, {
        maxUrls: options.maxUrls,
        delayMs: options.pageDelay * 1000,
      }),
    timings,
  );

  if (urls.length === 0) {
    deps.logger.warn("No URLs collected. Nothing to scrape.");
    return { urls, scraped: 0, ok: true, timings };
  }

  let ok = true;
  const { urlList } = options;
  if (urlList) {
    try {
      await saveUrlList(urls, urlList);
      deps.logger.info(`Book URLs saved to: ${urlList}`);
    } catch (error) {
      deps.logger.error(`Failed to write URL list to ${urlList}: ${errorMessage(error)}`);
      ok = false;
    }
  }

  const books = await runStep(
    "Scraping books",
    () =>
      scrapeBooks(urls, deps.scrape, {
        minDelayMs: options.minDelay * 1000,
        maxDelayMs: Math.max(options.minDelay, options.maxDelay) * 1000,
        maxCategories: options.maxCategories ?? undefined,
        descriptionMode: options.shortDescription ? "first-sentence" : "full",
      }),
    timings,
  );

  const saved = await runStep("Saving results", () => saveAll(books, options.formats, options.output, deps.logger), timings);

  return { urls, scraped: books.length, ok: ok && saved, timings };
}

function showUsage(): void {
  console.error("Usage: npm run all -- <listing-url> [options]");
  console.error("Example: npm run all -- https://www.goodreads.com/shelf/show/fantasy --max 10");
  console.error("Options:");
  console.error(`  --max n              Maximum number of books (default: ${DEFAULT_MAX_URLS})`);
  console.error(`  --delay s            Pause between listing pages (default: ${DEFAULT_PAGE_DELAY})`);
  console.error(`  --min-delay s        Minimum pause between books (default: ${DEFAULT_MIN_DELAY})`);
  console.error(`  --max-delay s        Maximum pause between books (default: ${DEFAULT_MAX_DELAY})`);
  console.error(`  --output base        Output name without extension (default: ${DEFAULT_OUTPUT})`);
  console.error(`  --format list        Comma-separated formats (default: ${DEFAULT_FORMATS.join(",")})`);
  console.error(`  --retries n          Attempts per book page (default: ${DEFAULT_MAX_ATTEMPTS})`);
  console.error("  --genres n           Keep at most n genres per book (default: all)");
  console.error("  --short-description  Keep only the first sentence of descriptions");
  console.error("  --url-list file      Also keep the discovered URLs in this file");
}

export async function main() {
  const options = parseArgs();

  if (options.showHelp) {
    showUsage();
    process.exit(0);
  }

  if (!options.listingUrl) {
    showUsage();
    process.exit(1);
  }

  const urlValidation = validateUrl(options.listingUrl);
  if (!urlValidation.isValid) {
    console.error(`Error: ${urlValidation.error}`);
    process.exit(1);
  }

  console.log("Starting full pipeline...");
  console.log(`URL: ${options.listingUrl}`);

  const logger = createLogger();
  const pipelineStart = Date.now();

  const result = await runPipeline(options, {
    logger,
    discover: { logger, fetchPage: (url) => fetchHtml(url), sleep: delay },
    scrape: {
      logger,
      fetchPage: createPageFetcher(logger, { maxAttempts: options.retries }),
      sleep: delay,
      random: mathRandom,
    },
  });

  const totalDuration = Date.now() - pipelineStart;

  console.log("\n" + "=".repeat(50));
  console.log(result.ok ? "Pipeline complete!" : "Pipeline finished with errors.");
  console.log("=".repeat(50));

  // Display timing summary
  console.log("\nTiming Summary:");
  console.log("-".repeat(35));
  for (const { step, duration } of result.timings) {
    const stepName = step.padEnd(24);
    console.log(`  ${stepName} ${formatDuration(duration)}`);
  }
  console.log("-".repeat(35));
  console.log(`  ${"Total".padEnd(24)} ${formatDuration(totalDuration)}`);

  console.log(`\nDiscovered ${result.urls.length} URL(s), scraped ${result.scraped} book(s).`);

  if (!result.ok) {
    process.exit(1);
  }
}

// Only run main when executed directly (not when imported for testing)
if (import.meta.url === `file://${process.argv[1]}`) {
  setupSignalHandlers("Pipeline");
  main().catch((error) => {
    console.error("\nPipeline failed:", error);
    process.exit(1);
  });
}
