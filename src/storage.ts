/**
 * Persist scraped books and discovered URL lists
 *
 * Stores are appended by read-merge-write. Each write goes to a temporary
 * file first and is renamed into place, so a crash never leaves a torn file.
 * Two processes appending to the same path at once can still lose rows.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { parseCsv, toCsv } from "./csv.js";
import type { Logger } from "./logger.js";
import { errorMessage } from "./logger.js";
import { BOOK_FIELDS, type BookRecord, type OutputFormat } from "./types.js";

/** Existing store content could not be understood */
export class StoreFormatError extends Error {
  constructor(
    message: string,
    readonly filePath: string,
  ) {
    super(message);
    this.name = "StoreFormatError";
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Read a file, treating a missing file as absent rather than an error.
 */
async function readIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (isNotFound(error)) return null;
    throw error;
  }
}

/**
 * Replace a file's content via a sibling temp file and rename.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
  const tmpPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.tmp`);
  await fs.writeFile(tmpPath, content, "utf-8");
  await fs.rename(tmpPath, filePath);
}

/**
 * Load the array stored in a JSON file.
 *
 * @returns The stored array, or [] when the file does not exist
 * @throws {StoreFormatError} When the file exists but is not a JSON array
 */
export async function readJsonArray(filePath: string): Promise<unknown[]> {
  const raw = await readIfExists(filePath);
  if (raw === null || raw.trim() === "") return [];

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new StoreFormatError(`Malformed JSON in ${filePath}: ${errorMessage(error)}`, filePath);
  }
  if (!Array.isArray(parsed)) {
    throw new StoreFormatError(`Expected a JSON array in ${filePath}`, filePath);
  }
  return parsed;
}

/**
 * Append records to a JSON array file, creating it when missing.
 * Records already in the file are kept as they are; nothing is deduplicated
 * across runs.
 *
 * @returns True when the file was written
 */
export async function appendJson(records: BookRecord[], filePath: string, logger: Logger): Promise<boolean> {
  try {
    const existing = await readJsonArray(filePath);
    const merged = [...existing, ...records];
    await writeFileAtomic(filePath, `${JSON.stringify(merged, null, 2)}\n`);
    logger.info(`Saved ${records.length} record(s) to ${filePath} (${merged.length} total)`);
    return true;
  } catch (error) {
    logger.error(`Error saving data to JSON ${filePath}: ${errorMessage(error)}`);
    return false;
  }
}

/**
 * Render one record field as a CSV cell. Arrays are stored as JSON text.
 */
export function toCsvCell(value: BookRecord[keyof BookRecord]): string {
  return Array.isArray(value) ? JSON.stringify(value) : String(value);
}

/**
 * Append records to a CSV file, creating it with a header when missing.
 * Columns of an existing file are kept in their order; record fields the
 * file lacks are added to the right and left empty for older rows.
 *
 * @returns True when the file was written
 */
export async function appendCsv(records: BookRecord[], filePath: string, logger: Logger): Promise<boolean> {
  try {
    const raw = await readIfExists(filePath);
    const [existingHeader = [], ...existingRows] = raw === null ? [] : parseCsv(raw);

    const header = [...existingHeader];
    for (const field of BOOK_FIELDS) {
      if (!header.includes(field)) header.push(field);
    }

    const padded = existingRows.map((row) => header.map((_, i) => row[i] ?? ""));
    const added = records.map((record) =>
      header.map((column) => {
        const field = BOOK_FIELDS.find((name) => name === column);
        return field === undefined ? "" : toCsvCell(record[field]);
      }),
    );

    await writeFileAtomic(filePath, toCsv([header, ...padded, ...added]));
    logger.info(`Saved ${records.length} record(s) to ${filePath} (${padded.length + added.length} total)`);
    return true;
  } catch (error) {
    logger.error(`Error saving data to CSV ${filePath}: ${errorMessage(error)}`);
    return false;
  }
}

export function isOutputFormat(value: string): value is OutputFormat {
  return value === "json" || value === "csv";
}

/**
 * Append records to `<basename>.<format>`.
 * An unsupported format is logged and ignored.
 *
 * @returns False only when a supported format failed to write
 */
export async function saveRecords(
  records: BookRecord[],
  format: string,
  basename: string,
  logger: Logger,
): Promise<boolean> {
  if (!isOutputFormat(format)) {
    logger.warn(`Unsupported file format: ${format}`);
    return true;
  }
  const filePath = `${basename}.${format}`;
  return format === "json" ? appendJson(records, filePath, logger) : appendCsv(records, filePath, logger);
}

// ============================================================================
// URL lists
// ============================================================================

/**
 * Write a URL list. A `.txt` path gets one URL per line; anything else a
 * JSON array of strings.
 *
 * @throws When the file cannot be written
 */
export async function saveUrlList(urls: string[], filePath: string): Promise<void> {
  const content =
    path.extname(filePath).toLowerCase() === ".txt" ? urls.map((url) => `${url}\n`).join("") : `${JSON.stringify(urls, null, 2)}\n`;
  await writeFileAtomic(filePath, content);
}

/**
 * Parse URL list content: a JSON array of strings, or one URL per line
 * with blank lines and `#` comments ignored.
 *
 * @throws {StoreFormatError} When JSON content is not an array of strings
 */
export function parseUrlList(content: string, filePath: string): string[] {
  const trimmed = content.trim();
  if (trimmed.startsWith("[")) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch (error) {
      throw new StoreFormatError(`Malformed JSON in ${filePath}: ${errorMessage(error)}`, filePath);
    }
    if (!Array.isArray(parsed) || !parsed.every((item): item is string => typeof item === "string")) {
      throw new StoreFormatError(`Expected a JSON array of strings in ${filePath}`, filePath);
    }
    return parsed;
  }

  return trimmed
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

/**
 * Read a URL list written by `saveUrlList` (or by hand).
 *
 * @throws When the file is missing or malformed
 */
export async function loadUrlList(filePath: string): Promise<string[]> {
  const content = await fs.readFile(filePath, "utf-8");
  return parseUrlList(content, filePath);
}
