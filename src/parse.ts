/**
 * Extract book metadata from a detail page's markup.
 *
 * Title and author are required: a page without them is rejected.
 * Every other field falls back to a fixed value when its element is
 * missing or its text cannot be read.
 */

import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import type { BookRecord, DescriptionMode, NotAvailable, ParseResult, RandomSource } from "./types.js";
import { randomInt } from "./utils.js";

export const NOT_AVAILABLE: NotAvailable = "N/A";
export const FALLBACK_DESCRIPTION = "No description available.";
export const FALLBACK_CATEGORIES: readonly string[] = ["General"];
export const FALLBACK_IMAGE = "https://via.placeholder.com/150?text=No+Image+Available";

/** Structural locators for the fields of a detail page */
export const SELECTORS = {
  title: 'h1[data-testid="bookTitle"]',
  author: "a.ContributorLink",
  description: 'div[data-testid="description"]',
  descriptionText: '[data-testid="contentContainer"]',
  isbnBlocks: 'div.TruncatedContent__text.TruncatedContent__text--small[data-testid="contentContainer"]',
  publicationInfo: 'p[data-testid="publicationInfo"]',
  pagesFormat: 'p[data-testid="pagesFormat"]',
  rating: "div.RatingStatistics__rating",
  ratingsCount: 'span[data-testid="ratingsCount"]',
  reviewsCount: 'span[data-testid="reviewsCount"]',
  genresList: 'div[data-testid="genresList"]',
  genreLabel: "a.Button--tag.Button--medium span.Button__labelItem",
  image: "img.ResponsiveImage",
} as const;

const MONTHS = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
];

export interface ParseOptions {
  random: RandomSource;
  /** Keep at most this many genres; unbounded when omitted */
  maxCategories?: number;
  descriptionMode?: DescriptionMode;
}

/** Collapse runs of whitespace and trim */
export function cleanText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Strip every non-digit character and parse the rest.
 *
 * @example
 * extractIntFromText('625,058 ratings') // 625058
 * extractIntFromText('no reviews') // 0
 */
export function extractIntFromText(text: string | undefined): number {
  if (!text) return 0;
  const digits = text.replace(/\D/g, "");
  return digits ? parseInt(digits, 10) : 0;
}

/**
 * Resolve an English month name or abbreviation of at least three letters
 * ("Mar", "Sept", "December") to a zero-based index.
 */
function monthIndex(name: string): number {
  const lower = name.toLowerCase();
  if (lower.length < 3) return -1;
  return MONTHS.findIndex((month) => month.startsWith(lower));
}

/**
 * Format a calendar date as YYYY-MM-DD, or N/A when the day does not exist.
 */
function formatDate(year: number, month: number, day: number): string {
  const date = new Date(Date.UTC(year, month, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month || date.getUTCDate() !== day) {
    return NOT_AVAILABLE;
  }
  const mm = String(month + 1).padStart(2, "0");
  const dd = String(day).padStart(2, "0");
  return `${String(year).padStart(4, "0")}-${mm}-${dd}`;
}

/**
 * Normalize a publication-info sentence to YYYY-MM-DD.
 * Patterns are tried from most to least specific; a month without a day
 * resolves to the 1st and a bare year to January 1st.
 *
 * @example
 * parsePublicationText('First published March 3, 1996') // '1996-03-03'
 * parsePublicationText('Published March 1996') // '1996-03-01'
 * parsePublicationText('Published 1996') // '1996-01-01'
 */
export function parsePublicationText(text: string): string {
  const fullDate = text.match(/(?:First published|Published)\s+([A-Za-z]+)\s+(\d{1,2}),\s+(\d{4})/);
  if (fullDate) {
    const month = monthIndex(fullDate[1]);
    if (month < 0) return NOT_AVAILABLE;
    return formatDate(parseInt(fullDate[3], 10), month, parseInt(fullDate[2], 10));
  }

  const monthYear = text.match(/(?:First published|Published)\s+([A-Za-z]+)\s+(\d{4})/);
  if (monthYear) {
    const month = monthIndex(monthYear[1]);
    if (month < 0) return NOT_AVAILABLE;
    return formatDate(parseInt(monthYear[2], 10), month, 1);
  }

  const yearOnly = text.match(/(?:First published|Published)\s+(\d{4})/);
  if (yearOnly) {
    return formatDate(parseInt(yearOnly[1], 10), 0, 1);
  }

  return NOT_AVAILABLE;
}

export function extractPublicationDate($: CheerioAPI): string {
  const info = $(SELECTORS.publicationInfo).first();
  if (info.length === 0) return NOT_AVAILABLE;
  return parsePublicationText(cleanText(info.text()));
}

/**
 * Find the ISBN in the short detail blocks, falling back to the first
 * ISBN-13 anywhere in the raw markup.
 */
export function extractIsbn($: CheerioAPI, html: string): string {
  for (const block of $(SELECTORS.isbnBlocks).toArray()) {
    const token = cleanText($(block).text()).split(" ")[0];
    if (/^\d{10}/.test(token)) return token;
  }

  const match = html.match(/\b97[89]\d{10}\b/);
  return match ? match[0] : NOT_AVAILABLE;
}

export function extractPageCount($: CheerioAPI): number | NotAvailable {
  const format = $(SELECTORS.pagesFormat).first();
  if (format.length === 0) return NOT_AVAILABLE;
  const match = format.text().match(/(\d+)\s+pages/i);
  return match ? parseInt(match[1], 10) : NOT_AVAILABLE;
}

export function extractCategories($: CheerioAPI, maxCategories?: number): string[] {
  const labels = $(SELECTORS.genresList)
    .first()
    .find(SELECTORS.genreLabel)
    .toArray()
    .map((label) => cleanText($(label).text()))
    .filter((label) => label.length > 0);
  const capped = maxCategories === undefined ? labels : labels.slice(0, maxCategories);
  return capped.length > 0 ? capped : [...FALLBACK_CATEGORIES];
}

export function extractDescription($: CheerioAPI, mode: DescriptionMode = "full"): string {
  const container = $(SELECTORS.description).first();
  if (container.length === 0) return FALLBACK_DESCRIPTION;

  const inner = container.find(SELECTORS.descriptionText).first();
  const text = cleanText((inner.length > 0 ? inner : container).text());
  if (!text) return FALLBACK_DESCRIPTION;

  if (mode === "first-sentence") {
    return text.includes(".") ? `${text.split(".")[0]}.` : FALLBACK_DESCRIPTION;
  }
  return text;
}

function extractRating($: CheerioAPI): number {
  const rating = parseFloat(cleanText($(SELECTORS.rating).first().text()));
  return isNaN(rating) ? 0 : rating;
}

function extractImageUrl($: CheerioAPI): string {
  return $(SELECTORS.image).first().attr("src") || FALLBACK_IMAGE;
}

/**
 * Parse a detail page into a BookRecord.
 * The simulated commerce fields (price, likesCount, stockCount) are drawn
 * from `options.random` and do not come from the page.
 *
 * @param html - Raw page markup
 * @param url - Source URL, used in failure messages
 */
export function parseBookPage(html: string, url: string, options: ParseOptions): ParseResult {
  const $ = cheerio.load(html);

  const title = cleanText($(SELECTORS.title).first().text());
  if (!title) {
    return { success: false, error: `Missing required field "title" on ${url}` };
  }
  const authorName = cleanText($(SELECTORS.author).first().text());
  if (!authorName) {
    return { success: false, error: `Missing required field "authorName" on ${url}` };
  }

  const book: BookRecord = {
    title,
    authorName,
    description: extractDescription($, options.descriptionMode),
    isbn: extractIsbn($, html),
    publicationDate: extractPublicationDate($),
    pageCount: extractPageCount($),
    categories: extractCategories($, options.maxCategories),
    imageUrl: extractImageUrl($),
    averageRating: extractRating($),
    totalRatingCount: extractIntFromText($(SELECTORS.ratingsCount).first().text()),
    totalReviewCount: extractIntFromText($(SELECTORS.reviewsCount).first().text()),
    price: randomInt(options.random, 10, 200) * 1000,
    likesCount: randomInt(options.random, 1, 100),
    stockCount: randomInt(options.random, 1, 10),
  };

  return { success: true, book };
}
