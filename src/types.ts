/**
 * Shared type definitions for the scraper
 */

/** Value used for scraped text fields that could not be found */
export type NotAvailable = "N/A";

/** Metadata for a single book, as written to the JSON and CSV stores */
export interface BookRecord {
  title: string;
  authorName: string;
  description: string;
  /** ISBN-13 or ISBN-10 as printed on the page */
  isbn: string | NotAvailable;
  /** Normalized to YYYY-MM-DD */
  publicationDate: string | NotAvailable;
  pageCount: number | NotAvailable;
  categories: string[];
  imageUrl: string;
  averageRating: number;
  totalRatingCount: number;
  totalReviewCount: number;
  /** Simulated, not scraped */
  price: number;
  /** Simulated, not scraped */
  likesCount: number;
  /** Simulated, not scraped */
  stockCount: number;
}

/** Column order for tabular output */
export const BOOK_FIELDS = [
  "title",
  "authorName",
  "description",
  "isbn",
  "publicationDate",
  "pageCount",
  "categories",
  "imageUrl",
  "averageRating",
  "totalRatingCount",
  "totalReviewCount",
  "price",
  "likesCount",
  "stockCount",
] as const satisfies readonly (keyof BookRecord)[];

/** Result of parsing one detail page */
export type ParseResult = { success: true; book: BookRecord } | { success: false; error: string };

/** How the description field is reduced */
export type DescriptionMode = "full" | "first-sentence";

/** Output formats understood by the storage writer */
export type OutputFormat = "json" | "csv";

/** Source of uniformly distributed numbers in [0, 1) */
export interface RandomSource {
  next(): number;
}
