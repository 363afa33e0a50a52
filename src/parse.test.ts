import * as cheerio from "cheerio";
import { describe, expect, it } from "vitest";
import {
  cleanText,
  extractCategories,
  extractDescription,
  extractIntFromText,
  extractIsbn,
  extractPageCount,
  extractPublicationDate,
  FALLBACK_DESCRIPTION,
  FALLBACK_IMAGE,
  parseBookPage,
  parsePublicationText,
} from "./parse.js";
import type { RandomSource } from "./types.js";

const BOOK_URL = "https://example.com/book/show/36236124-fight-club";
const lowest: RandomSource = { next: () => 0 };
const highest: RandomSource = { next: () => 0.999999 };

const genre = (label: string) =>
  `<a class="Button Button--tag Button--medium" href="/genres/${label}"><span class="Button__labelItem">${label}</span></a>`;

const FULL_PAGE = `<!doctype html>
<html><body>
  <h1 data-testid="bookTitle">Fight Club</h1>
  <a class="ContributorLink" href="/author/show/2546"><span>Chuck Palahniuk</span></a>
  <img class="ResponsiveImage" src="https://images.example.com/covers/fight-club.jpg" alt="cover">
  <div data-testid="description">
    <div class="TruncatedContent__text TruncatedContent__text--large" data-testid="contentContainer">
      <span>The first rule is simple.
        The second rule is the same.</span>
    </div>
  </div>
  <div class="TruncatedContent__text TruncatedContent__text--small" data-testid="contentContainer">Paperback edition</div>
  <div class="TruncatedContent__text TruncatedContent__text--small" data-testid="contentContainer">9780393355949 (ISBN10: 0393355942)</div>
  <p data-testid="pagesFormat">224 pages, Paperback</p>
  <p data-testid="publicationInfo">First published August 17, 1996</p>
  <div class="RatingStatistics__rating">4.18</div>
  <span data-testid="ratingsCount">625,058&nbsp;ratings</span>
  <span data-testid="reviewsCount">25,009 reviews</span>
  <div data-testid="genresList"><ul>${genre("Fiction")}${genre("Classics")}${genre("Thriller")}</ul></div>
</body></html>`;

const MINIMAL_PAGE = `<html><body>
  <h1 data-testid="bookTitle">Untitled Draft</h1>
  <a class="ContributorLink" href="/author/show/1">Anonymous</a>
</body></html>`;

describe("parseBookPage", () => {
  it("extracts every field from a complete page", () => {
    const result = parseBookPage(FULL_PAGE, BOOK_URL, { random: lowest });

    expect(result).toEqual({
      success: true,
      book: {
        title: "Fight Club",
        authorName: "Chuck Palahniuk",
        description: "The first rule is simple. The second rule is the same.",
        isbn: "9780393355949",
        publicationDate: "1996-08-17",
        pageCount: 224,
        categories: ["Fiction", "Classics", "Thriller"],
        imageUrl: "https://images.example.com/covers/fight-club.jpg",
        averageRating: 4.18,
        totalRatingCount: 625058,
        totalReviewCount: 25009,
        price: 10000,
        likesCount: 1,
        stockCount: 1,
      },
    });
  });

  it("draws simulated fields from the injected random source", () => {
    const result = parseBookPage(FULL_PAGE, BOOK_URL, { random: highest });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.book.price).toBe(200000);
    expect(result.book.likesCount).toBe(100);
    expect(result.book.stockCount).toBe(10);
  });

  it("uses documented fallbacks when optional fields are missing", () => {
    const result = parseBookPage(MINIMAL_PAGE, BOOK_URL, { random: lowest });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.book).toMatchObject({
      title: "Untitled Draft",
      authorName: "Anonymous",
      description: FALLBACK_DESCRIPTION,
      isbn: "N/A",
      publicationDate: "N/A",
      pageCount: "N/A",
      categories: ["General"],
      imageUrl: FALLBACK_IMAGE,
      averageRating: 0,
      totalRatingCount: 0,
      totalReviewCount: 0,
    });
  });

  it("caps categories and shortens the description in the basic variant", () => {
    const result = parseBookPage(FULL_PAGE, BOOK_URL, {
      random: lowest,
      maxCategories: 2,
      descriptionMode: "first-sentence",
    });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.book.categories).toEqual(["Fiction", "Classics"]);
    expect(result.book.description).toBe("The first rule is simple.");
  });

  it("fails when the title is missing", () => {
    const html = `<html><body><a class="ContributorLink">Someone</a></body></html>`;

    expect(parseBookPage(html, BOOK_URL, { random: lowest })).toEqual({
      success: false,
      error: `Missing required field "title" on ${BOOK_URL}`,
    });
  });

  it("fails when the author is missing", () => {
    const html = `<html><body><h1 data-testid="bookTitle">Orphan</h1></body></html>`;

    expect(parseBookPage(html, BOOK_URL, { random: lowest })).toEqual({
      success: false,
      error: `Missing required field "authorName" on ${BOOK_URL}`,
    });
  });

  it("treats a non-numeric rating as zero", () => {
    const html = MINIMAL_PAGE.replace("</body>", `<div class="RatingStatistics__rating">n/a</div></body>`);
    const result = parseBookPage(html, BOOK_URL, { random: lowest });

    expect(result.success && result.book.averageRating).toBe(0);
  });
});

describe("parsePublicationText", () => {
  it("parses month, day and year", () => {
    expect(parsePublicationText("First published March 3, 1996")).toBe("1996-03-03");
  });

  it("resolves month and year to the first of the month", () => {
    expect(parsePublicationText("Published March 1996")).toBe("1996-03-01");
  });

  it("resolves a bare year to January 1st", () => {
    expect(parsePublicationText("Published 1996")).toBe("1996-01-01");
  });

  it("accepts abbreviated month names", () => {
    expect(parsePublicationText("Published Sept 5, 2001 by Penguin")).toBe("2001-09-05");
    expect(parsePublicationText("First published Dec 2010")).toBe("2010-12-01");
  });

  it("returns N/A for dates that do not exist", () => {
    expect(parsePublicationText("Published February 30, 2001")).toBe("N/A");
  });

  it("returns N/A for unknown month names", () => {
    expect(parsePublicationText("Published Brumaire 4, 1799")).toBe("N/A");
  });

  it("returns N/A without a publication phrase", () => {
    expect(parsePublicationText("Expected publication 2027")).toBe("N/A");
  });
});

describe("extractPublicationDate", () => {
  it("reads the publication info paragraph", () => {
    const $ = cheerio.load(`<p data-testid="publicationInfo">First published\n  April 1, 2001</p>`);
    expect(extractPublicationDate($)).toBe("2001-04-01");
  });

  it("returns N/A when the paragraph is missing", () => {
    expect(extractPublicationDate(cheerio.load("<p>Published 1996</p>"))).toBe("N/A");
  });
});

describe("extractIsbn", () => {
  it("takes the first token of a detail block starting with ten digits", () => {
    const html = `<div class="TruncatedContent__text TruncatedContent__text--small" data-testid="contentContainer">0393355942 (paperback)</div>`;
    expect(extractIsbn(cheerio.load(html), html)).toBe("0393355942");
  });

  it("falls back to an ISBN-13 anywhere in the markup", () => {
    const html = `<script type="application/json">{"isbn13":"9781234567897"}</script>`;
    expect(extractIsbn(cheerio.load(html), html)).toBe("9781234567897");
  });

  it("ignores digit runs that are not ISBN-13s", () => {
    const html = `<span>Order 1234567890123</span>`;
    expect(extractIsbn(cheerio.load(html), html)).toBe("N/A");
  });
});

describe("extractPageCount", () => {
  it("parses the page count", () => {
    expect(extractPageCount(cheerio.load(`<p data-testid="pagesFormat">224 pages, Paperback</p>`))).toBe(224);
  });

  it("matches case-insensitively", () => {
    expect(extractPageCount(cheerio.load(`<p data-testid="pagesFormat">12 PAGES</p>`))).toBe(12);
  });

  it("returns N/A when no page count is present", () => {
    expect(extractPageCount(cheerio.load(`<p data-testid="pagesFormat">Kindle Edition</p>`))).toBe("N/A");
    expect(extractPageCount(cheerio.load("<p>224 pages</p>"))).toBe("N/A");
  });
});

describe("extractCategories", () => {
  it("returns General when the genre list is missing", () => {
    expect(extractCategories(cheerio.load("<div></div>"))).toEqual(["General"]);
  });

  it("returns General when the genre list is empty", () => {
    expect(extractCategories(cheerio.load(`<div data-testid="genresList"></div>`))).toEqual(["General"]);
  });

  it("ignores tags outside the genre list", () => {
    const $ = cheerio.load(`${genre("Outside")}<div data-testid="genresList">${genre("Horror")}</div>`);
    expect(extractCategories($)).toEqual(["Horror"]);
  });
});

describe("extractDescription", () => {
  it("uses the whole container when there is no inner content block", () => {
    const $ = cheerio.load(`<div data-testid="description">  A short   note  </div>`);
    expect(extractDescription($)).toBe("A short note");
  });

  it("falls back when the first-sentence mode finds no period", () => {
    const $ = cheerio.load(`<div data-testid="description">No punctuation here</div>`);
    expect(extractDescription($, "first-sentence")).toBe(FALLBACK_DESCRIPTION);
  });
});

describe("extractIntFromText", () => {
  it("strips separators and words", () => {
    expect(extractIntFromText("625,058 ratings")).toBe(625058);
  });

  it("returns 0 for missing or digit-free text", () => {
    expect(extractIntFromText(undefined)).toBe(0);
    expect(extractIntFromText("")).toBe(0);
    expect(extractIntFromText("no reviews")).toBe(0);
  });
});

describe("cleanText", () => {
  it("collapses whitespace", () => {
    expect(cleanText("\n  Fight\t Club \n")).toBe("Fight Club");
  });
});
