import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createPageFetcher, DEFAULT_USER_AGENT, FetchError, fetchHtml, fetchWithRetry } from "./fetcher.js";

const PAGE_URL = "https://example.com/book/show/1.Dune";

function createTestLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const htmlResponse = (body: string, status = 200) => Promise.resolve(new Response(body, { status }));

describe("fetchHtml", () => {
  const fetchMock = vi.fn();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("returns the body of a successful response", async () => {
    fetchMock.mockImplementation(() => htmlResponse("<html>ok</html>"));

    expect(await fetchHtml(PAGE_URL)).toBe("<html>ok</html>");
  });

  it("sends the client identity header", async () => {
    fetchMock.mockImplementation(() => htmlResponse("<html></html>"));

    await fetchHtml(PAGE_URL);

    expect(fetchMock).toHaveBeenCalledWith(
      PAGE_URL,
      expect.objectContaining({
        headers: expect.objectContaining({ "User-Agent": DEFAULT_USER_AGENT }),
        signal: expect.any(AbortSignal),
      }),
    );
  });

  it("throws FetchError with the status for non-2xx responses", async () => {
    fetchMock.mockImplementation(() => htmlResponse("missing", 404));

    const error = await fetchHtml(PAGE_URL).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(FetchError);
    expect(error instanceof FetchError && [error.message, error.url, error.status]).toEqual(["HTTP 404", PAGE_URL, 404]);
  });

  it("releases the body of a non-2xx response", async () => {
    const response = new Response("server error page", { status: 500 });
    fetchMock.mockResolvedValue(response);

    await expect(fetchHtml(PAGE_URL)).rejects.toBeInstanceOf(FetchError);
    expect(response.bodyUsed).toBe(true);
  });

  it("wraps body read failures in FetchError", async () => {
    const body = new ReadableStream({
      start(controller) {
        controller.error(new Error("connection reset"));
      },
    });
    fetchMock.mockResolvedValue(new Response(body, { status: 200 }));

    const error = await fetchHtml(PAGE_URL).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(FetchError);
    expect(error instanceof FetchError && [error.url, error.status]).toEqual([PAGE_URL, 200]);
    expect(error instanceof FetchError && error.message).toMatch(/^Failed to read response body: /);
  });

  it("wraps transport errors in FetchError", async () => {
    fetchMock.mockRejectedValue(new TypeError("fetch failed"));

    const error = await fetchHtml(PAGE_URL).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(FetchError);
    expect(error instanceof FetchError && [error.message, error.status]).toEqual(["Request failed: fetch failed", undefined]);
  });
});

describe("DEFAULT_USER_AGENT", () => {
  it("names the client without a contact address", () => {
    expect(DEFAULT_USER_AGENT).toBe("Mozilla/5.0 (compatible; book-metadata-scraper/1.0)");
  });
});

describe("fetchWithRetry", () => {
  const fetchMock = vi.fn();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("returns the body after transient failures", async () => {
    const logger = createTestLogger();
    fetchMock
      .mockImplementationOnce(() => htmlResponse("busy", 503))
      .mockImplementationOnce(() => Promise.reject(new TypeError("fetch failed")))
      .mockImplementationOnce(() => htmlResponse("<html>third time</html>"));

    const body = await fetchWithRetry(PAGE_URL, logger, { retryDelayMs: 0 });

    expect(body).toBe("<html>third time</html>");
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(logger.warn).toHaveBeenNthCalledWith(1, `Attempt 1/3 failed for ${PAGE_URL}: HTTP 503`);
    expect(logger.warn).toHaveBeenNthCalledWith(2, `Attempt 2/3 failed for ${PAGE_URL}: Request failed: fetch failed`);
    expect(logger.error).not.toHaveBeenCalled();
  });

  it("returns null and logs an error once all attempts fail", async () => {
    const logger = createTestLogger();
    fetchMock.mockImplementation(() => htmlResponse("error", 500));

    const body = await fetchWithRetry(PAGE_URL, logger, { retryDelayMs: 0 });

    expect(body).toBeNull();
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(logger.warn).toHaveBeenCalledTimes(3);
    expect(logger.error).toHaveBeenCalledWith(`Failed to fetch URL after 3 attempts: ${PAGE_URL}`);
  });

  it("honours maxAttempts", async () => {
    const logger = createTestLogger();
    fetchMock.mockImplementation(() => htmlResponse("error", 500));

    await fetchWithRetry(PAGE_URL, logger, { maxAttempts: 1, retryDelayMs: 0 });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(`Failed to fetch URL after 1 attempts: ${PAGE_URL}`);
  });
});

describe("createPageFetcher", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("binds the logger and retry settings", async () => {
    const logger = createTestLogger();
    const fetchMock = vi.fn(() => htmlResponse("gone", 410));
    vi.stubGlobal("fetch", fetchMock);

    const fetchPage = createPageFetcher(logger, { maxAttempts: 2, retryDelayMs: 0 });

    expect(await fetchPage(PAGE_URL)).toBeNull();
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(logger.error).toHaveBeenCalledWith(`Failed to fetch URL after 2 attempts: ${PAGE_URL}`);
  });
});
