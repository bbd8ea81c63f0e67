import { describe, it, expect } from "vitest";
import { readFileSync } from "fs";
import { resolve } from "path";
import { fetchListing, listingPageUrl, parseListingPage } from "../lib/catalog/listing";
import { searchDevices, searchUrl } from "../lib/catalog/search";
import { FetchError, FetchErrorKind, cancelledError, httpStatusError } from "../lib/scraping/errors";
import { FakeChannel } from "./fake-channel";

const PAGE1 = readFileSync(resolve(__dirname, "fixtures/listing-page1.html"), "utf-8");
const PAGE2 = readFileSync(resolve(__dirname, "fixtures/listing-page2.html"), "utf-8");
const BASE = "https://site.test";

const url = (page: number) => listingPageUrl("acme-phones-1", page, BASE);
const opts = { baseUrl: BASE, maxAttempts: 1, pageDelayMs: 0 };

describe("listingPageUrl", () => {
  it("uses the bare slug for page 1 and -p{N} after", () => {
    expect(url(1)).toBe("https://site.test/acme-phones-1.php");
    expect(url(2)).toBe("https://site.test/acme-phones-1-p2.php");
    expect(url(10)).toBe("https://site.test/acme-phones-1-p10.php");
  });
});

describe("parseListingPage", () => {
  const items = parseListingPage(PAGE1, BASE);

  it("extracts name, detail id and absolute URLs", () => {
    expect(items[0]).toEqual({
      name: "X1",
      detailId: "acme_x1-100",
      detailUrl: "https://site.test/acme_x1-100.php",
      thumbnailUrl: "https://img.example.test/acme-x1.jpg",
    });
  });

  it("prefixes relative thumbnails with the base URL", () => {
    expect(items[1].thumbnailUrl).toBe("https://site.test/imgroot/acme-x2.jpg");
  });

  it("leaves the thumbnail null without an img", () => {
    expect(items[2]).toMatchObject({ name: "X3 Pro", detailId: "acme_x3_pro-102", thumbnailUrl: null });
  });
});

describe("fetchListing", () => {
  it("stops when a page repeats the previous one", async () => {
    const channel = new FakeChannel({ [url(1)]: PAGE1, [url(2)]: PAGE2, [url(3)]: PAGE2 });

    const items = await fetchListing(channel, "acme-phones-1", opts);

    expect(items.map((i) => i.detailId)).toEqual(["acme_x1-100", "acme_x2-101", "acme_x3_pro-102", "acme_mini-103"]);
    expect(channel.calls).toEqual([url(1), url(2), url(3)]);
  });

  it("treats a failing later page as the end of the listing", async () => {
    const channel = new FakeChannel({ [url(1)]: PAGE1 });

    const items = await fetchListing(channel, "acme-phones-1", opts);

    expect(items).toHaveLength(3);
    expect(channel.calls).toEqual([url(1), url(2)]);
  });

  it("returns an empty listing when the first page fails", async () => {
    const channel = new FakeChannel({ [url(1)]: httpStatusError(url(1), 503) });

    expect(await fetchListing(channel, "acme-phones-1", opts)).toEqual([]);
    expect(channel.calls).toEqual([url(1)]);
  });

  it("propagates credential exhaustion on a later page", async () => {
    const exhausted = new FetchError(FetchErrorKind.CREDENTIALS_EXHAUSTED, "all keys spent");
    const channel = new FakeChannel({ [url(1)]: PAGE1, [url(2)]: exhausted });

    await expect(fetchListing(channel, "acme-phones-1", opts)).rejects.toBe(exhausted);
  });

  it("propagates cancellation on a later page", async () => {
    const channel = new FakeChannel({ [url(1)]: PAGE1, [url(2)]: cancelledError(url(2)) });

    await expect(fetchListing(channel, "acme-phones-1", opts)).rejects.toMatchObject({ kind: FetchErrorKind.CANCELLED });
  });

  it("stops at the limit without fetching further pages", async () => {
    const channel = new FakeChannel({ [url(1)]: PAGE1, [url(2)]: PAGE2 });

    const items = await fetchListing(channel, "acme-phones-1", { ...opts, limit: 2 });

    expect(items.map((i) => i.detailId)).toEqual(["acme_x1-100", "acme_x2-101"]);
    expect(channel.calls).toEqual([url(1)]);
  });

  it("fetches nothing for a zero limit", async () => {
    const channel = new FakeChannel();

    expect(await fetchListing(channel, "acme-phones-1", { ...opts, limit: 0 })).toEqual([]);
    expect(channel.calls).toEqual([]);
  });

  it("waits between pages", async () => {
    const channel = new FakeChannel({ [url(1)]: PAGE1, [url(2)]: PAGE1 });

    const start = Date.now();
    await fetchListing(channel, "acme-phones-1", { ...opts, pageDelayMs: 40 });

    expect(Date.now() - start).toBeGreaterThanOrEqual(35);
  });
});

describe("searchDevices", () => {
  it("builds the quick search URL", () => {
    expect(searchUrl("acme x1", BASE)).toBe("https://site.test/results.php3?sQuickSearch=yes&sName=acme+x1");
  });

  it("parses results with the listing parser", async () => {
    const channel = new FakeChannel({ [searchUrl("acme", BASE)]: PAGE2 });

    const results = await searchDevices(channel, "acme", { baseUrl: BASE, maxAttempts: 1 });

    expect(results.map((r) => r.name)).toEqual(["X3 Pro", "Mini"]);
  });

  it("skips the request for a blank query", async () => {
    const channel = new FakeChannel();

    expect(await searchDevices(channel, "  ")).toEqual([]);
    expect(channel.calls).toEqual([]);
  });
});
