import * as cheerio from "cheerio";
import { config } from "../config";
import type { Channel } from "../scraping/channels";
import { errorMessage, isCancelled, isCredentialsExhausted } from "../scraping/errors";
import { delay, pathIdentifier, resolveUrl } from "../scraping/utils";
import type { ListingItem } from "../types";
import { catalogUrl, fetchCatalogPage, visibleText, type CatalogFetchOptions } from "./shared";

export interface ListingOptions extends CatalogFetchOptions {
  /** stop once this many items were collected; null/undefined = all pages */
  limit?: number | null;
  /** politeness delay before every page after the first */
  pageDelayMs?: number;
}

/** Page 1 is "{slug}.php", later pages "{slug}-p{N}.php" */
export function listingPageUrl(slug: string, page: number, baseUrl: string = config.siteBaseUrl): string {
  return catalogUrl(page <= 1 ? `${slug}.php` : `${slug}-p${page}.php`, baseUrl);
}

/** Item stubs from a brand listing or search results page */
export function parseListingPage(html: string, baseUrl: string = config.siteBaseUrl): ListingItem[] {
  const $ = cheerio.load(html);
  const items: ListingItem[] = [];

  $("div.makers ul li a").each((_, el) => {
    const $a = $(el);
    const href = $a.attr("href");
    if (!href) return;

    const detailId = pathIdentifier(href);
    if (!detailId) return;

    const $img = $a.find("img").first();
    const src = $img.attr("src");
    const name = visibleText($a.html() ?? "") || ($img.attr("title") ?? "").trim() || detailId;

    items.push({
      name,
      detailId,
      detailUrl: resolveUrl(href, baseUrl),
      thumbnailUrl: src ? resolveUrl(src, baseUrl) : null,
    });
  });

  return items;
}

/**
 * Walk a brand's listing pages until a page adds nothing new, a page fails,
 * or `limit` items are collected. A failed page ends the listing with what
 * was collected so far; only credential exhaustion and cancellation throw.
 */
export async function fetchListing(
  channel: Channel,
  brandSlug: string,
  options: ListingOptions = {}
): Promise<ListingItem[]> {
  const baseUrl = options.baseUrl ?? config.siteBaseUrl;
  const pageDelayMs = options.pageDelayMs ?? config.pageDelayMs;
  const limit = options.limit ?? null;

  const items: ListingItem[] = [];
  const seen = new Set<string>();
  if (limit !== null && limit <= 0) return items;

  for (let page = 1; ; page++) {
    if (page > 1) await delay(pageDelayMs, options.signal);

    const url = listingPageUrl(brandSlug, page, baseUrl);
    let html: string;
    try {
      html = await fetchCatalogPage(channel, url, options);
    } catch (error) {
      if (isCredentialsExhausted(error) || isCancelled(error)) throw error;
      console.log(`[listing] ${brandSlug}: page ${page} unavailable, treating as end of listing (${errorMessage(error)})`);
      break;
    }

    let added = 0;
    for (const item of parseListingPage(html, baseUrl)) {
      if (seen.has(item.detailId)) continue;
      seen.add(item.detailId);
      items.push(item);
      added++;
      if (limit !== null && items.length >= limit) break;
    }

    console.log(`[listing] ${brandSlug}: page ${page} added ${added} items (${items.length} total)`);

    if (added === 0) break;
    if (limit !== null && items.length >= limit) break;
  }

  return items;
}
