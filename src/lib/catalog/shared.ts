import * as cheerio from "cheerio";
import { config } from "../config";
import type { Channel } from "../scraping/channels";
import { fetchWithRetry } from "../scraping/retry";
import { collapseWhitespace } from "../scraping/utils";

export interface CatalogFetchOptions {
  baseUrl?: string;
  signal?: AbortSignal;
  /** attempts per page; 1 disables retry */
  maxAttempts?: number;
  baseDelayMs?: number;
}

export function catalogUrl(path: string, baseUrl: string = config.siteBaseUrl): string {
  return `${baseUrl.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
}

/** Fetch one catalog page through the channel with the retry policy applied */
export function fetchCatalogPage(channel: Channel, url: string, options: CatalogFetchOptions = {}): Promise<string> {
  return fetchWithRetry(channel, url, {
    maxAttempts: options.maxAttempts ?? config.maxRetries,
    baseDelayMs: options.baseDelayMs ?? config.retryBaseDelayMs,
    signal: options.signal,
  });
}

/**
 * Visible text of an HTML fragment with element boundaries turned into
 * spaces, so "Apple<br><span>98 devices</span>" reads "Apple 98 devices".
 */
export function visibleText(fragment: string): string {
  const $ = cheerio.load(fragment, null, false);
  $("br").replaceWith(" ");
  $("*").each((_, el) => {
    $(el).before(" ").after(" ");
  });
  return collapseWhitespace($.root().text());
}
