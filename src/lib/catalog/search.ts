import { config } from "../config";
import type { Channel } from "../scraping/channels";
import type { ListingItem } from "../types";
import { parseListingPage } from "./listing";
import { catalogUrl, fetchCatalogPage, type CatalogFetchOptions } from "./shared";

export function searchUrl(query: string, baseUrl: string = config.siteBaseUrl): string {
  const params = new URLSearchParams({ sQuickSearch: "yes", sName: query.trim() });
  return catalogUrl(`results.php3?${params.toString()}`, baseUrl);
}

/** Quick search by model name; results share the listing page layout */
export async function searchDevices(
  channel: Channel,
  query: string,
  options: CatalogFetchOptions = {}
): Promise<ListingItem[]> {
  if (!query.trim()) return [];
  const html = await fetchCatalogPage(channel, searchUrl(query, options.baseUrl), options);
  return parseListingPage(html, options.baseUrl);
}
