import * as cheerio from "cheerio";
import { config } from "../config";
import type { Channel } from "../scraping/channels";
import { stripPhpExtension } from "../scraping/utils";
import type { Brand } from "../types";
import { catalogUrl, fetchCatalogPage, visibleText, type CatalogFetchOptions } from "./shared";

/**
 * "Acme 42 devices" -> { name: "Acme", deviceCount: 42 }
 * "Acme"            -> { name: "Acme", deviceCount: 0 }
 *
 * The second-to-last token is the count whenever it is an unsigned integer.
 */
export function parseBrandText(text: string): { name: string; deviceCount: number } {
  const tokens = text.split(/\s+/).filter((t) => t.length > 0);
  if (tokens.length >= 2) {
    const candidate = tokens[tokens.length - 2];
    if (/^\d+$/.test(candidate)) {
      return {
        name: tokens.slice(0, -2).join(" "),
        deviceCount: parseInt(candidate, 10),
      };
    }
  }
  return { name: tokens.join(" "), deviceCount: 0 };
}

export function parseBrandIndex(html: string): Brand[] {
  const $ = cheerio.load(html);
  const brands: Brand[] = [];

  $("div.st-text table td a").each((_, el) => {
    const href = $(el).attr("href");
    if (!href) return;
    const { name, deviceCount } = parseBrandText(visibleText($(el).html() ?? ""));
    brands.push({ name, slug: stripPhpExtension(href), deviceCount });
  });

  return brands;
}

/** Every brand on the index page, in document order */
export async function fetchBrands(channel: Channel, options: CatalogFetchOptions = {}): Promise<Brand[]> {
  const url = catalogUrl(config.brandIndexPath, options.baseUrl);
  const html = await fetchCatalogPage(channel, url, options);
  const brands = parseBrandIndex(html);

  if (brands.length === 0) {
    console.warn(`[brands] No brands found at ${url} (layout change or blocked response?)`);
  } else {
    console.log(`[brands] Found ${brands.length} brands via ${channel.describe()}`);
  }
  return brands;
}
