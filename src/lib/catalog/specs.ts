import * as cheerio from "cheerio";
import { config } from "../config";
import type { Channel } from "../scraping/channels";
import { collapseWhitespace } from "../scraping/utils";
import type { RawCategory, SpecSheet } from "../types";
import { catalogUrl, fetchCatalogPage, type CatalogFetchOptions } from "./shared";

/** Supplies spec sheets from somewhere other than the detail page */
export interface SpecLookup {
  lookup(detailId: string, signal?: AbortSignal): Promise<SpecSheet>;
}

export type SpecSource = Channel | SpecLookup;

function isSpecLookup(source: SpecSource): source is SpecLookup {
  return "lookup" in source && typeof source.lookup === "function";
}

export function detailPageUrl(detailId: string, baseUrl: string = config.siteBaseUrl): string {
  return catalogUrl(`${detailId}.php`, baseUrl);
}

/** One line per <br>, whitespace collapsed within lines, blank lines dropped */
function multilineText(text: string): string {
  return text
    .split("\n")
    .map(collapseWhitespace)
    .filter((line) => line.length > 0)
    .join("\n");
}

/**
 * Reads the spec tables of a detail page: the row header is the category
 * title, `td.ttl` the key and `td.nfo` the value. A row with an empty key
 * continues the previous pair.
 */
export function parseSpecificationPage(html: string): SpecSheet {
  const $ = cheerio.load(html);
  $("br").replaceWith("\n");

  const name = collapseWhitespace($("h1.specs-phone-name-title").first().text()) || null;
  const categories: RawCategory[] = [];

  $("#specs-list table").each((_, table) => {
    const title = collapseWhitespace($(table).find("th").first().text());
    if (!title) return;

    const category: RawCategory = { title, pairs: [] };

    $(table)
      .find("tr")
      .each((_, row) => {
        const $nfo = $(row).find("td.nfo");
        if ($nfo.length === 0) return;

        const key = collapseWhitespace($(row).find("td.ttl").text());
        const value = multilineText($nfo.text());
        const previous = category.pairs[category.pairs.length - 1];

        if (!key && previous) {
          if (value) previous.value = previous.value ? `${previous.value}\n${value}` : value;
          return;
        }
        if (!key && !value) return;
        category.pairs.push({ key, value });
      });

    categories.push(category);
  });

  return { name, categories };
}

/** Spec sheet for one device, from the lookup collaborator or the detail page */
export async function fetchSpecification(
  source: SpecSource,
  detailId: string,
  options: CatalogFetchOptions = {}
): Promise<SpecSheet> {
  if (isSpecLookup(source)) {
    return source.lookup(detailId, options.signal);
  }

  const html = await fetchCatalogPage(source, detailPageUrl(detailId, options.baseUrl), options);
  const sheet = parseSpecificationPage(html);
  if (sheet.categories.length === 0) {
    console.warn(`[specs] ${detailId}: no spec tables found`);
  }
  return sheet;
}
