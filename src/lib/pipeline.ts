import { fetchBrands } from "./catalog/brands";
import { fetchListing } from "./catalog/listing";
import type { CatalogFetchOptions } from "./catalog/shared";
import { fetchSpecification, type SpecSource } from "./catalog/specs";
import { CompletionIndex } from "./completion-index";
import { config } from "./config";
import type { DocumentStore } from "./db";
import { buildPhoneRecord, ensurePhoneIndexes, persistPhoneRecord } from "./phones";
import type { Channel } from "./scraping/channels";
import { cancelledError, errorMessage, isCancelled, isCredentialsExhausted } from "./scraping/errors";
import { delay } from "./scraping/utils";
import type { Brand, ListingItem, RunStats } from "./types";
import { runPool } from "./worker-pool";

export interface IngestionDeps {
  /** brand index and listing pages */
  listingChannel: Channel;
  /** detail pages, or a lookup that supplies spec sheets directly */
  detailSource: SpecSource;
  store: DocumentStore;
}

export interface IngestionOptions {
  maxBrands?: number | null;
  maxItemsPerBrand?: number | null;
  skipExisting?: boolean;
  /** workers per brand; 1 = sequential */
  concurrency?: number;
  itemDelayMs?: number;
  brandDelayMs?: number;
  pageDelayMs?: number;
  maxAttempts?: number;
  retryBaseDelayMs?: number;
  baseUrl?: string;
  phonesCollection?: string;
  phoneListCollection?: string;
  source?: string;
  signal?: AbortSignal;
}

export function emptyRunStats(): RunStats {
  return {
    brandsTotal: 0,
    brandsProcessed: 0,
    brandsFailed: 0,
    itemsFound: 0,
    itemsInserted: 0,
    itemsSkipped: 0,
    itemsFailed: 0,
    aborted: null,
    cancelled: false,
    initialCount: 0,
    finalCount: 0,
    durationMs: 0,
  };
}

/**
 * brands -> listing -> detail -> normalize -> persist.
 *
 * Item failures and brand listing failures are counted and skipped. The
 * run stops early when the brand index can't be fetched, when the listing
 * channel runs out of credentials, or when `signal` aborts; the stats
 * gathered so far are returned in every case.
 */
export async function runIngestion(deps: IngestionDeps, options: IngestionOptions = {}): Promise<RunStats> {
  const { listingChannel, detailSource, store } = deps;
  const {
    maxBrands = config.maxBrands,
    maxItemsPerBrand = config.maxItemsPerBrand,
    skipExisting = config.skipExisting,
    concurrency = config.concurrency,
    itemDelayMs = config.itemDelayMs,
    brandDelayMs = config.brandDelayMs,
    pageDelayMs = config.pageDelayMs,
    phonesCollection = config.phonesCollection,
    phoneListCollection = config.phoneListCollection,
    source = config.sourceTag,
    signal,
  } = options;

  const fetchOptions: CatalogFetchOptions = {
    baseUrl: options.baseUrl,
    maxAttempts: options.maxAttempts,
    baseDelayMs: options.retryBaseDelayMs,
    signal,
  };

  const startTime = Date.now();
  const stats = emptyRunStats();

  ensurePhoneIndexes(store, phonesCollection);
  const completion = new CompletionIndex(store, phoneListCollection);
  completion.ensureIndexes();
  const completedCount = completion.load();
  stats.initialCount = store.count(phonesCollection);
  console.log(`[ingest] ${stats.initialCount} phones stored, ${completedCount} marked complete`);

  const finish = (): RunStats => {
    stats.finalCount = store.count(phonesCollection);
    stats.durationMs = Date.now() - startTime;
    return stats;
  };

  let brands: Brand[];
  try {
    brands = await fetchBrands(listingChannel, fetchOptions);
  } catch (err) {
    if (isCancelled(err)) {
      stats.cancelled = true;
    } else {
      stats.aborted = `Brand index unavailable: ${errorMessage(err)}`;
      console.error(`[ingest] ${stats.aborted}`);
    }
    return finish();
  }

  if (maxBrands !== null && maxBrands !== undefined) brands = brands.slice(0, maxBrands);
  stats.brandsTotal = brands.length;

  async function processItem(item: ListingItem, brand: Brand): Promise<void> {
    const claim = completion.tryClaim(item.detailId, skipExisting);
    if (claim !== "claimed") {
      stats.itemsSkipped++;
      return;
    }

    try {
      completion.recordPending(item, brand.name);
      await delay(itemDelayMs, signal);
      const sheet = await fetchSpecification(detailSource, item.detailId, fetchOptions);
      const { outcome, record } = persistPhoneRecord(
        store,
        buildPhoneRecord(item, brand.name, sheet, source),
        phonesCollection
      );
      completion.markComplete(item, brand.name);
      stats.itemsInserted++;
      console.log(`[ingest] ${brand.name}: ${outcome} ${record.name} (${item.detailId}, v${record.version})`);
    } catch (err) {
      if (isCancelled(err)) throw err;
      stats.itemsFailed++;
      console.error(`[ingest] ${brand.name}: failed ${item.name} (${item.detailId}): ${errorMessage(err)}`);
    } finally {
      completion.release(item.detailId);
    }
  }

  try {
    for (let i = 0; i < brands.length; i++) {
      const brand = brands[i];
      if (i > 0) await delay(brandDelayMs, signal);
      console.log(`[ingest] [${i + 1}/${brands.length}] ${brand.name} (${brand.slug})`);

      let items: ListingItem[];
      try {
        items = await fetchListing(listingChannel, brand.slug, {
          ...fetchOptions,
          limit: maxItemsPerBrand,
          pageDelayMs,
        });
      } catch (err) {
        if (isCancelled(err)) throw err;
        stats.brandsFailed++;
        if (isCredentialsExhausted(err)) {
          stats.aborted = `Credentials exhausted while listing ${brand.name}: ${errorMessage(err)}`;
          console.error(`[ingest] ${stats.aborted}; stopping run`);
          break;
        }
        console.error(`[ingest] ${brand.name}: listing failed: ${errorMessage(err)}`);
        continue;
      }

      stats.itemsFound += items.length;

      if (concurrency <= 1) {
        for (const item of items) {
          if (signal?.aborted) throw cancelledError();
          await processItem(item, brand);
        }
      } else {
        await runPool(items, concurrency, (item) => processItem(item, brand), signal);
        if (signal?.aborted) throw cancelledError();
      }

      stats.brandsProcessed++;
    }
  } catch (err) {
    if (!isCancelled(err)) throw err;
    stats.cancelled = true;
    console.warn("[ingest] Cancelled; returning partial stats");
  }

  return finish();
}
