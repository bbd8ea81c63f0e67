import "dotenv/config";
import { fetchBrands } from "../lib/catalog/brands";
import { fetchListing } from "../lib/catalog/listing";
import { config, parseLimit } from "../lib/config";
import { snapshotFileName, writeSnapshot, type BrandSnapshot } from "../lib/export";
import { abortOnInterrupt, createConfiguredTransport } from "../lib/runtime";
import { errorMessage, isCancelled, isCredentialsExhausted } from "../lib/scraping/errors";
import { delay } from "../lib/scraping/utils";

async function main() {
  const args = process.argv.slice(2);
  const maxBrands = args[0] !== undefined ? parseLimit(args[0]) : config.maxBrands;
  const maxItemsPerBrand = args[1] !== undefined ? parseLimit(args[1]) : config.maxItemsPerBrand;
  const outPath = args[2] ?? `snapshots/${snapshotFileName("brands")}`;

  const { listingChannel } = await createConfiguredTransport();
  const { signal } = abortOnInterrupt();

  console.log(`Fetching brand index via ${listingChannel.describe()}...`);
  const allBrands = await fetchBrands(listingChannel, { signal });
  const brands = maxBrands !== null ? allBrands.slice(0, maxBrands) : allBrands;

  const snapshot: BrandSnapshot[] = [];
  for (let i = 0; i < brands.length; i++) {
    const brand = brands[i];
    if (i > 0) await delay(config.brandDelayMs, signal);
    try {
      const items = await fetchListing(listingChannel, brand.slug, { limit: maxItemsPerBrand, signal });
      console.log(`[${i + 1}/${brands.length}] ${brand.name}: ${items.length} phones (index says ${brand.deviceCount})`);
      snapshot.push({ ...brand, items });
    } catch (err) {
      if (isCancelled(err) || isCredentialsExhausted(err)) throw err;
      console.error(`[${i + 1}/${brands.length}] ${brand.name}: listing failed: ${errorMessage(err)}`);
      snapshot.push({ ...brand, items: [] });
    }
  }

  const written = writeSnapshot(outPath, snapshot);
  const total = snapshot.reduce((sum, b) => sum + b.items.length, 0);
  console.log(`\nWrote ${snapshot.length} brands / ${total} phones to ${written}`);
  process.exit(0);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
