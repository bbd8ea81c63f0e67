import "dotenv/config";
import { config, parseLimit } from "../lib/config";
import { closeDocumentStore, getDocumentStore } from "../lib/db";
import { runIngestion } from "../lib/pipeline";
import { abortOnInterrupt, createConfiguredTransport } from "../lib/runtime";

async function main() {
  const args = process.argv.slice(2);
  const maxBrands = args[0] !== undefined ? parseLimit(args[0]) : config.maxBrands;
  const maxItemsPerBrand = args[1] !== undefined ? parseLimit(args[1]) : config.maxItemsPerBrand;

  const { listingChannel, detailChannel } = await createConfiguredTransport();
  const store = getDocumentStore();
  const controller = abortOnInterrupt();

  console.log("=== Device spec ingestion ===");
  console.log(`Site:            ${config.siteBaseUrl}`);
  console.log(`Database:        ${config.dbPath} (${config.phonesCollection}, ${config.phoneListCollection})`);
  console.log(`Listing channel: ${listingChannel.describe()}`);
  console.log(`Detail channel:  ${detailChannel.describe()}`);
  console.log(`Max brands:      ${maxBrands ?? "all"}`);
  console.log(`Phones/brand:    ${maxItemsPerBrand ?? "all"}`);
  console.log(`Skip existing:   ${config.skipExisting}`);
  console.log(`Workers:         ${config.concurrency}`);
  console.log(`Delays:          ${config.itemDelayMs}ms/phone, ${config.brandDelayMs}ms/brand\n`);

  const stats = await runIngestion(
    { listingChannel, detailSource: detailChannel, store },
    { maxBrands, maxItemsPerBrand, signal: controller.signal }
  );

  console.log(`\n=== Summary ===`);
  console.log(`Brands processed: ${stats.brandsProcessed}/${stats.brandsTotal} (${stats.brandsFailed} failed)`);
  console.log(`Phones found:     ${stats.itemsFound}`);
  console.log(`Phones inserted:  ${stats.itemsInserted}`);
  console.log(`Phones skipped:   ${stats.itemsSkipped}`);
  console.log(`Phones failed:    ${stats.itemsFailed}`);
  console.log(`Stored phones:    ${stats.initialCount} -> ${stats.finalCount}`);
  console.log(`Duration:         ${(stats.durationMs / 1000).toFixed(1)}s`);
  if (stats.cancelled) console.log("Run was cancelled before finishing.");
  if (stats.aborted) console.log(`Run aborted: ${stats.aborted}`);

  closeDocumentStore();
  // An unreachable brand index means nothing could be done at all
  const brandIndexFailed = stats.aborted !== null && stats.brandsTotal === 0;
  process.exit(brandIndexFailed ? 1 : 0);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  closeDocumentStore();
  process.exit(1);
});
