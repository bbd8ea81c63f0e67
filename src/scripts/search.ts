import "dotenv/config";
import { searchDevices } from "../lib/catalog/search";
import { createConfiguredTransport } from "../lib/runtime";

async function main() {
  const query = process.argv.slice(2).join(" ").trim();
  if (!query) {
    console.error("Usage: search <query...>");
    process.exit(1);
  }

  const { listingChannel } = await createConfiguredTransport();
  const results = await searchDevices(listingChannel, query);

  console.log(`Found ${results.length} results for "${query}":\n`);
  for (const item of results) {
    console.log(`  ${item.name.padEnd(40)} ${item.detailId}`);
  }
  process.exit(0);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
