import "dotenv/config";
import { fetchSpecification } from "../lib/catalog/specs";
import { formatSpecSheet } from "../lib/compare";
import { normalize } from "../lib/normalization";
import { createConfiguredTransport } from "../lib/runtime";

async function main() {
  const detailId = process.argv[2];
  const asJson = process.argv.includes("--json");
  if (!detailId) {
    console.error("Usage: phone-details <detailId> [--json]   e.g. apple_iphone_15-12559");
    process.exit(1);
  }

  const { detailChannel } = await createConfiguredTransport();
  const sheet = await fetchSpecification(detailChannel, detailId);

  if (asJson) {
    console.log(JSON.stringify({ detailId, name: sheet.name, ...normalize(sheet.categories) }, null, 2));
  } else {
    console.log(formatSpecSheet(sheet));
  }
  process.exit(0);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
