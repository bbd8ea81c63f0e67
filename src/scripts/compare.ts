import "dotenv/config";
import { fetchSpecification } from "../lib/catalog/specs";
import { comparePhones } from "../lib/compare";
import { createConfiguredTransport } from "../lib/runtime";

async function main() {
  const [first, second] = process.argv.slice(2);
  if (!first || !second) {
    console.error("Usage: compare <detailIdA> <detailIdB>");
    process.exit(1);
  }

  const { detailChannel } = await createConfiguredTransport();
  console.log(`Fetching ${first}...`);
  const a = await fetchSpecification(detailChannel, first);
  console.log(`Fetching ${second}...\n`);
  const b = await fetchSpecification(detailChannel, second);

  console.log(comparePhones({ ...a, name: a.name ?? first }, { ...b, name: b.name ?? second }));
  process.exit(0);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
