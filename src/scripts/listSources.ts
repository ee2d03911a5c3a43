import "dotenv/config";
import { listAvailableSources } from "../app/sources.js";
import { SupabaseOwnershipStore } from "../db/ownership.js";

async function main() {
  const userId = process.argv[2];
  if (!userId) {
    console.error("Usage: listSources <userId>");
    process.exit(1);
  }

  const sources = await listAvailableSources(userId, new SupabaseOwnershipStore());

  console.log(`Sources for ${userId} (${sources.length}):`);
  for (const source of sources) {
    const id = source.sourceId ?? "-";
    console.log(`  ${source.sourceType.padEnd(10)} ${id.padEnd(36)} ${source.displayName}`);
    console.log(`  ${"".padEnd(47)} ${source.description}`);
  }
}

main().catch(console.error);
