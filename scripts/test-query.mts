/**
 * Query the configured dataset — run with: npx tsx scripts/test-query.mts <text>
 *
 * Uses EDGES_PARQUET_URL / IDMAP_PARQUET_URL from .env.
 * 1. Opens the PPI context (downloads remote sources on first run)
 * 2. Runs search for the given text and logs the top hits
 * 3. Fetches interactions and partner categories for the first hit
 * 4. Closes the context on exit
 */

import { contextOptionsFromEnv } from "../src/config/db.ts";
import { loadEnv } from "../src/config/env.ts";
import { PpiContext } from "../services/ppi.context.ts";

function elapsed(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`;
}

const text = process.argv[2] ?? "Q5T5U3";

async function main() {
  const t0 = performance.now();
  const ctx = await PpiContext.open(contextOptionsFromEnv(loadEnv()));
  try {
    console.log(`✓ Context ready (${elapsed(performance.now() - t0)})\n`);

    const t1 = performance.now();
    const hits = await ctx.search(text);
    console.log(`✓ search("${text}"): ${hits.length} hits (${elapsed(performance.now() - t1)})`);
    console.log("  Top:", JSON.stringify(hits.slice(0, 5), null, 2));

    const first = hits[0];
    if (first) {
      const t2 = performance.now();
      const [categories, interactions] = await Promise.all([
        ctx.partnerCategories(first.id),
        ctx.fetchInteractions(first.id, { limit: 100 }),
      ]);
      console.log(`\n✓ ${first.id} — ${await ctx.displayName(first.id)} (${elapsed(performance.now() - t2)})`);
      console.log("  Partner categories:", categories.join(", ") || "(none)");
      console.log(`  Interactions: ${interactions.length}`);
      console.log("  Sample:", JSON.stringify(interactions.slice(0, 3), null, 2));
    }
  } finally {
    ctx.close();
  }
  console.log(`\nTotal time: ${elapsed(performance.now() - t0)}`);
}

main().then(() => process.exit(0)).catch((e) => {
  console.error(e);
  process.exit(1);
});
