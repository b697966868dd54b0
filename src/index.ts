#!/usr/bin/env node
import { USAGE, UsageError, parseArgs } from "./args";
import { formatDuration } from "./core/utils";
import { runHarvest } from "./harvest";
import { HarvestConfig } from "./types";

const LABELS = {
  products: "products (HTML pagination)",
  reviews: "reviews (GraphQL cursor)",
  testimonials: "testimonials (HTMX fragments)",
};

function loadConfig(): HarvestConfig {
  try {
    return parseArgs(process.argv.slice(2));
  } catch (err: unknown) {
    if (err instanceof UsageError) {
      console.error(`Error: ${err.message}\n\n${USAGE}`);
      process.exit(2);
    }
    throw err;
  }
}

async function main(): Promise<void> {
  const config = loadConfig();

  console.log(`Dataset Harvester v1.0  [${config.baseUrl}]\n`);

  // ── Step 1: Crawl ─────────────────────────────────────────────────
  console.log(
    `Step 1: Crawling ${config.crawlers.map((c) => LABELS[c]).join(", ")}...`
  );
  const summary = await runHarvest(config);

  // ── Step 2: Report ────────────────────────────────────────────────
  console.log("\nStep 2: Results");
  for (const outcome of summary.outcomes) {
    if (outcome.success) {
      console.log(`   + ${outcome.crawler}: ${outcome.count} records -> ${outcome.file}`);
    } else {
      console.log(`   x ${outcome.crawler}: ${outcome.error}`);
    }
  }

  const failed = summary.outcomes.filter((o) => !o.success).length;
  console.log(`\nDone in ${formatDuration(summary.elapsed_ms)}`);
  console.log(`   Success: ${summary.outcomes.length - failed}/${summary.outcomes.length}`);
  console.log(`   Output:  ${config.outputDir}/`);

  if (!summary.succeeded) process.exitCode = 1;
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.stack ?? err.message : String(err));
  process.exit(1);
});
