import { describeError } from "./core/errors";
import { exportDataset } from "./core/exporter";
import { HttpTransport, Transport } from "./core/transport";
import { createHttpClient } from "./core/utils";
import { crawlProducts } from "./product/crawler";
import { crawlReviews } from "./review/crawler";
import { crawlTestimonials } from "./testimonial/crawler";
import {
  CrawlOptions,
  CrawlerName,
  CrawlerOutcome,
  HarvestConfig,
  HarvestSummary,
  PageProgress,
} from "./types";

export const DEFAULT_CONFIG: HarvestConfig = {
  baseUrl: "https://web-scraping.dev",
  outputDir: "data",
  delayMs: 0,
  timeout: 30_000,
  perCategory: false,
  reviewsFirst: 20,
  reviewsMaxPages: 200,
  testimonialsMaxPages: 200,
  crawlers: ["products", "reviews", "testimonials"],
};

export interface HarvestDeps {
  /** Called once per crawler; each crawler owns its transport */
  createTransport: (crawler: CrawlerName) => Transport;
  log: (line: string) => void;
}

function defaultDeps(config: HarvestConfig): HarvestDeps {
  return {
    createTransport: () =>
      new HttpTransport(createHttpClient({ timeout: config.timeout })),
    log: (line) => console.log(line),
  };
}

/**
 * Run one crawler to completion. Records are only returned once the whole
 * crawl has succeeded; a failure discards everything gathered so far.
 */
function runCrawler(
  crawler: CrawlerName,
  transport: Transport,
  config: HarvestConfig,
  log: (line: string) => void
): Promise<object[]> {
  const base: CrawlOptions = {
    baseUrl: config.baseUrl,
    delayMs: config.delayMs,
    onPage: (p: PageProgress) =>
      log(`   [${crawler} ${p.page}]  + ${p.url} (${p.records})`),
  };

  switch (crawler) {
    case "products":
      return crawlProducts(transport, { ...base, perCategory: config.perCategory });
    case "reviews":
      return crawlReviews(transport, {
        ...base,
        first: config.reviewsFirst,
        maxPages: config.reviewsMaxPages,
      });
    case "testimonials":
      return crawlTestimonials(transport, {
        ...base,
        maxPages: config.testimonialsMaxPages,
      });
  }
}

/**
 * Run the selected crawlers concurrently and write one dataset per
 * successful crawler. A failing crawler never stops the others.
 */
export async function runHarvest(
  config: HarvestConfig,
  deps: HarvestDeps = defaultDeps(config)
): Promise<HarvestSummary> {
  const startTime = Date.now();

  const settled = await Promise.allSettled(
    config.crawlers.map((crawler) =>
      runCrawler(crawler, deps.createTransport(crawler), config, deps.log)
    )
  );

  const outcomes: CrawlerOutcome[] = config.crawlers.map((crawler, i) => {
    const result = settled[i];
    if (result.status === "rejected") {
      return { crawler, success: false, error: describeError(result.reason) };
    }
    try {
      const file = exportDataset(crawler, result.value, config.outputDir);
      return { crawler, success: true, count: result.value.length, file };
    } catch (err) {
      return { crawler, success: false, error: describeError(err) };
    }
  });

  return {
    outcomes,
    elapsed_ms: Date.now() - startTime,
    succeeded: outcomes.every((o) => o.success),
  };
}
