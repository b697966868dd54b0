import * as path from "path";
import { DEFAULT_CONFIG } from "./harvest";
import { CRAWLER_NAMES, CrawlerName, HarvestConfig } from "./types";

export const USAGE = `Usage: harvest [options]
  --output=DIR                 output directory (default: data)
  --delay=SECONDS              pause between requests of one crawler (default: 0)
  --per-category               also walk each product category listing
  --reviews-first=N            GraphQL page size (default: 20)
  --reviews-max-pages=N        GraphQL page cap (default: 200)
  --testimonials-max-pages=N   fragment page cap (default: 200)
  --timeout=SECONDS            request timeout (default: 30)
  --base-url=URL               target site (default: https://web-scraping.dev)
  --only=LIST                  comma-separated: products,reviews,testimonials`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function positiveInt(key: string, value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new UsageError(`--${key} must be a positive integer, got "${value}"`);
  }
  return n;
}

function seconds(key: string, value: string): number {
  const n = Number(value);
  if (value.trim() === "" || !Number.isFinite(n) || n < 0) {
    throw new UsageError(`--${key} must be a non-negative number, got "${value}"`);
  }
  return Math.round(n * 1000);
}

// axios reads a timeout of 0 as "never time out"
function timeoutSeconds(key: string, value: string): number {
  const ms = seconds(key, value);
  if (ms < 1) {
    throw new UsageError(`--${key} must be greater than zero, got "${value}"`);
  }
  return ms;
}

function isCrawlerName(value: string): value is CrawlerName {
  return CRAWLER_NAMES.some((name) => name === value);
}

function crawlerList(value: string): CrawlerName[] {
  const names = value.split(",").map((s) => s.trim()).filter(Boolean);
  const crawlers: CrawlerName[] = [];
  for (const name of names) {
    if (!isCrawlerName(name)) {
      throw new UsageError(`--only: unknown crawler "${name}"`);
    }
    if (!crawlers.includes(name)) crawlers.push(name);
  }
  if (crawlers.length === 0) throw new UsageError("--only needs at least one crawler");
  return crawlers;
}

/**
 * Parse CLI arguments into a HarvestConfig.
 * Options take the form --key=value; --per-category is a bare flag.
 */
export function parseArgs(argv: string[]): HarvestConfig {
  const config: HarvestConfig = { ...DEFAULT_CONFIG };
  let outputDir = DEFAULT_CONFIG.outputDir;

  for (const arg of argv) {
    if (arg === "--per-category") {
      config.perCategory = true;
      continue;
    }
    const eqIdx = arg.indexOf("=");
    if (!arg.startsWith("--") || eqIdx === -1) {
      throw new UsageError(`Unrecognised argument "${arg}"`);
    }
    const key = arg.slice(2, eqIdx);
    const value = arg.slice(eqIdx + 1);

    switch (key) {
      case "output":
        if (!value) throw new UsageError("--output needs a directory");
        outputDir = value;
        break;
      case "delay":
        config.delayMs = seconds(key, value);
        break;
      case "timeout":
        config.timeout = timeoutSeconds(key, value);
        break;
      case "reviews-first":
        config.reviewsFirst = positiveInt(key, value);
        break;
      case "reviews-max-pages":
        config.reviewsMaxPages = positiveInt(key, value);
        break;
      case "testimonials-max-pages":
        config.testimonialsMaxPages = positiveInt(key, value);
        break;
      case "base-url":
        try {
          config.baseUrl = new URL(value).origin;
        } catch {
          throw new UsageError(`--base-url is not a valid URL: "${value}"`);
        }
        break;
      case "only":
        config.crawlers = crawlerList(value);
        break;
      default:
        throw new UsageError(`Unknown option "--${key}"`);
    }
  }

  config.outputDir = path.resolve(outputDir);
  return config;
}
