/** Settings for one harvest run, parsed from command-line arguments */
export interface HarvestConfig {
  baseUrl: string;
  outputDir: string;
  /** Pause between consecutive requests of one crawler */
  delayMs: number;
  timeout: number;
  perCategory: boolean;
  reviewsFirst: number;
  reviewsMaxPages: number;
  testimonialsMaxPages: number;
  crawlers: CrawlerName[];
}

export type CrawlerName = "products" | "reviews" | "testimonials";

export const CRAWLER_NAMES: readonly CrawlerName[] = [
  "products",
  "reviews",
  "testimonials",
];

export interface Product {
  name: string;
  url: string;
  price: number | null;
  short_description: string;
  image: string;
}

export interface Review {
  rid: string | number | null;
  date: string | null;
  rating: number | null;
  text: string;
}

export interface Testimonial {
  author: string;
  text: string;
  rating: number;
}

/** Options shared by every crawler */
export interface CrawlOptions {
  baseUrl: string;
  delayMs: number;
  /** Called after each page/query/fragment is consumed */
  onPage?: (page: PageProgress) => void;
}

export interface PageProgress {
  url: string;
  page: number;
  records: number;
}

/** Outcome of one crawler within a harvest: discriminated union */
export type CrawlerOutcome =
  | { crawler: CrawlerName; success: true; count: number; file: string }
  | { crawler: CrawlerName; success: false; error: string };

/** Aggregate report printed after a harvest completes */
export interface HarvestSummary {
  outcomes: CrawlerOutcome[];
  elapsed_ms: number;
  succeeded: boolean;
}
