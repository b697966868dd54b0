import { Transport } from "../core/transport";
import { sleep } from "../core/utils";
import { CrawlOptions, Product } from "../types";
import { extractProducts, findTotalPages } from "./extractor";

export const PRODUCT_CATEGORIES = ["apparel", "consumables", "household"];

export interface ProductCrawlOptions extends CrawlOptions {
  /** Also walk each category listing after the default one */
  perCategory: boolean;
}

/**
 * Listing URLs to walk: the default listing, plus one per category
 * when fan-out is enabled.
 */
export function productStartUrls(baseUrl: string, perCategory: boolean): string[] {
  const listing = new URL("/products", baseUrl).href;
  if (!perCategory) return [listing];
  return [
    listing,
    ...PRODUCT_CATEGORIES.map((c) => `${listing}?category=${c}`),
  ];
}

/** URL of page N of a listing; keeps any existing query string. */
export function pageUrl(startUrl: string, page: number): string {
  const joiner = startUrl.includes("?") ? "&" : "?";
  return `${startUrl}${joiner}page=${page}`;
}

/**
 * Walk `?page=N` pagination for every start URL.
 * Page 1 is fetched once and also read for the total page count.
 * Products are deduplicated by URL across all listings; first seen wins,
 * and products without a URL are always kept.
 */
export async function crawlProducts(
  transport: Transport,
  options: ProductCrawlOptions
): Promise<Product[]> {
  const products: Product[] = [];
  const seenUrls = new Set<string>();
  let requests = 0;

  const fetchPage = async (url: string, referer: string): Promise<string> => {
    if (requests > 0) await sleep(options.delayMs);
    requests++;
    return transport.fetchHtml(url, { Referer: referer });
  };

  for (const start of productStartUrls(options.baseUrl, options.perCategory)) {
    const firstHtml = await fetchPage(start, options.baseUrl);
    const totalPages = findTotalPages(firstHtml);

    for (let page = 1; page <= totalPages; page++) {
      const url = page === 1 ? start : pageUrl(start, page);
      const html = page === 1 ? firstHtml : await fetchPage(url, start);

      let added = 0;
      for (const item of extractProducts(html, options.baseUrl)) {
        if (item.url) {
          if (seenUrls.has(item.url)) continue;
          seenUrls.add(item.url);
        }
        products.push(item);
        added++;
      }
      options.onPage?.({ url, page, records: added });
    }
  }

  return products;
}
