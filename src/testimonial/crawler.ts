import { ProtocolContractError, TransportError } from "../core/errors";
import { HeaderMap, Transport } from "../core/transport";
import { sleep } from "../core/utils";
import { CrawlOptions, Testimonial } from "../types";
import {
  SECRET_TOKEN_HEADER,
  dedupeTestimonials,
  findSecretToken,
  parseTestimonialChunk,
} from "./extractor";

export interface TestimonialCrawlOptions extends CrawlOptions {
  /** Circuit breaker on the number of fragment requests */
  maxPages: number;
}

/** Headers that mark a request as an HTMX partial-content load. */
export function fragmentHeaders(referer: string, token: string): HeaderMap {
  return {
    Referer: referer,
    Accept: "text/html,*/*;q=0.9",
    "HX-Request": "true",
    "X-Requested-With": "XMLHttpRequest",
    [SECRET_TOKEN_HEADER]: token,
  };
}

// Timeouts and rate limits are transient, not a contract change
const TRANSIENT_CLIENT_STATUSES = new Set([408, 429]);

function isRefusal(status: number | null): boolean {
  return (
    status !== null &&
    status >= 400 &&
    status < 500 &&
    !TRANSIENT_CLIENT_STATUSES.has(status)
  );
}

async function fetchFragment(
  transport: Transport,
  url: string,
  headers: HeaderMap
): Promise<string> {
  try {
    return await transport.fetchHtml(url, headers);
  } catch (err) {
    // Other 4xx here means the endpoint refused our headers or token
    if (err instanceof TransportError && isRefusal(err.status)) {
      throw new ProtocolContractError(
        url,
        `Fragment endpoint rejected the request with HTTP ${err.status}; ` +
          "partial-content headers or secret token no longer accepted",
        { status: err.status, message: err.message }
      );
    }
    throw err;
  }
}

/**
 * Fetch /testimonials, then follow each `hx-get` link until a fragment
 * carries none or `maxPages` fragments have been read.
 */
export async function crawlTestimonials(
  transport: Transport,
  options: TestimonialCrawlOptions
): Promise<Testimonial[]> {
  const firstUrl = new URL("/testimonials", options.baseUrl).href;
  const html = await transport.fetchHtml(firstUrl, { Referer: options.baseUrl });

  const first = parseTestimonialChunk(html, options.baseUrl);
  const collected: Testimonial[] = [...first.testimonials];
  options.onPage?.({ url: firstUrl, page: 1, records: first.testimonials.length });

  const headers = fragmentHeaders(firstUrl, findSecretToken(html));
  let nextUrl = first.nextUrl;
  let pages = 0;

  while (nextUrl) {
    if (pages >= options.maxPages) {
      console.warn(
        `   Warning: stopped testimonials after ${options.maxPages} fragments (next: ${nextUrl})`
      );
      break;
    }
    pages++;
    await sleep(options.delayMs);

    const url = nextUrl;
    const fragment = await fetchFragment(transport, url, headers);
    const chunk = parseTestimonialChunk(fragment, options.baseUrl);
    if (chunk.testimonials.length === 0) {
      throw new ProtocolContractError(
        url,
        "Fragment contains no testimonial cards",
        fragment.slice(0, 500)
      );
    }
    collected.push(...chunk.testimonials);
    options.onPage?.({ url, page: pages + 1, records: chunk.testimonials.length });
    nextUrl = chunk.nextUrl;
  }

  return dedupeTestimonials(collected);
}
