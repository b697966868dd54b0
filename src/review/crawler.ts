import { z } from "zod";
import { ProtocolContractError } from "../core/errors";
import { Transport } from "../core/transport";
import { sleep } from "../core/utils";
import { CrawlOptions, Review } from "../types";

export const REVIEWS_QUERY = `
query GetReviews($first: Int, $after: String) {
  reviews(first: $first, after: $after) {
    edges {
      node {
        rid
        text
        rating
        date
      }
      cursor
    }
    pageInfo {
      endCursor
      hasNextPage
    }
  }
}
`.trim();

const ReviewNodeSchema = z
  .object({
    rid: z.union([z.string(), z.number()]).nullish(),
    text: z.string().nullish(),
    rating: z.number().nullish(),
    date: z.string().nullish(),
  })
  .passthrough();

const ReviewsConnectionSchema = z.object({
  edges: z
    .array(z.object({ node: ReviewNodeSchema.nullish() }).nullable())
    .nullish(),
  pageInfo: z
    .object({
      endCursor: z.string().nullish(),
      hasNextPage: z.boolean().nullish(),
    })
    .nullish(),
});

// Read on its own so errors surface even when `data` is malformed
const GraphQLErrorsSchema = z
  .object({ errors: z.array(z.unknown()).nullish() })
  .passthrough();

const ReviewsPageSchema = z.object({
  data: z.object({ reviews: ReviewsConnectionSchema.nullish() }).nullish(),
});

export type ReviewsConnection = z.infer<typeof ReviewsConnectionSchema>;
type ReviewNode = z.infer<typeof ReviewNodeSchema>;

export interface ReviewCrawlOptions extends CrawlOptions {
  /** Page size sent as `first` */
  first: number;
  /** Circuit breaker on the number of queries */
  maxPages: number;
}

/** Apply the Review defaulting rules to one GraphQL node. */
export function toReview(node: ReviewNode): Review {
  return {
    rid: node.rid ?? null,
    date: node.date ?? null,
    rating: node.rating ?? null,
    text: node.text ?? "",
  };
}

/**
 * Validate one GraphQL response and return its `reviews` connection.
 * A non-empty `errors` array or a body without `data.reviews` means the
 * API contract no longer holds.
 */
export function parseReviewsPage(url: string, body: unknown): ReviewsConnection {
  const envelope = GraphQLErrorsSchema.safeParse(body);
  const errors = envelope.success ? envelope.data.errors : null;
  if (errors && errors.length > 0) {
    throw new ProtocolContractError(
      url,
      `GraphQL errors: ${JSON.stringify(errors)}`,
      errors
    );
  }

  const parsed = ReviewsPageSchema.safeParse(body);
  if (!parsed.success) {
    throw new ProtocolContractError(
      url,
      `Unexpected GraphQL response shape: ${parsed.error.issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join("; ")}`,
      body
    );
  }
  const reviews = parsed.data.data?.reviews;
  if (!reviews) {
    throw new ProtocolContractError(url, "GraphQL response has no data.reviews", body);
  }
  return reviews;
}

/**
 * Follow `pageInfo.endCursor` until `hasNextPage` is false or
 * `maxPages` queries have been issued. Nodes keep server order.
 */
export async function crawlReviews(
  transport: Transport,
  options: ReviewCrawlOptions
): Promise<Review[]> {
  const url = new URL("/api/graphql", options.baseUrl).href;
  const referer = new URL("/reviews", options.baseUrl).href;
  const reviews: Review[] = [];
  let after: string | null = null;
  let page = 0;

  while (page < options.maxPages) {
    if (page > 0) await sleep(options.delayMs);
    page++;

    const body = await transport.postJson(
      url,
      { query: REVIEWS_QUERY, variables: { first: options.first, after } },
      { Referer: referer }
    );
    const connection = parseReviewsPage(url, body);

    const edges = connection.edges ?? [];
    for (const edge of edges) {
      reviews.push(toReview(edge?.node ?? {}));
    }
    options.onPage?.({ url, page, records: edges.length });

    const pageInfo = connection.pageInfo;
    if (!pageInfo?.hasNextPage) return reviews;
    if (!pageInfo.endCursor) {
      throw new ProtocolContractError(
        url,
        "hasNextPage is true but endCursor is missing",
        pageInfo
      );
    }
    after = pageInfo.endCursor;
  }

  console.warn(
    `   Warning: stopped reviews after ${options.maxPages} pages (hasNextPage still true)`
  );
  return reviews;
}
