/** HTML builders shaped like the target site's markup. */

export const BASE = "https://shop.test";

export interface ProductCard {
  name: string;
  href?: string;
  price?: string;
  description?: string;
  img?: string;
}

export function productCard(p: ProductCard): string {
  const link = p.href !== undefined ? `<a href="${p.href}">${p.name}</a>` : `<a>${p.name}</a>`;
  return `
    <div class="row product">
      <div class="thumbnail">${p.img !== undefined ? `<img src="${p.img}">` : ""}</div>
      <div class="description">
        <h3>${link}</h3>
        ${p.description !== undefined ? `<div class="short-description">${p.description}</div>` : ""}
      </div>
      ${p.price !== undefined ? `<div class="price">${p.price}</div>` : ""}
    </div>`;
}

export function productListing(cards: ProductCard[], pagingMeta?: string): string {
  return `<html><body>
    <div class="products">${cards.map(productCard).join("")}</div>
    ${pagingMeta !== undefined ? `<div class="paging-meta">${pagingMeta}</div>` : ""}
  </body></html>`;
}

export interface TestimonialCard {
  author?: string;
  text: string;
  stars?: number;
  next?: string;
}

export function testimonialCard(t: TestimonialCard): string {
  const hx = t.next !== undefined ? ` hx-get="${t.next}" hx-trigger="revealed"` : "";
  const stars =
    t.stars !== undefined
      ? `<span class="rating">${"<svg></svg>".repeat(t.stars)}</span>`
      : "";
  const author = t.author !== undefined ? `<identicon-svg username="${t.author}"></identicon-svg>` : "";
  return `<div class="testimonial"${hx}>${author}${stars}<p class="text">${t.text}</p></div>`;
}

export function testimonialsPage(cards: TestimonialCard[], appData?: string): string {
  const script =
    appData !== undefined
      ? `<script type="application/json" id="appData">${appData}</script>`
      : "";
  return `<html><head>${script}</head><body><div class="testimonials">${cards
    .map(testimonialCard)
    .join("")}</div></body></html>`;
}

export function testimonialFragment(cards: TestimonialCard[]): string {
  return cards.map(testimonialCard).join("\n");
}

export interface ReviewNodeInput {
  rid: string | number;
  text: string;
  rating?: number | null;
  date?: string | null;
}

export function reviewsResponse(
  nodes: ReviewNodeInput[],
  hasNextPage: boolean,
  endCursor: string | null
): object {
  return {
    data: {
      reviews: {
        edges: nodes.map((node) => ({ node, cursor: `c-${node.rid}` })),
        pageInfo: { hasNextPage, endCursor },
      },
    },
  };
}
