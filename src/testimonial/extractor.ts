import { z } from "zod";
import {
  FieldMap,
  RecordShape,
  extractRecords,
  findAttribute,
  findRaw,
  resolveUrl,
} from "../core/extractor";
import { Testimonial } from "../types";

/** Token the fragment endpoint has always accepted when the page embeds none */
export const DEFAULT_SECRET_TOKEN = "secret123";
export const SECRET_TOKEN_HEADER = "x-secret-token";

export const TESTIMONIAL_SHAPE: RecordShape = {
  root: "div.testimonial",
  fields: {
    author: { kind: "attr", selector: "identicon-svg", attr: "username" },
    text: { kind: "text", selector: "p.text" },
    rating: { kind: "count", selector: "span.rating svg" },
  },
};

const NEXT_LINK_SELECTOR = "div.testimonial[hx-get]";

const AppDataSchema = z.object({ [SECRET_TOKEN_HEADER]: z.string().min(1) });

export interface TestimonialChunk {
  testimonials: Testimonial[];
  /** Absolute URL of the next fragment, or null at the end of the chain */
  nextUrl: string | null;
}

export function toTestimonial(map: FieldMap): Testimonial {
  const { author, text, rating } = map;
  return {
    author: typeof author === "string" ? author : "",
    text: typeof text === "string" ? text : "",
    rating: typeof rating === "number" ? rating : 0,
  };
}

/**
 * Parse the full /testimonials page or one fragment from
 * /api/testimonials. The loader card carrying `hx-get` is itself a
 * testimonial and is included in the list.
 */
export function parseTestimonialChunk(
  html: string,
  baseUrl: string
): TestimonialChunk {
  const testimonials = extractRecords(html, TESTIMONIAL_SHAPE, baseUrl).map(
    toTestimonial
  );
  const href = findAttribute(html, NEXT_LINK_SELECTOR, "hx-get");
  const nextUrl = href ? resolveUrl(href, baseUrl) || null : null;
  return { testimonials, nextUrl };
}

/**
 * Read the fragment endpoint's token from the page's
 * `<script id="appData">` JSON, falling back to the static value.
 */
export function findSecretToken(html: string): string {
  const raw = findRaw(html, "script#appData");
  if (!raw) return DEFAULT_SECRET_TOKEN;

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return DEFAULT_SECRET_TOKEN;
  }
  const parsed = AppDataSchema.safeParse(data);
  return parsed.success ? parsed.data[SECRET_TOKEN_HEADER] : DEFAULT_SECRET_TOKEN;
}

/** Identity key for deduplication: (author, text, rating). */
export function testimonialKey(t: Testimonial): string {
  return JSON.stringify([t.author, t.text, t.rating]);
}

/** Drop exact (author, text, rating) repeats; first seen wins. */
export function dedupeTestimonials(items: Testimonial[]): Testimonial[] {
  const seen = new Set<string>();
  const unique: Testimonial[] = [];
  for (const item of items) {
    const key = testimonialKey(item);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(item);
  }
  return unique;
}
