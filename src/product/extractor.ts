import { FieldMap, RecordShape, extractRecords, findText } from "../core/extractor";
import { Product } from "../types";

/** Listing card layout on /products */
export const PRODUCT_SHAPE: RecordShape = {
  root: "div.row.product",
  fields: {
    name: { kind: "text", selector: "h3 a" },
    url: { kind: "attr", selector: "h3 a", attr: "href", resolveUrl: true },
    price: { kind: "text", selector: "div.price" },
    short_description: { kind: "text", selector: "div.short-description" },
    image: {
      kind: "attr",
      selector: "div.thumbnail img",
      attr: "src",
      resolveUrl: true,
    },
  },
};

const PAGE_COUNT_PATTERN = /in\s+(\d+)\s+pages/i;

/**
 * Parse a price string like "24.99" or "$1,250.00" into a number.
 * Returns null unless the text holds exactly one number ("5 to 10" is not a price).
 */
export function parsePrice(raw: string): number | null {
  const numbers = raw.replace(/(\d),(?=\d{3}\b)/g, "$1").match(/\d+(?:\.\d+)?/g);
  if (!numbers || numbers.length !== 1) return null;
  const num = parseFloat(numbers[0]);
  return isNaN(num) ? null : num;
}

/**
 * Read the total page count from the paging summary
 * ("page 1 of total 28 results in 6 pages").
 * Falls back to 1 when the node or the wording is missing, so a changed
 * summary ends the crawl after the first page instead of guessing.
 */
export function findTotalPages(html: string): number {
  const summary = findText(html, "div.paging-meta");
  const match = PAGE_COUNT_PATTERN.exec(summary);
  if (!match) return 1;
  const total = parseInt(match[1], 10);
  return total >= 1 ? total : 1;
}

function text(map: FieldMap, key: string): string {
  const value = map[key];
  return typeof value === "string" ? value : "";
}

/** Apply the Product defaulting rules to one extracted field map. */
export function toProduct(map: FieldMap): Product {
  return {
    name: text(map, "name"),
    url: text(map, "url"),
    price: parsePrice(text(map, "price")),
    short_description: text(map, "short_description"),
    image: text(map, "image"),
  };
}

/**
 * Extract every product card on a listing page, in document order.
 */
export function extractProducts(html: string, baseUrl: string): Product[] {
  return extractRecords(html, PRODUCT_SHAPE, baseUrl).map(toProduct);
}
