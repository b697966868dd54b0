import * as cheerio from "cheerio";
import { AnyNode, Element, hasChildren, isText } from "domhandler";
import { cleanText } from "./utils";

/** How a single field is read from a matched node. */
export type FieldRule =
  | { kind: "text"; selector: string }
  | { kind: "attr"; selector: string; attr: string; resolveUrl?: boolean }
  | { kind: "count"; selector: string };

/** One record per `root` match; field selectors are relative to it. */
export interface RecordShape {
  root: string;
  fields: Record<string, FieldRule>;
}

export type FieldValue = string | number;

/** Loosely typed extraction output, converted to records by each crawler. */
export type FieldMap = Record<string, FieldValue>;

/**
 * Resolve a possibly relative href/src against the site base URL.
 * Empty or malformed values become "".
 */
export function resolveUrl(href: string, baseUrl: string): string {
  if (!href) return "";
  try {
    return new URL(href, baseUrl).href;
  } catch {
    return "";
  }
}

function collectText(node: AnyNode, parts: string[]): void {
  if (isText(node)) {
    parts.push(node.data);
  } else if (hasChildren(node)) {
    for (const child of node.children) collectText(child, parts);
  }
}

/**
 * Text of a node with a space between its text nodes, whitespace-collapsed.
 * "Great<br>service" reads as "Great service", not "Greatservice".
 */
export function spacedText(node: AnyNode | undefined): string {
  if (!node) return "";
  const parts: string[] = [];
  collectText(node, parts);
  return cleanText(parts.join(" "));
}

function readField(
  $: cheerio.CheerioAPI,
  node: Element,
  rule: FieldRule,
  baseUrl: string
): FieldValue {
  const matches = $(node).find(rule.selector);
  switch (rule.kind) {
    case "text":
      return spacedText(matches.get(0));
    case "attr": {
      const raw = matches.first().attr(rule.attr)?.trim() ?? "";
      return rule.resolveUrl ? resolveUrl(raw, baseUrl) : raw;
    }
    case "count":
      return matches.length;
  }
}

/**
 * Extract one field map per node matching `shape.root`, in document order.
 * A missing sub-node yields "" (text/attr) or 0 (count), never a dropped record.
 */
export function extractRecords(
  html: string,
  shape: RecordShape,
  baseUrl: string
): FieldMap[] {
  const $ = cheerio.load(html);
  const records: FieldMap[] = [];

  $<Element, string>(shape.root).each((_, node) => {
    const record: FieldMap = {};
    for (const [name, rule] of Object.entries(shape.fields)) {
      record[name] = readField($, node, rule, baseUrl);
    }
    records.push(record);
  });

  return records;
}

/** Attribute of the first node matching `selector`, or null when there is none. */
export function findAttribute(
  html: string,
  selector: string,
  attr: string
): string | null {
  const $ = cheerio.load(html);
  return $(selector).first().attr(attr)?.trim() || null;
}

/** Whitespace-collapsed text of the first match; "" when absent. */
export function findText(html: string, selector: string): string {
  const $ = cheerio.load(html);
  return spacedText($(selector).get(0));
}

/** Raw inner content of the first match (e.g. a script body), or null. */
export function findRaw(html: string, selector: string): string | null {
  const $ = cheerio.load(html);
  return $(selector).first().html();
}
