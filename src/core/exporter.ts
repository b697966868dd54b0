import * as fs from "fs";
import * as path from "path";
import { CrawlerName } from "../types";

export const DATASET_FILES: Record<CrawlerName, string> = {
  products: "products.json",
  reviews: "reviews.json",
  testimonials: "testimonials.json",
};

/** Canonical dataset text: 2-space indent, trailing newline. */
export function serializeDataset(records: readonly object[]): string {
  return JSON.stringify(records, null, 2) + "\n";
}

/**
 * Write one crawler's records to <outputDir>/<name>.json.
 * The file is written beside the target and renamed over it, so readers
 * never see a half-written dataset.
 * @returns Absolute path to the written file
 */
export function exportDataset(
  name: CrawlerName,
  records: readonly object[],
  outputDir: string
): string {
  fs.mkdirSync(outputDir, { recursive: true });
  const filePath = path.resolve(outputDir, DATASET_FILES[name]);
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  fs.writeFileSync(tmpPath, serializeDataset(records), "utf-8");
  fs.renameSync(tmpPath, filePath);
  return filePath;
}
