import { z } from "zod";
import { Review } from "../types";

export const SentimentSchema = z.object({
  label: z.enum(["positive", "negative"]),
  confidence: z.number().min(0).max(1),
});

export type Sentiment = z.infer<typeof SentimentSchema>;

/**
 * The sentiment capability consumed by review reports. Built once per run
 * by the caller and passed in; tests hand in a stub.
 */
export interface Classifier {
  classify(text: string): Promise<Sentiment>;
}

export interface SentimentSummary {
  /** "YYYY-MM", or null for all months */
  month: string | null;
  total: number;
  positive: number;
  negative: number;
  /** Mean confidence over classified reviews; 0 when there are none */
  averageConfidence: number;
}

/** "YYYY-MM" of an ISO-ish date string, or null when it does not parse. */
export function reviewMonth(date: string | null): string | null {
  if (!date) return null;
  const match = /^(\d{4})-(\d{2})/.exec(date.trim());
  return match ? `${match[1]}-${match[2]}` : null;
}

/** Distinct months present in the reviews, ascending. */
export function listMonths(reviews: readonly Review[]): string[] {
  const months = new Set<string>();
  for (const r of reviews) {
    const month = reviewMonth(r.date);
    if (month) months.add(month);
  }
  return [...months].sort();
}

/**
 * Classify every review (optionally only one month's) and tally labels.
 * Classifier output outside the two labels or the [0, 1] range is rejected.
 */
export async function summarizeSentiment(
  reviews: readonly Review[],
  classifier: Classifier,
  month: string | null = null
): Promise<SentimentSummary> {
  const selected = month
    ? reviews.filter((r) => reviewMonth(r.date) === month)
    : reviews;

  let positive = 0;
  let negative = 0;
  let confidenceSum = 0;

  for (const review of selected) {
    const sentiment = SentimentSchema.parse(await classifier.classify(review.text));
    if (sentiment.label === "positive") positive++;
    else negative++;
    confidenceSum += sentiment.confidence;
  }

  return {
    month,
    total: selected.length,
    positive,
    negative,
    averageConfidence: selected.length > 0 ? confidenceSum / selected.length : 0,
  };
}
