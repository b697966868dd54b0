import axios, { AxiosAdapter, AxiosInstance } from "axios";
import * as http from "http";
import * as https from "https";

/** Browser identity sent when the caller names none. */
export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36";

export interface HttpClientOptions {
  /** Request timeout in milliseconds */
  timeout: number;
  /** Fixed for every request of the client */
  userAgent?: string;
  /** Replaces the network layer; tests pass an in-process adapter */
  adapter?: AxiosAdapter;
}

/**
 * Create a configured axios instance with realistic browser headers and
 * keep-alive agents. Each crawler gets its own instance.
 */
export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  return axios.create({
    timeout: options.timeout,
    headers: {
      Accept:
        "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
      "Accept-Language": "en-US,en;q=0.9",
      "Accept-Encoding": "gzip, deflate, br",
      Connection: "keep-alive",
      "User-Agent": options.userAgent ?? DEFAULT_USER_AGENT,
    },
    maxRedirects: 5,
    httpAgent: new http.Agent({ keepAlive: true }),
    httpsAgent: new https.Agent({ keepAlive: true }),
    adapter: options.adapter,
  });
}

/**
 * Sleep for the given number of milliseconds.
 * Resolves immediately for zero or negative values.
 */
export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Elapsed time for the run summary: "850ms", "4.2s" or "2m 05s". */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.max(0, Math.round(ms))}ms`;
  const tenths = Math.round(ms / 100);
  if (tenths < 600) return `${(tenths / 10).toFixed(1)}s`;
  const totalSeconds = Math.round(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = String(totalSeconds % 60).padStart(2, "0");
  return `${minutes}m ${seconds}s`;
}

/** Collapse runs of whitespace and trim. */
export function cleanText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}
