import { describe, it, expect } from "vitest";
import * as path from "path";
import { UsageError, parseArgs } from "./args";

describe("parseArgs", () => {
  it("applies the defaults", () => {
    expect(parseArgs([])).toEqual({
      baseUrl: "https://web-scraping.dev",
      outputDir: path.resolve("data"),
      delayMs: 0,
      timeout: 30_000,
      perCategory: false,
      reviewsFirst: 20,
      reviewsMaxPages: 200,
      testimonialsMaxPages: 200,
      crawlers: ["products", "reviews", "testimonials"],
    });
  });

  it("reads every option", () => {
    const config = parseArgs([
      "--output=out/run",
      "--delay=0.25",
      "--per-category",
      "--reviews-first=50",
      "--reviews-max-pages=3",
      "--testimonials-max-pages=4",
      "--timeout=5",
      "--base-url=http://localhost:8000/ignored/path",
      "--only=testimonials,products,testimonials",
    ]);

    expect(config).toEqual({
      baseUrl: "http://localhost:8000",
      outputDir: path.resolve("out/run"),
      delayMs: 250,
      timeout: 5000,
      perCategory: true,
      reviewsFirst: 50,
      reviewsMaxPages: 3,
      testimonialsMaxPages: 4,
      crawlers: ["testimonials", "products"],
    });
  });

  it("accepts a zero delay but not a zero timeout", () => {
    expect(parseArgs(["--delay=0"]).delayMs).toBe(0);
    expect(() => parseArgs(["--timeout=0"])).toThrow(
      '--timeout must be greater than zero, got "0"'
    );
  });

  it.each([
    ["--reviews-first=0"],
    ["--reviews-max-pages=2.5"],
    ["--delay=-1"],
    ["--delay="],
    ["--timeout=0"],
    ["--timeout=0.0001"],
    ["--only=comments"],
    ["--base-url=not a url"],
    ["--verbose=1"],
    ["positional"],
  ])("rejects %s", (arg) => {
    expect(() => parseArgs([arg])).toThrow(UsageError);
  });
});
