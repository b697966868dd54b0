import { describe, it, expect, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { FakeTransport } from "./__fixtures__/fake-transport";
import {
  BASE,
  productListing,
  reviewsResponse,
  testimonialFragment,
  testimonialsPage,
} from "./__fixtures__/pages";
import { DEFAULT_CONFIG, HarvestDeps, runHarvest } from "./harvest";
import { CrawlerName, HarvestConfig } from "./types";

const dirs: string[] = [];

function tempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "harvest-run-"));
  dirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of dirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
});

function fakeSite(reviewsBroken = false): FakeTransport {
  const site = new FakeTransport()
    .on(
      `${BASE}/products`,
      productListing(
        [
          { name: "Box of Chocolate Candy", href: "/product/1", price: "24.99", img: "/img/1.webp" },
          { name: "Dark Red Energy Potion", href: "/product/2", price: "4.99" },
        ],
        "page 1 of total 3 results in 2 pages"
      )
    )
    .on(
      `${BASE}/products?page=2`,
      productListing([{ name: "Teal Energy Potion", href: "/product/3", description: "Fizzy" }])
    )
    .on(
      `${BASE}/testimonials`,
      testimonialsPage([
        { author: "ann", text: "Great service", stars: 5, next: "/api/testimonials?page=2" },
      ])
    )
    .on(
      `${BASE}/api/testimonials?page=2`,
      testimonialFragment([
        { author: "ann", text: "Great service", stars: 5 },
        { author: "bo", text: "Slow shipping", stars: 2 },
      ])
    );

  if (reviewsBroken) {
    return site.on(`${BASE}/api/graphql`, { errors: [{ message: "boom" }] });
  }
  return site.handle(`${BASE}/api/graphql`, (call) => {
    const body = JSON.stringify(call.payload);
    return body.includes('"after":null')
      ? reviewsResponse([{ rid: "r1", text: "Love it", rating: 5, date: "2023-04-01" }], true, "c1")
      : reviewsResponse([{ rid: "r2", text: "Broke fast", rating: 1, date: null }], false, null);
  });
}

function config(outputDir: string, crawlers?: CrawlerName[]): HarvestConfig {
  return {
    ...DEFAULT_CONFIG,
    baseUrl: BASE,
    outputDir,
    crawlers: crawlers ?? DEFAULT_CONFIG.crawlers,
  };
}

function deps(reviewsBroken = false, created: CrawlerName[] = []): HarvestDeps {
  return {
    createTransport: (crawler) => {
      created.push(crawler);
      return fakeSite(reviewsBroken);
    },
    log: () => undefined,
  };
}

function readJson(file: string): unknown {
  return JSON.parse(fs.readFileSync(file, "utf-8"));
}

describe("runHarvest", () => {
  it("runs every crawler on its own transport and writes three datasets", async () => {
    const outputDir = tempDir();
    const created: CrawlerName[] = [];

    const summary = await runHarvest(config(outputDir), deps(false, created));

    expect(created).toEqual(["products", "reviews", "testimonials"]);
    expect(summary.succeeded).toBe(true);
    expect(
      summary.outcomes.map((o) => (o.success ? [o.crawler, o.count] : [o.crawler, o.error]))
    ).toEqual([
      ["products", 3],
      ["reviews", 2],
      ["testimonials", 2],
    ]);
    expect(readJson(path.join(outputDir, "reviews.json"))).toEqual([
      { rid: "r1", date: "2023-04-01", rating: 5, text: "Love it" },
      { rid: "r2", date: null, rating: 1, text: "Broke fast" },
    ]);
    expect(readJson(path.join(outputDir, "products.json"))).toEqual([
      {
        name: "Box of Chocolate Candy",
        url: `${BASE}/product/1`,
        price: 24.99,
        short_description: "",
        image: `${BASE}/img/1.webp`,
      },
      {
        name: "Dark Red Energy Potion",
        url: `${BASE}/product/2`,
        price: 4.99,
        short_description: "",
        image: "",
      },
      {
        name: "Teal Energy Potion",
        url: `${BASE}/product/3`,
        price: null,
        short_description: "Fizzy",
        image: "",
      },
    ]);
  });

  it("produces byte-identical files on a second run", async () => {
    const first = tempDir();
    const second = tempDir();

    await runHarvest(config(first), deps());
    await runHarvest(config(second), deps());

    for (const name of ["products.json", "reviews.json", "testimonials.json"]) {
      expect(fs.readFileSync(path.join(second, name))).toEqual(
        fs.readFileSync(path.join(first, name))
      );
    }
  });

  it("writes nothing for a failed crawler and still completes the others", async () => {
    const outputDir = tempDir();

    const summary = await runHarvest(config(outputDir), deps(true));

    expect(summary.succeeded).toBe(false);
    const reviews = summary.outcomes.find((o) => o.crawler === "reviews");
    expect(reviews).toMatchObject({ success: false });
    if (reviews && !reviews.success) {
      expect(reviews.error).toContain("GraphQL errors");
    }
    expect(fs.readdirSync(outputDir).sort()).toEqual(["products.json", "testimonials.json"]);
  });

  it("runs only the selected crawlers", async () => {
    const outputDir = tempDir();
    const created: CrawlerName[] = [];

    const summary = await runHarvest(config(outputDir, ["testimonials"]), deps(false, created));

    expect(created).toEqual(["testimonials"]);
    expect(summary.outcomes).toHaveLength(1);
    expect(fs.readdirSync(outputDir)).toEqual(["testimonials.json"]);
  });
});
