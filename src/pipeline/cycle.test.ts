import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import pino from "pino";
import Parser from "rss-parser";
import { runCycle } from "./cycle";
import { FetchError } from "../errors";
import { createTestConfig } from "../test-utils/config";

const logger = pino({ level: "silent" });
const now = new Date("2026-10-19T08:00:00Z");

const LISTING = `
  <main>
    <article><a href="/p/a"><h3>Serie A</h3></a><span class="badge">nieuw</span></article>
    <article><a href="/p/b"><h3>Serie B</h3></a></article>
  </main>
`;

describe("runCycle", () => {
  let tmpDir: string;
  let outputPath: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "program-feed-cycle-"));
    outputPath = join(tmpDir, "feed.xml");
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it("should fetch, extract, build and publish the feed", async () => {
    const config = createTestConfig({ feed: { outputPath } });
    const fetchPages = vi
      .fn()
      .mockResolvedValue([{ url: "https://tv.example.nl/start", html: LISTING }]);

    const result = await runCycle(config, { logger, fetchPages, now: () => now });

    expect(result).toEqual({
      status: "published",
      programCount: 2,
      newCount: 1,
      degraded: false,
      outputPath,
    });
    expect(fetchPages).toHaveBeenCalledWith(
      ["https://tv.example.nl/start"],
      5000,
      logger,
    );

    const feed = await new Parser().parseString(readFileSync(outputPath, "utf-8"));
    expect(feed.items.map((i) => i.title)).toEqual(["NIEUW: Serie A", "Serie B"]);
  });

  it("should keep the previous feed when fetching fails", async () => {
    const config = createTestConfig({ feed: { outputPath } });
    writeFileSync(outputPath, "<rss>previous</rss>");
    const fetchPages = vi
      .fn()
      .mockRejectedValue(new FetchError("HTTP 503: Service Unavailable", "https://tv.example.nl/start", { status: 503 }));

    const result = await runCycle(config, { logger, fetchPages, now: () => now });

    expect(result).toEqual({
      status: "failed",
      stage: "fetch",
      error: "HTTP 503: Service Unavailable",
    });
    expect(readFileSync(outputPath, "utf-8")).toBe("<rss>previous</rss>");
  });

  it("should publish the placeholder batch when fetching fails before any feed exists", async () => {
    const config = createTestConfig({ feed: { outputPath } });
    const fetchPages = vi.fn().mockRejectedValue(new Error("getaddrinfo ENOTFOUND"));

    const result = await runCycle(config, { logger, fetchPages, now: () => now });

    expect(result).toEqual({
      status: "published",
      programCount: 4,
      newCount: 2,
      degraded: true,
      outputPath,
    });
  });

  it("should publish a labeled placeholder feed when nothing can be extracted", async () => {
    const config = createTestConfig({ feed: { outputPath } });
    const fetchPages = vi
      .fn()
      .mockResolvedValue([{ url: "https://tv.example.nl/start", html: "<html><body></body></html>" }]);

    const result = await runCycle(config, { logger, fetchPages, now: () => now });

    expect(result.status).toBe("published");
    const feed = await new Parser().parseString(readFileSync(outputPath, "utf-8"));
    expect(feed.items.length).toBeGreaterThanOrEqual(1);
    for (const item of feed.items) {
      expect(item.title).toContain("Voorbeeld");
    }
  });

  it("should limit the feed to maxItems in source order", async () => {
    const config = createTestConfig({ feed: { outputPath, maxItems: 2 } });
    const html = `
      <article><a href="/p/1"><h3>Eerste</h3></a></article>
      <article><a href="/p/2"><h3>Tweede</h3></a></article>
      <article><a href="/p/3"><h3>Derde</h3></a></article>
    `;
    const fetchPages = vi
      .fn()
      .mockResolvedValue([{ url: "https://tv.example.nl/start", html }]);

    const result = await runCycle(config, { logger, fetchPages, now: () => now });

    expect(result.status === "published" && result.programCount).toBe(2);
    const feed = await new Parser().parseString(readFileSync(outputPath, "utf-8"));
    expect(feed.items.map((i) => i.title)).toEqual(["Eerste", "Tweede"]);
  });

  it("should report a publish failure without throwing", async () => {
    const config = createTestConfig({ feed: { outputPath: tmpDir } });
    const fetchPages = vi
      .fn()
      .mockResolvedValue([{ url: "https://tv.example.nl/start", html: LISTING }]);

    const result = await runCycle(config, { logger, fetchPages, now: () => now });

    expect(result.status).toBe("failed");
    if (result.status === "failed") {
      expect(result.stage).toBe("publish");
    }
  });
});
