// pattern: Imperative Shell
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import { BuildError, errorMessage } from "../errors";
import { publishFeed, readFeed } from "../publisher";
import { buildFeed } from "./feed-builder";
import { extractPrograms } from "./extractor";
import type { CycleResult, ExtractionResult, ListingPage } from "./types";
import { fetchListings } from "./fetcher";
import { createMatchers } from "./matchers";

export type FetchPagesFn = (
  urls: ReadonlyArray<string>,
  timeoutMs: number,
  logger: Logger,
) => Promise<ReadonlyArray<ListingPage>>;

export type CycleDeps = {
  readonly logger: Logger;
  readonly fetchPages?: FetchPagesFn;
  readonly now?: () => Date;
};

/**
 * Runs one fetch → extract → build → publish pass. Never throws.
 *
 * - A fetch failure keeps the previously published feed untouched. When no
 *   feed exists yet the placeholder batch is published instead.
 * - Extraction that finds nothing publishes the placeholder batch.
 * - A build failure aborts the cycle and is logged at error level.
 */
export async function runCycle(
  config: AppConfig,
  deps: CycleDeps,
): Promise<CycleResult> {
  const { logger } = deps;
  const fetchPages = deps.fetchPages ?? fetchListings;
  const now = deps.now?.() ?? new Date();
  const outputPath = config.feed.outputPath;

  let pages: ReadonlyArray<ListingPage>;
  try {
    pages = await fetchPages(config.source.urls, config.source.timeoutMs, logger);
  } catch (err) {
    const message = errorMessage(err);
    let existing: string | null;
    try {
      existing = await readFeed(outputPath);
    } catch (readErr) {
      logger.error(
        { outputPath, error: errorMessage(readErr) },
        "could not inspect previous feed",
      );
      return { status: "failed", stage: "publish", error: errorMessage(readErr) };
    }

    if (existing !== null) {
      logger.warn({ error: message }, "fetch failed, keeping previous feed");
      return { status: "failed", stage: "fetch", error: message };
    }

    logger.warn(
      { error: message },
      "fetch failed and no feed published yet, publishing placeholders",
    );
    pages = [];
  }

  let extraction: ExtractionResult;
  try {
    extraction = extractPrograms(
      pages,
      {
        siteUrl: config.source.siteUrl,
        newKeywords: config.extraction.newKeywords,
        minTitleLength: config.extraction.minTitleLength,
        matchers: createMatchers(config.extraction.matchers),
        now,
      },
      logger,
    );
  } catch (err) {
    const message = errorMessage(err);
    logger.error({ error: message }, "extraction failed unexpectedly");
    return { status: "failed", stage: "extract", error: message };
  }

  const programs = extraction.programs.slice(0, config.feed.maxItems);

  let xml: string;
  try {
    xml = buildFeed(
      programs,
      {
        title: config.feed.title,
        description: config.feed.description,
        link: config.feed.link,
        language: config.feed.language,
      },
      { defaultDescription: config.feed.defaultDescription, now },
    );
  } catch (err) {
    const message = errorMessage(err);
    logger.error(
      { error: message, kind: err instanceof BuildError ? err.name : "unknown" },
      "feed build failed",
    );
    return { status: "failed", stage: "build", error: message };
  }

  try {
    await publishFeed(outputPath, xml);
  } catch (err) {
    const message = errorMessage(err);
    logger.error({ outputPath, error: message }, "feed publish failed");
    return { status: "failed", stage: "publish", error: message };
  }

  const newCount = programs.filter((p) => p.isNew).length;
  logger.info(
    {
      outputPath,
      programCount: programs.length,
      newCount,
      degraded: extraction.degraded,
    },
    "feed published",
  );

  return {
    status: "published",
    programCount: programs.length,
    newCount,
    degraded: extraction.degraded,
    outputPath,
  };
}
