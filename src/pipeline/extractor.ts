// pattern: functional-core
import * as cheerio from "cheerio";
import type { Logger } from "pino";
import type { ProgramCandidate, ProgramMatcher } from "./matchers";
import { placeholderPrograms } from "./placeholders";
import type { ExtractionResult, ListingPage, Program } from "./types";

export type ExtractOptions = {
  readonly siteUrl: string;
  readonly newKeywords: ReadonlyArray<string>;
  readonly minTitleLength: number;
  readonly matchers: ReadonlyArray<ProgramMatcher>;
  readonly now: Date;
};

function comparableHost(url: URL): string {
  return url.hostname.toLowerCase().replace(/^www\./, "");
}

/**
 * Resolves a listing link to an absolute program URL on the site.
 * Returns null for fragments, non-http schemes, foreign hosts and links that
 * do not parse.
 */
export function resolveProgramUrl(
  href: string | undefined,
  baseUrl: string,
  siteUrl: string,
): string | null {
  const trimmed = href?.trim() ?? "";
  if (trimmed.length === 0 || trimmed.startsWith("#")) {
    return null;
  }

  let resolved: URL;
  try {
    resolved = new URL(trimmed, baseUrl);
  } catch {
    return null;
  }

  if (resolved.protocol !== "http:" && resolved.protocol !== "https:") {
    return null;
  }

  if (comparableHost(resolved) !== comparableHost(new URL(siteUrl))) {
    return null;
  }

  resolved.hash = "";
  return resolved.toString();
}

/**
 * True when the entry's text carries one of the "new" labels. Purely a text
 * match: the publish date plays no part.
 */
export function isMarkedNew(
  text: string,
  keywords: ReadonlyArray<string>,
): boolean {
  const haystack = text.toLowerCase();
  return keywords.some((keyword) => haystack.includes(keyword.toLowerCase()));
}

function parsePublishedAt(datetime: string | undefined, now: Date): Date {
  if (!datetime) {
    return now;
  }
  const parsed = new Date(datetime.trim());
  return Number.isNaN(parsed.getTime()) ? now : parsed;
}

function toProgram(
  candidate: ProgramCandidate,
  pageUrl: string,
  options: ExtractOptions,
): Program | null {
  const title = candidate.title.trim();
  if (title.length === 0 || title.length < options.minTitleLength) {
    return null;
  }

  const url = resolveProgramUrl(candidate.href, pageUrl, options.siteUrl);
  if (!url) {
    return null;
  }

  return {
    title,
    url,
    description: candidate.description.trim(),
    publishedAt: parsePublishedAt(candidate.datetime, options.now),
    isNew: isMarkedNew(candidate.text, options.newKeywords),
  };
}

/**
 * Runs the matchers against one page in order and returns the programs of
 * the first matcher that yields any.
 */
export function extractFromPage(
  page: ListingPage,
  options: ExtractOptions,
  logger: Logger,
): { readonly matcher: string | null; readonly programs: Array<Program> } {
  let $: cheerio.CheerioAPI;
  try {
    $ = cheerio.load(page.html);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn({ url: page.url, error: message }, "listing markup unreadable");
    return { matcher: null, programs: [] };
  }

  for (const matcher of options.matchers) {
    let candidates: ReadonlyArray<ProgramCandidate>;
    try {
      candidates = matcher.match($);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.warn(
        { url: page.url, matcher: matcher.name, error: message },
        "matcher failed, trying next",
      );
      continue;
    }

    const programs = candidates.flatMap((candidate) => {
      const program = toProgram(candidate, page.url, options);
      return program ? [program] : [];
    });

    if (programs.length > 0) {
      logger.debug(
        { url: page.url, matcher: matcher.name, count: programs.length },
        "matcher succeeded",
      );
      return { matcher: matcher.name, programs };
    }
  }

  return { matcher: null, programs: [] };
}

/**
 * Keeps the first program seen for every URL, in source order.
 */
export function dedupeByUrl(
  programs: ReadonlyArray<Program>,
): Array<Program> {
  const seen = new Set<string>();
  return programs.filter((program) => {
    if (seen.has(program.url)) {
      return false;
    }
    seen.add(program.url);
    return true;
  });
}

/**
 * Extracts programs from one or more listing pages. Never throws: when no
 * page yields a program the placeholder batch is returned with
 * `degraded: true`.
 */
export function extractPrograms(
  pages: ReadonlyArray<ListingPage>,
  options: ExtractOptions,
  logger: Logger,
): ExtractionResult {
  const matchers: Array<string> = [];
  const extracted: Array<Program> = [];

  for (const page of pages) {
    const result = extractFromPage(page, options, logger);
    if (result.matcher && !matchers.includes(result.matcher)) {
      matchers.push(result.matcher);
    }
    extracted.push(...result.programs);
  }

  const programs = dedupeByUrl(extracted);

  if (programs.length === 0) {
    logger.warn(
      { pageCount: pages.length },
      "no programs extracted, using placeholder batch",
    );
    return {
      programs: placeholderPrograms(options.siteUrl, options.now),
      matchers,
      degraded: true,
    };
  }

  logger.info(
    {
      count: programs.length,
      newCount: programs.filter((p) => p.isNew).length,
      matchers,
    },
    "programs extracted",
  );
  return { programs, matchers, degraded: false };
}
