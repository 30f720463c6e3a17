// pattern: functional-core
import type { CheerioAPI } from "cheerio";

/**
 * Raw strings lifted out of one listing entry, before any normalization.
 */
export type ProgramCandidate = {
  readonly title: string;
  readonly href: string | undefined;
  readonly description: string;
  readonly datetime: string | undefined;
  readonly text: string;
};

/**
 * Declarative description of a matcher. `container` targets a known markup
 * signature; `heading-link` scans every link that wraps a heading.
 */
export type MatcherSpec =
  | {
      readonly kind: "container";
      readonly name: string;
      readonly container: string;
      readonly title: string;
      readonly link?: string | undefined;
      readonly description?: string | undefined;
      readonly date?: string | undefined;
    }
  | {
      readonly kind: "heading-link";
      readonly name: string;
    };

export type ProgramMatcher = {
  readonly name: string;
  readonly match: ($: CheerioAPI) => ReadonlyArray<ProgramCandidate>;
};

const HEADINGS = "h1, h2, h3, h4, h5, h6";
const DESCRIPTION_HINTS = "[class*='desc'], [class*='summary'], [class*='text']";
// Badges nested in a heading ("Nieuw", "Live") belong to the container text,
// not to the title.
const TITLE_NOISE = "[class*='badge'], [class*='label']";

/**
 * Known listing signatures, most specific first. The heading-link scan is
 * the catch-all and stays last.
 */
export const DEFAULT_MATCHER_SPECS: ReadonlyArray<MatcherSpec> = [
  {
    kind: "container",
    name: "program-tile",
    container: "[data-testid='program-tile'], [data-testid='tile']",
    title: "[data-testid='tile-title'], h2, h3",
    link: "a[href]",
    description: "[data-testid='tile-description'], p",
    date: "time[datetime]",
  },
  {
    kind: "container",
    name: "article-card",
    container: "article",
    title: HEADINGS,
    link: "a[href]",
    description: `${DESCRIPTION_HINTS}, p`,
    date: "time[datetime]",
  },
  { kind: "heading-link", name: "heading-link" },
];

function collapse(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function matchContainers(
  spec: Extract<MatcherSpec, { kind: "container" }>,
  $: CheerioAPI,
): Array<ProgramCandidate> {
  return $(spec.container)
    .toArray()
    .map((el) => {
      const node = $(el);
      const title = node.find(spec.title).first().clone();
      title.find(TITLE_NOISE).remove();
      const href =
        (spec.link ? node.find(spec.link).first().attr("href") : undefined) ??
        node.closest("a[href]").attr("href");

      return {
        title: collapse(title.text()),
        href,
        description: spec.description
          ? collapse(node.find(spec.description).first().text())
          : "",
        datetime: spec.date
          ? node.find(spec.date).first().attr("datetime")
          : undefined,
        text: collapse(node.text()),
      };
    });
}

function matchHeadingLinks($: CheerioAPI): Array<ProgramCandidate> {
  return $("a[href]")
    .toArray()
    .flatMap((el) => {
      const node = $(el);
      const heading = node.find(HEADINGS).first();
      if (heading.length === 0) {
        return [];
      }
      const title = heading.clone();
      title.find(TITLE_NOISE).remove();

      return [
        {
          title: collapse(title.text()),
          href: node.attr("href"),
          description: collapse(node.find(DESCRIPTION_HINTS).first().text()),
          datetime: node.find("time[datetime]").first().attr("datetime"),
          text: collapse(node.text()),
        },
      ];
    });
}

/**
 * Turns a matcher description into a runnable matcher.
 */
export function createMatcher(spec: MatcherSpec): ProgramMatcher {
  switch (spec.kind) {
    case "container":
      return { name: spec.name, match: ($) => matchContainers(spec, $) };
    case "heading-link":
      return { name: spec.name, match: matchHeadingLinks };
  }
}

/**
 * Builds the ordered matcher list: configured signatures first, then the
 * built-in ones.
 */
export function createMatchers(
  extra: ReadonlyArray<MatcherSpec> = [],
): ReadonlyArray<ProgramMatcher> {
  return [...extra, ...DEFAULT_MATCHER_SPECS].map(createMatcher);
}
