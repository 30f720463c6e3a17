// pattern: functional-core
import { XMLBuilder, XMLValidator } from "fast-xml-parser";
import { BuildError, errorMessage } from "../errors";
import type { FeedMetadata, Program } from "./types";

export const NEW_TITLE_PREFIX = "NIEUW: ";
export const UNTITLED = "Untitled";

export type BuildOptions = {
  readonly defaultDescription: string;
  readonly now: Date;
  readonly generator?: string;
};

// Characters XML 1.0 does not allow anywhere in a document.
const INVALID_XML_CHARS =
  /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uD800-\uDFFF\uFFFE\uFFFF]/gu;

function clean(text: string): string {
  return text.replace(INVALID_XML_CHARS, "");
}

/**
 * RFC 822 date as RSS 2.0 expects it, e.g. `Mon, 19 Oct 2026 08:00:00 GMT`.
 */
export function formatRfc822(date: Date): string {
  if (Number.isNaN(date.getTime())) {
    throw new BuildError("cannot format an invalid date");
  }
  return date.toUTCString();
}

export function itemTitle(program: Program): string {
  const title = clean(program.title).trim() || UNTITLED;
  return program.isNew ? `${NEW_TITLE_PREFIX}${title}` : title;
}

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  format: true,
  indentBy: "  ",
  suppressEmptyNode: false,
  suppressBooleanAttributes: false,
  processEntities: true,
});

/**
 * Serializes programs into an RSS 2.0 document held entirely in memory.
 * Throws BuildError when the document cannot be produced or does not
 * validate; nothing is written here.
 */
export function buildFeed(
  programs: ReadonlyArray<Program>,
  metadata: FeedMetadata,
  options: BuildOptions,
): string {
  let xml: string;
  try {
    const items = programs.map((program) => {
      const link = clean(program.url);
      return {
        title: itemTitle(program),
        link,
        description:
          clean(program.description).trim() || options.defaultDescription,
        pubDate: formatRfc822(program.publishedAt),
        guid: { "#text": link, "@_isPermaLink": "true" },
      };
    });

    xml = builder.build({
      "?xml": { "@_version": "1.0", "@_encoding": "UTF-8" },
      rss: {
        "@_version": "2.0",
        channel: {
          title: clean(metadata.title),
          link: clean(metadata.link),
          description: clean(metadata.description),
          language: clean(metadata.language),
          lastBuildDate: formatRfc822(options.now),
          generator: options.generator ?? "program-feed",
          item: items,
        },
      },
    });
  } catch (err) {
    if (err instanceof BuildError) {
      throw err;
    }
    throw new BuildError(`feed serialization failed: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new BuildError(
      `generated feed is not well-formed XML: ${validation.err.msg} (line ${validation.err.line})`,
    );
  }

  return xml;
}
