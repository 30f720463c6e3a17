import type { Program } from "./types";

type PlaceholderEntry = {
  readonly slug: string;
  readonly title: string;
  readonly description: string;
  readonly isNew: boolean;
};

const PLACEHOLDER_ENTRIES: ReadonlyArray<PlaceholderEntry> = [
  {
    slug: "voorbeeld-nieuwe-serie",
    title: "Voorbeeld: nieuwe dramaserie",
    description:
      "Voorbeeldprogramma. De programmalijst kon tijdens de laatste update niet worden gelezen.",
    isNew: true,
  },
  {
    slug: "voorbeeld-datingshow",
    title: "Voorbeeld: nieuwe datingshow",
    description:
      "Voorbeeldprogramma. De programmalijst kon tijdens de laatste update niet worden gelezen.",
    isNew: true,
  },
  {
    slug: "voorbeeld-documentaire",
    title: "Voorbeeld: documentaire",
    description:
      "Voorbeeldprogramma. De programmalijst kon tijdens de laatste update niet worden gelezen.",
    isNew: false,
  },
  {
    slug: "voorbeeld-collectie",
    title: "Voorbeeld: themacollectie",
    description:
      "Voorbeeldprogramma. De programmalijst kon tijdens de laatste update niet worden gelezen.",
    isNew: false,
  },
];

/**
 * Fixed sample batch published when nothing could be extracted, so the feed
 * stays valid and visibly labeled.
 */
export function placeholderPrograms(
  siteUrl: string,
  now: Date,
): ReadonlyArray<Program> {
  return PLACEHOLDER_ENTRIES.map((entry) => ({
    title: entry.title,
    url: new URL(`/start/${entry.slug}`, siteUrl).toString(),
    description: entry.description,
    publishedAt: now,
    isNew: entry.isNew,
  }));
}
