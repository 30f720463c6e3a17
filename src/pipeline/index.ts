export { fetchListing, fetchListings } from "./fetcher";
export { extractPrograms, resolveProgramUrl, isMarkedNew } from "./extractor";
export { createMatcher, createMatchers, DEFAULT_MATCHER_SPECS } from "./matchers";
export { buildFeed } from "./feed-builder";
export { placeholderPrograms } from "./placeholders";
export { runCycle } from "./cycle";
export type {
  Program,
  FeedMetadata,
  ListingPage,
  ExtractionResult,
  CycleResult,
} from "./types";
export type { ExtractOptions } from "./extractor";
export type { MatcherSpec, ProgramMatcher } from "./matchers";
export type { CycleDeps } from "./cycle";
