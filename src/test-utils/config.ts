import type { AppConfig } from "../config";

type ConfigOverrides = {
  readonly [K in keyof AppConfig]?: Partial<AppConfig[K]>;
};

/**
 * Builds a complete configuration for tests without going through the
 * schema, so suites that mock node-cron can still use it.
 */
export function createTestConfig(overrides: ConfigOverrides = {}): AppConfig {
  return {
    source: {
      urls: ["https://tv.example.nl/start"],
      siteUrl: "https://tv.example.nl/",
      timeoutMs: 5000,
      ...overrides.source,
    },
    extraction: {
      newKeywords: ["nieuw", "new"],
      minTitleLength: 3,
      matchers: [],
      ...overrides.extraction,
    },
    feed: {
      title: "Test Programma's",
      description: "Programma's voor tests",
      link: "https://tv.example.nl/start",
      language: "nl",
      defaultDescription: "Programma op NPO",
      maxItems: 20,
      outputPath: "./test-feed.xml",
      path: "/",
      ...overrides.feed,
    },
    schedule: {
      update: "0 * * * *",
      runOnStart: false,
      ...overrides.schedule,
    },
    server: {
      port: 0,
      host: "127.0.0.1",
      ...overrides.server,
    },
  };
}
