export type Program = {
  readonly title: string;
  readonly url: string;
  readonly description: string;
  readonly publishedAt: Date;
  readonly isNew: boolean;
};

export type FeedMetadata = {
  readonly title: string;
  readonly description: string;
  readonly link: string;
  readonly language: string;
};

export type ListingPage = {
  readonly url: string;
  readonly html: string;
};

export type ExtractionResult = {
  readonly programs: ReadonlyArray<Program>;
  readonly matchers: ReadonlyArray<string>;
  readonly degraded: boolean;
};

export type CycleStage = "fetch" | "extract" | "build" | "publish";

export type CycleResult =
  | {
      readonly status: "published";
      readonly programCount: number;
      readonly newCount: number;
      readonly degraded: boolean;
      readonly outputPath: string;
    }
  | {
      readonly status: "failed";
      readonly stage: CycleStage;
      readonly error: string;
    };
