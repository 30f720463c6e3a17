import cron from "node-cron";
import { z } from "zod";

const containerMatcherSchema = z.object({
  kind: z.literal("container"),
  name: z.string().min(1),
  container: z.string().min(1),
  title: z.string().min(1),
  link: z.string().min(1).optional(),
  description: z.string().min(1).optional(),
  date: z.string().min(1).optional(),
});

const sourceConfigSchema = z.object({
  urls: z.array(z.string().url()).min(1).default(["https://npo.nl/"]),
  siteUrl: z.string().url().default("https://npo.nl/"),
  timeoutMs: z.number().int().positive().max(120_000).default(30_000),
});

const extractionConfigSchema = z.object({
  newKeywords: z.array(z.string().min(1)).min(1).default(["nieuw", "new"]),
  minTitleLength: z.number().int().nonnegative().default(3),
  matchers: z.array(containerMatcherSchema).default([]),
});

const feedConfigSchema = z.object({
  title: z.string().min(1).default("NPO Nieuwe Programma's"),
  description: z
    .string()
    .min(1)
    .default("Een RSS feed van nieuwe en recente programma's op NPO"),
  link: z.string().url().default("https://npo.nl/start"),
  language: z.string().min(2).default("nl"),
  defaultDescription: z.string().min(1).default("Programma op NPO"),
  maxItems: z.number().int().positive().default(20),
  outputPath: z.string().min(1).default("./npo_new_programs.xml"),
  path: z.string().startsWith("/").default("/"),
});

const portSchema = z.number().int().min(0).max(65535);

/** Port given as text, e.g. through the `PORT` environment variable. */
export const portOverrideSchema = z.coerce.number().pipe(portSchema);

export const appConfigSchema = z.object({
  source: sourceConfigSchema.default({}),
  extraction: extractionConfigSchema.default({}),
  feed: feedConfigSchema.default({}),
  schedule: z
    .object({
      update: z
        .string()
        .min(1)
        .refine((expression) => cron.validate(expression), {
          message: "not a valid cron expression",
        })
        .default("0 * * * *"),
      runOnStart: z.boolean().default(true),
    })
    .default({}),
  server: z
    .object({
      port: portSchema.default(8000),
      host: z.string().min(1).default("0.0.0.0"),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof appConfigSchema>;

