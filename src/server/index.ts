// pattern: Imperative Shell
import { basename } from "node:path";
import express from "express";
import type { Logger } from "pino";
import { errorMessage } from "../errors";
import { readFeed } from "../publisher";

export type FeedServerOptions = {
  readonly outputPath: string;
  readonly feedPath: string;
  readonly logger: Logger;
};

export const FEED_CONTENT_TYPE = "application/rss+xml; charset=utf-8";

/**
 * Creates an Express app serving the published feed at the configured path
 * and under its file name. Returns 404 until the first cycle has published.
 * A `/health` endpoint is included for container health checks.
 *
 * @returns Configured Express app instance (not started — caller decides port)
 */
export function createFeedServer(options: FeedServerOptions): express.Express {
  const { outputPath, feedPath, logger } = options;
  const app = express();

  app.disable("x-powered-by");

  app.use((_req, res, next) => {
    res.set({
      "Access-Control-Allow-Origin": "*",
      "Access-Control-Allow-Methods": "GET",
      "Cache-Control": "no-store, no-cache, must-revalidate",
    });
    next();
  });

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  const routes = Array.from(new Set([feedPath, `/${basename(outputPath)}`]));

  app.get(routes, async (req, res) => {
    try {
      const xml = await readFeed(outputPath);
      if (xml === null) {
        res.status(404).type("text/plain").send("feed has not been built yet");
        return;
      }
      res.status(200).set("Content-Type", FEED_CONTENT_TYPE).send(xml);
    } catch (err) {
      logger.error(
        { path: req.path, outputPath, error: errorMessage(err) },
        "failed to read feed",
      );
      res.status(500).type("text/plain").send("feed unavailable");
    }
  });

  return app;
}
