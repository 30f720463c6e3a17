import { resolve } from "node:path";
import type { Server } from "node:http";
import { z } from "zod";
import { createLogger } from "./logger";
import { loadConfig, resolvePort } from "./config";
import type { AppConfig } from "./config";
import { runCycle } from "./pipeline";
import { createUpdateScheduler } from "./scheduler";
import type { UpdateScheduler } from "./scheduler";
import { createFeedServer } from "./server";
import { registerShutdownHandlers } from "./lifecycle";

const commandSchema = z.enum(["run", "once", "serve", "update"]).default("run");

const CONFIG_PATH = process.env["CONFIG_PATH"] ?? "./config.yaml";

async function main(): Promise<void> {
  const logger = createLogger();

  const command = commandSchema.safeParse(process.argv[2]);
  if (!command.success) {
    logger.fatal(
      { argument: process.argv[2] },
      "unknown command, expected one of: run, once, serve, update",
    );
    process.exit(2);
  }

  let config: AppConfig;
  let port: number;
  try {
    config = loadConfig(resolve(CONFIG_PATH));
    port = resolvePort(process.env["PORT"], config.server.port);
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "configuration error",
    );
    process.exit(1);
  }

  config = {
    ...config,
    feed: { ...config.feed, outputPath: resolve(config.feed.outputPath) },
  };

  logger.info(
    { command: command.data, urls: config.source.urls, outputPath: config.feed.outputPath },
    "program-feed starting",
  );

  if (command.data === "once") {
    const result = await runCycle(config, { logger });
    process.exit(result.status === "published" ? 0 : 1);
  }

  const schedulers: Array<UpdateScheduler> = [];
  if (command.data === "run" || command.data === "update") {
    schedulers.push(
      createUpdateScheduler(config, logger, () => runCycle(config, { logger })),
    );
    logger.info({ schedule: config.schedule.update }, "update scheduler started");
  }

  let server: Server | null = null;
  if (command.data === "run" || command.data === "serve") {
    const app = createFeedServer({
      outputPath: config.feed.outputPath,
      feedPath: config.feed.path,
      logger,
    });
    server = app.listen(port, config.server.host, () => {
      logger.info(
        { port, host: config.server.host, path: config.feed.path },
        "feed server listening",
      );
    });
  }

  const listening = server;
  registerShutdownHandlers({
    schedulers,
    closeServer: listening
      ? () =>
          new Promise<void>((done, fail) => {
            listening.close((err) => (err ? fail(err) : done()));
          })
      : null,
    logger,
  });
}

main().catch((err) => {
  console.error("fatal startup error:", err);
  process.exit(1);
});
