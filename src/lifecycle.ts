// pattern: Imperative Shell
import type { Logger } from "pino";

/**
 * Represents an object with a stop method for graceful shutdown.
 */
export type Stoppable = {
  readonly stop: () => void;
};

export type ShutdownDeps = {
  readonly schedulers: ReadonlyArray<Stoppable>;
  readonly closeServer: (() => Promise<void>) | null;
  readonly logger: Logger;
  readonly exit?: (code: number) => void;
};

/**
 * Registers SIGTERM and SIGINT handlers. Stops the schedulers first so no new
 * cycle starts, then closes the HTTP server, then exits with code 0. A second
 * signal during shutdown is ignored.
 */
export function registerShutdownHandlers(deps: ShutdownDeps): void {
  let shuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;

    deps.logger.info({ signal }, "shutdown signal received");

    for (const scheduler of deps.schedulers) {
      try {
        scheduler.stop();
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        deps.logger.error({ error: message }, "error stopping scheduler");
      }
    }

    if (deps.closeServer) {
      try {
        await deps.closeServer();
        deps.logger.info("http server closed");
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        deps.logger.error({ error: message }, "error closing http server");
      }
    }

    deps.logger.info("shutdown complete");
    (deps.exit ?? process.exit)(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}
