import { describe, it, expect, beforeEach, vi } from "vitest";
import { EventEmitter } from "node:events";
import cron from "node-cron";
import pino from "pino";
import { createUpdateScheduler } from "./scheduler";
import type { CycleRunner } from "./scheduler";
import type { CycleResult } from "./pipeline/types";
import { createTestConfig } from "./test-utils/config";

vi.mock("node-cron");

const logger = pino({ level: "silent" });

const published: CycleResult = {
  status: "published",
  programCount: 2,
  newCount: 1,
  degraded: false,
  outputPath: "/tmp/feed.xml",
};

describe("createUpdateScheduler", () => {
  let tick: (() => void) | null = null;
  let task: EventEmitter & {
    now: ReturnType<typeof vi.fn>;
    start: ReturnType<typeof vi.fn>;
    stop: ReturnType<typeof vi.fn>;
  };

  beforeEach(() => {
    vi.clearAllMocks();
    tick = null;
    task = Object.assign(new EventEmitter(), {
      now: vi.fn(),
      start: vi.fn(),
      stop: vi.fn(),
    });

    vi.mocked(cron.schedule).mockImplementation((_expression, func) => {
      if (typeof func === "function") {
        tick = () => func(new Date());
      }
      return task;
    });
  });

  it("should register a cron task with the configured schedule", () => {
    const config = createTestConfig({ schedule: { update: "*/30 * * * *" } });

    createUpdateScheduler(config, logger, vi.fn<CycleRunner>().mockResolvedValue(published));

    expect(vi.mocked(cron.schedule)).toHaveBeenCalledWith(
      "*/30 * * * *",
      expect.any(Function),
    );
  });

  it("should run a cycle immediately when runOnStart is set", () => {
    const runner = vi.fn<CycleRunner>().mockResolvedValue(published);

    createUpdateScheduler(createTestConfig({ schedule: { runOnStart: true } }), logger, runner);

    expect(runner).toHaveBeenCalledTimes(1);
  });

  it("should wait for the schedule when runOnStart is not set", () => {
    const runner = vi.fn<CycleRunner>().mockResolvedValue(published);

    createUpdateScheduler(createTestConfig({ schedule: { runOnStart: false } }), logger, runner);

    expect(runner).not.toHaveBeenCalled();
  });

  it("should run a cycle on every scheduled tick", async () => {
    const runner = vi.fn<CycleRunner>().mockResolvedValue(published);
    createUpdateScheduler(createTestConfig(), logger, runner);

    tick?.();
    await vi.waitFor(() => expect(runner).toHaveBeenCalledTimes(1));
  });

  it("should skip a tick while the previous cycle is still running", async () => {
    const gate = { release: () => {} };
    const runner = vi
      .fn<CycleRunner>()
      .mockResolvedValue(published)
      .mockImplementationOnce(
        () =>
          new Promise<CycleResult>((resolve) => {
            gate.release = () => resolve(published);
          }),
      );
    const scheduler = createUpdateScheduler(createTestConfig(), logger, runner);

    const first = scheduler.runNow();
    tick?.();
    expect(runner).toHaveBeenCalledTimes(1);

    gate.release();
    await first;
    await scheduler.runNow();

    expect(runner).toHaveBeenCalledTimes(2);
  });

  it("should contain a cycle that throws and keep scheduling", async () => {
    const runner = vi
      .fn<CycleRunner>()
      .mockResolvedValue(published)
      .mockRejectedValueOnce(new Error("unexpected"));
    const scheduler = createUpdateScheduler(createTestConfig(), logger, runner);

    await expect(scheduler.runNow()).resolves.toBeUndefined();
    await scheduler.runNow();

    expect(runner).toHaveBeenCalledTimes(2);
  });

  it("should log a failed cycle without throwing", async () => {
    const runner = vi.fn<CycleRunner>().mockResolvedValue({
      status: "failed",
      stage: "fetch",
      error: "HTTP 503: Service Unavailable",
    });
    const scheduler = createUpdateScheduler(createTestConfig(), logger, runner);

    await expect(scheduler.runNow()).resolves.toBeUndefined();
  });

  it("should stop the cron task", () => {
    const scheduler = createUpdateScheduler(
      createTestConfig(),
      logger,
      vi.fn<CycleRunner>().mockResolvedValue(published),
    );

    scheduler.stop();

    expect(task.stop).toHaveBeenCalledTimes(1);
  });
});
