import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createIntervalTask } from "./interval-task.js";

const noopLogger = {
  subsystem: "test",
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  child: vi.fn(),
};

beforeEach(() => {
  vi.useFakeTimers();
});

afterEach(() => {
  vi.useRealTimers();
});

describe("createIntervalTask", () => {
  it("ticks on the interval until stopped", async () => {
    const run = vi.fn(async () => undefined);
    const task = createIntervalTask({ name: "poll", intervalMs: 1000, run, log: noopLogger });
    task.start();
    await vi.advanceTimersByTimeAsync(999);
    expect(run).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(2001);
    expect(run).toHaveBeenCalledTimes(3);
    task.stop();
    await vi.advanceTimersByTimeAsync(5000);
    expect(run).toHaveBeenCalledTimes(3);
  });

  it("logs failed ticks and keeps polling", async () => {
    const run = vi.fn(async () => {
      throw new Error("imap down");
    });
    const task = createIntervalTask({ name: "poll", intervalMs: 1000, run, log: noopLogger });
    task.start();
    await vi.advanceTimersByTimeAsync(2000);
    expect(run).toHaveBeenCalledTimes(2);
    expect(noopLogger.error).toHaveBeenCalledWith("poll: tick failed", { error: "imap down" });
    task.stop();
  });

  it("does not overlap a manual run with one in flight", async () => {
    let release: () => void = () => undefined;
    const run = vi.fn(
      () =>
        new Promise<void>((resolve) => {
          release = resolve;
        }),
    );
    const task = createIntervalTask({ name: "poll", intervalMs: 1000, run, log: noopLogger });
    const first = task.runOnce();
    expect(task.isRunning()).toBe(true);
    await expect(task.runOnce()).resolves.toBe(false);
    release();
    await expect(first).resolves.toBe(true);
    expect(run).toHaveBeenCalledTimes(1);
  });
});
