import type { SubsystemLogger } from "../logging/subsystem.js";
import { formatErrorMessage } from "./errors.js";

export type IntervalTask = {
  start: () => void;
  stop: () => void;
  /** Runs one tick now; resolves false when a tick was already in flight. */
  runOnce: () => Promise<boolean>;
  isRunning: () => boolean;
};

/**
 * Re-arming timer around an async tick. The next tick is armed only after
 * the current one settles, so ticks never overlap.
 */
export function createIntervalTask(params: {
  name: string;
  intervalMs: number;
  run: () => Promise<void>;
  log: SubsystemLogger;
}): IntervalTask {
  let timer: ReturnType<typeof setTimeout> | null = null;
  let running = false;
  let started = false;

  const tick = async (): Promise<boolean> => {
    if (running) {
      return false;
    }
    running = true;
    try {
      await params.run();
    } catch (err) {
      params.log.error(`${params.name}: tick failed`, { error: formatErrorMessage(err) });
    } finally {
      running = false;
    }
    return true;
  };

  const arm = () => {
    if (timer) {
      clearTimeout(timer);
    }
    timer = setTimeout(() => {
      timer = null;
      void tick().then(() => {
        if (started) {
          arm();
        }
      });
    }, Math.max(1, params.intervalMs));
    timer.unref?.();
  };

  return {
    start: () => {
      if (started) {
        return;
      }
      started = true;
      arm();
    },
    stop: () => {
      started = false;
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
    },
    runOnce: tick,
    isRunning: () => running,
  };
}
