import { setTimeout as delay } from "node:timers/promises";
import { asError } from "../errors.js";

/**
 * Time source shared by the printer, trackers and scheduler.
 *
 * `now()` is monotonic seconds and drives rate limiting; `date()` is the
 * wall clock and is only used for publish-time comparisons and log lines.
 */
export interface Clock {
  now(): number;
  date(): Date;
  sleep(seconds: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => performance.now() / 1000,
  date: () => new Date(),
  async sleep(seconds: number, signal?: AbortSignal): Promise<void> {
    if (seconds <= 0 || signal?.aborted) return;
    try {
      await delay(seconds * 1000, undefined, { signal });
    } catch (e: unknown) {
      // An aborted sleep just ends early
      if (asError(e).name !== "AbortError") throw e;
    }
  },
};
