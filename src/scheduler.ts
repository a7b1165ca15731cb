import { Logger, C } from "./logger.js";
import { flapError } from "./errors.js";
import { systemClock, type Clock } from "./utils/clock.js";
import { describeSeconds, type StatTracker } from "./trackers/tracker.js";

/**
 * Runs registered trackers in registration order, then sleeps until the
 * soonest one is due again. Everything happens on one logical thread:
 * a tracker's display output finishes before the next tracker starts.
 */
export class Scheduler {
  private readonly trackers = new Map<string, StatTracker>();

  constructor(private readonly clock: Clock = systemClock) {}

  add(tracker: StatTracker): void {
    const existing = this.trackers.get(tracker.id);
    if (existing === tracker) return;
    if (existing) {
      throw flapError("config_error", `a tracker with id '${tracker.id}' is already registered`);
    }
    this.trackers.set(tracker.id, tracker);
  }

  remove(id: string): boolean {
    return this.trackers.delete(id);
  }

  get(id: string): StatTracker | undefined {
    return this.trackers.get(id);
  }

  get size(): number {
    return this.trackers.size;
  }

  /** One pass over every tracker; each runs only if due. */
  async runAll(): Promise<void> {
    for (const tracker of this.trackers.values()) {
      await tracker.run(this.clock.now());
    }
  }

  /** Seconds until the soonest tracker is due; 0 if one is due now or none exist. */
  sleepTime(now = this.clock.now()): number {
    let soonest: number | null = null;
    for (const tracker of this.trackers.values()) {
      const wait = tracker.secondsUntilDue(now);
      if (soonest === null || wait < soonest) soonest = wait;
    }
    return soonest ?? 0;
  }

  /** Loop until `signal` aborts; the end-of-pass sleep wakes early on abort. */
  async run(signal?: AbortSignal): Promise<void> {
    if (this.trackers.size === 0) {
      Logger.warn("no trackers registered, nothing to do");
      return;
    }
    while (!signal?.aborted) {
      await this.runAll();
      const wait = this.sleepTime();
      if (wait > 0 && !signal?.aborted) {
        Logger.info(C.gray(`\t(sleeping for ${describeSeconds(wait)})`));
        await this.clock.sleep(wait, signal);
      }
    }
  }
}
