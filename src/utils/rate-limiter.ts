import { systemClock, type Clock } from "./clock.js";

interface Lane {
  /** Clock time (seconds) at which the next call may start. */
  nextStart: number;
  tail: Promise<void>;
}

/**
 * Spaces out API calls that share a lane name so at most
 * `requestsPerSecond` start each second. Callers on one lane queue in
 * arrival order; lanes do not affect each other.
 */
export class RateLimiter {
  private lanes = new Map<string, Lane>();

  constructor(private readonly clock: Pick<Clock, "now" | "sleep"> = systemClock) {}

  async limit(name: string, requestsPerSecond: number): Promise<void> {
    if (!Number.isFinite(requestsPerSecond) || requestsPerSecond <= 0) {
      throw new RangeError(`requestsPerSecond must be a positive finite number; got ${requestsPerSecond}`);
    }
    const lane = this.lane(name || "default");

    const turn = lane.tail.then(async () => {
      const now = this.clock.now();
      const start = Math.max(now, lane.nextStart);
      lane.nextStart = start + 1 / requestsPerSecond;
      if (start > now) await this.clock.sleep(start - now);
    });

    // A failed turn must not stall the lane
    lane.tail = turn.catch(() => undefined);
    return turn;
  }

  reset(name?: string): void {
    if (name) this.lanes.delete(name);
    else this.lanes.clear();
  }

  private lane(name: string): Lane {
    let lane = this.lanes.get(name);
    if (!lane) {
      lane = { nextStart: this.clock.now(), tail: Promise.resolve() };
      this.lanes.set(name, lane);
    }
    return lane;
  }
}

/** Process-wide limiter shared by every stats source. */
export const rateLimiter = new RateLimiter();
