import prettyMs from "pretty-ms";
import { Logger, C } from "../logger.js";
import { asError, errorLogFields, isFlapError } from "../errors.js";
import type { DisplayPrinter } from "../display/printer.js";
import type { ChannelContext, StatsSource } from "../stats/types.js";
import type { Clock } from "../utils/clock.js";

/** Collaborators every tracker shares for the whole run. */
export interface TrackerContext {
  source: StatsSource;
  display: DisplayPrinter;
  channel: ChannelContext;
  clock: Clock;
}

export type TrackerState = "idle" | "updating";

export interface TrackerOptions {
  /** Seconds between updates. */
  updateRate: number;
}

/** Human-readable duration for log lines, e.g. "2 minutes". */
export function describeSeconds(seconds: number): string {
  return prettyMs(Math.max(0, seconds) * 1000, { verbose: true, unitCount: 2, secondsDecimalDigits: 0 });
}

/**
 * One statistic on a timer. Subclasses fetch fresh data and show it;
 * the base class decides when, and keeps one failed fetch from turning
 * into a retry storm by advancing the timer either way.
 */
export abstract class StatTracker {
  lastUpdate: number | null = null;
  private _state: TrackerState = "idle";
  private _updateRate: number;

  constructor(readonly id: string, protected readonly ctx: TrackerContext, opts: TrackerOptions) {
    this._updateRate = StatTracker.checkRate(opts.updateRate, id);
  }

  /** Fetch new data; resolve false (or reject) when there is nothing to show. */
  protected abstract fetch(): Promise<boolean>;
  protected abstract show(): Promise<void>;

  get state(): TrackerState {
    return this._state;
  }

  get updateRate(): number {
    return this._updateRate;
  }

  protected set updateRate(seconds: number) {
    this._updateRate = StatTracker.checkRate(seconds, this.id);
  }

  isDue(now: number): boolean {
    return this.lastUpdate === null || now >= this.lastUpdate + this._updateRate;
  }

  /** Seconds until the next update is due, never negative. */
  secondsUntilDue(now: number): number {
    if (this.lastUpdate === null) return 0;
    return Math.max(this.lastUpdate + this._updateRate - now, 0);
  }

  /** Run one fetch/show cycle if due. Returns whether a cycle ran. */
  async run(now: number): Promise<boolean> {
    if (!this.isDue(now)) return false;

    this._state = "updating";
    try {
      const stamp = this.ctx.clock.date().toISOString().replace("T", " ").slice(0, 19);
      Logger.info(C.gray(`--- ${stamp} fetching update for '${this.id}', next update in ${describeSeconds(this._updateRate)} ---`));

      if (await this.attempt(() => this.fetch())) {
        await this.attempt(async () => {
          await this.show();
          return true;
        });
      }
      this.lastUpdate = now;
    } finally {
      this._state = "idle";
    }
    return true;
  }

  /** Fetch errors are this cycle's problem only; anything else propagates. */
  private async attempt(step: () => Promise<boolean>): Promise<boolean> {
    try {
      return await step();
    } catch (e: unknown) {
      if (!isFlapError(e) || e.kind !== "fetch_error") throw e;
      Logger.error(C.red(`${this.id}: ${asError(e).message}`));
      Logger.debug(errorLogFields(e));
      return false;
    }
  }

  private static checkRate(seconds: number, id: string): number {
    if (!Number.isFinite(seconds) || seconds <= 0) {
      throw new RangeError(`${id}: update rate must be a positive number of seconds; got ${seconds}`);
    }
    return seconds;
  }
}
