import { flapError } from "../errors.js";
import { StatTracker, type TrackerContext } from "./tracker.js";

export const SUBSCRIBER_LABELS = ["Subscribers", "Subs", "Sub"] as const;

export interface SubscriberCounterOptions {
  updateRate?: number;
  /** Show a "Subscribers" label with the count. */
  showLabel?: boolean;
  /** Show "+N" gained since the previous update before the count. */
  showDiff?: boolean;
}

/** Subscriber count, with the gain since the last update. */
export class SubscriberCounter extends StatTracker {
  subscribers: number | null = null;
  /** Change since the previous successful fetch; zero after the first. */
  diff = 0;
  private readonly labels: readonly string[] | null;
  private readonly showDiff: boolean;

  constructor(ctx: TrackerContext, opts: SubscriberCounterOptions = {}) {
    super("SubscriberCounter", ctx, { updateRate: opts.updateRate ?? 120 });
    this.labels = (opts.showLabel ?? true) ? SUBSCRIBER_LABELS : null;
    this.showDiff = opts.showDiff ?? true;
  }

  protected async fetch(): Promise<boolean> {
    const stats = await this.ctx.source.getChannelStatistics(this.ctx.channel.id);
    if (stats.subscriberCount === undefined) {
      throw flapError("fetch_error", "could not retrieve subscriber count");
    }
    const previous = this.subscribers ?? stats.subscriberCount;
    this.subscribers = stats.subscriberCount;
    this.diff = stats.subscriberCount - previous;
    return true;
  }

  protected async show(): Promise<void> {
    if (this.subscribers === null) return;

    let flashLabel = true;
    if (this.diff > 0 && this.showDiff) {
      await this.ctx.display.printStat(this.labels, `+${this.diff}`);
      flashLabel = false; // the label was just on screen with the diff
    }
    await this.ctx.display.printStat(this.labels, this.subscribers, { twoStep: flashLabel });
  }
}
