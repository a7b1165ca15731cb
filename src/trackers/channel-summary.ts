import { flapError } from "../errors.js";
import { StatTracker, type TrackerContext } from "./tracker.js";

export interface ChannelSummaryOptions {
  updateRate?: number;
}

/** Channel title with total views and video count. */
export class ChannelSummary extends StatTracker {
  viewCount: number | null = null;
  videoCount: number | null = null;

  constructor(ctx: TrackerContext, opts: ChannelSummaryOptions = {}) {
    super("ChannelSummary", ctx, { updateRate: opts.updateRate ?? 3600 });
  }

  protected async fetch(): Promise<boolean> {
    const stats = await this.ctx.source.getChannelStatistics(this.ctx.channel.id);
    if (stats.viewCount === undefined || stats.videoCount === undefined) {
      throw flapError("fetch_error", "could not retrieve channel stats");
    }
    this.viewCount = stats.viewCount;
    this.videoCount = stats.videoCount;
    return true;
  }

  protected async show(): Promise<void> {
    if (this.viewCount === null || this.videoCount === null) return;

    const { display, channel } = this.ctx;
    await display.print("Channel");
    await display.print(channel.title);
    await display.printStat("Views", this.viewCount);
    await display.printStat("Vids", this.videoCount);
  }
}
