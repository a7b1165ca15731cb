import { Logger, C } from "../logger.js";
import type { PlaylistItem, VideoStatistics } from "../stats/types.js";
import { StatTracker, type TrackerContext } from "./tracker.js";

/** Statistic keys shown for a recent video, with their labels, in order. */
export const VIDEO_STAT_LABELS: ReadonlyArray<readonly [keyof VideoStatistics, string]> = [
  ["viewCount", "Views"],
  ["likeCount", "Likes"],
  ["commentCount", "Comments"],
];

export interface RecentVideoStatsOptions {
  /** Seconds between checks for a new upload. */
  updateRateVideos?: number;
  /** Seconds between stat updates while the latest upload is recent. */
  updateRateStats?: number;
  daysRecent?: number;
  hoursRecent?: number;
}

/**
 * Watches the uploads playlist. While the newest upload is inside the
 * recency window the tracker speeds up to the stats rate and shows the
 * video's views, likes and comments; once it ages out it drops back to
 * the slower new-video rate.
 */
export class RecentVideoStats extends StatTracker {
  readonly updateRateVideos: number;
  readonly updateRateStats: number;
  readonly daysRecent: number;
  readonly hoursRecent: number;

  latest: PlaylistItem | null = null;
  videoStats: VideoStatistics = {};
  /** Video whose title has already been shown. */
  displayedVideo: string | null = null;

  constructor(ctx: TrackerContext, opts: RecentVideoStatsOptions = {}) {
    const updateRateVideos = opts.updateRateVideos ?? 300;
    super("RecentVideoStats", ctx, { updateRate: updateRateVideos });
    this.updateRateVideos = updateRateVideos;
    this.updateRateStats = opts.updateRateStats ?? 1800;
    this.daysRecent = opts.daysRecent ?? 3;
    this.hoursRecent = opts.hoursRecent ?? 0;
  }

  /** Start of the recency window, relative to `now`. */
  cutoff(now: Date): Date {
    const windowMs = (this.daysRecent * 24 + this.hoursRecent) * 3600 * 1000;
    return new Date(now.getTime() - windowMs);
  }

  isRecent(publishedAt: string, now: Date): boolean {
    const published = Date.parse(publishedAt);
    if (Number.isNaN(published)) return false;
    return published > this.cutoff(now).getTime();
  }

  protected async fetch(): Promise<boolean> {
    const { source, channel, clock } = this.ctx;
    this.latest = await source.getLatestPlaylistItem(channel.uploadsPlaylistId);

    const now = clock.date();
    if (!this.isRecent(this.latest.publishedAt, now)) {
      this.updateRate = this.updateRateVideos;
      Logger.info(C.gray(
        `latest video, '${this.latest.title}', was not "recent" ` +
        `(published ${this.latest.publishedAt}, cutoff time is ${this.cutoff(now).toISOString()})`,
      ));
      return false;
    }

    this.updateRate = this.updateRateStats;
    this.videoStats = await source.getVideoStatistics(this.latest.videoId);
    return true;
  }

  protected async show(): Promise<void> {
    if (!this.latest) return;
    const { display } = this.ctx;

    await display.print("New Vid!");
    if (this.latest.videoId !== this.displayedVideo) {
      this.displayedVideo = this.latest.videoId;
      await display.print(this.latest.title);
    }
    await display.clear();

    for (const [key, label] of VIDEO_STAT_LABELS) {
      const value = this.videoStats[key];
      if (value === undefined) {
        Logger.error(C.red(`could not retrieve '${key}' value from video stats`));
        continue;
      }
      await display.printStat(label, value);
    }
  }
}
