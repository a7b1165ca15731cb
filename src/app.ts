/**
 * Startup wiring: channel lookup, display selection, tracker set-up.
 * Kept apart from main.ts so it can run against fakes.
 */
import { Logger, C } from "./logger.js";
import { asError, flapError } from "./errors.js";
import { DisplayPrinter } from "./display/printer.js";
import { DetachedTransport, withTransport, type DisplayTransport } from "./display/transport.js";
import { Scheduler } from "./scheduler.js";
import { ChannelSummary } from "./trackers/channel-summary.js";
import { RecentVideoStats } from "./trackers/recent-video-stats.js";
import { SubscriberCounter } from "./trackers/subscriber-counter.js";
import { systemClock, type Clock } from "./utils/clock.js";
import { VERSION } from "./version.js";
import type { StatTracker, TrackerContext } from "./trackers/tracker.js";
import type { ChannelContext, StatsSource } from "./stats/types.js";
import type { FlapstatConfig } from "./types.js";

export const INTRO_TITLE = "YouTube Stats";

export async function resolveChannel(source: StatsSource, channelId: string): Promise<ChannelContext> {
  try {
    const info = await source.getChannelInfo(channelId);
    Logger.info(C.gray(`channel '${info.title}' (uploads playlist ${info.uploadsPlaylistId})`));
    return Object.freeze({ id: channelId, title: info.title, uploadsPlaylistId: info.uploadsPlaylistId });
  } catch (e: unknown) {
    throw flapError("config_error", `could not request channel info - check your channel ID (${asError(e).message})`, { cause: e });
  }
}

/** Title then version, then a blank display. */
export async function showIntro(display: DisplayPrinter, version = VERSION): Promise<void> {
  await display.print(INTRO_TITLE, "center");
  await display.print(`v${version}`, "right");
  await display.clear(2);
}

/** Trackers in the order they run on each pass. */
export function createTrackers(ctx: TrackerContext, cfg: FlapstatConfig): StatTracker[] {
  return [
    new ChannelSummary(ctx, { updateRate: cfg.rates.channel }),
    new RecentVideoStats(ctx, {
      updateRateVideos: cfg.rates.videos,
      updateRateStats: cfg.rates.videoStats,
      daysRecent: cfg.recentDays,
      hoursRecent: cfg.recentHours,
    }),
    new SubscriberCounter(ctx, {
      updateRate: cfg.rates.subscribers,
      showDiff: cfg.showDiff,
      showLabel: cfg.showLabel,
    }),
  ];
}

export interface AppDeps {
  source: StatsSource;
  /** Builds the live transport; not called with --demo. */
  connect: () => Promise<DisplayTransport>;
  clock?: Clock;
  signal?: AbortSignal;
}

export async function runApp(cfg: FlapstatConfig, deps: AppDeps): Promise<void> {
  const clock = deps.clock ?? systemClock;
  const channel = await resolveChannel(deps.source, cfg.channelId);

  let transport: DisplayTransport;
  if (cfg.demo) {
    Logger.warn(C.yellow("demo mode: no display attached, pages are only logged"));
    transport = new DetachedTransport();
  } else {
    transport = await deps.connect();
  }

  await withTransport(transport, async (t) => {
    const display = new DisplayPrinter(t, { clock });
    if (cfg.intro) await showIntro(display);

    const scheduler = new Scheduler(clock);
    for (const tracker of createTrackers({ source: deps.source, display, channel, clock }, cfg)) {
      scheduler.add(tracker);
    }
    await scheduler.run(deps.signal);
  });
}
