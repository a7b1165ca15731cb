/**
 * Runtime configuration assembled from the command line.
 */

export interface TrackerRates {
  /** Seconds between subscriber count updates. */
  subscribers: number;
  /** Seconds between channel summary updates. */
  channel: number;
  /** Seconds between checks for a new upload. */
  videos: number;
  /** Seconds between stat updates for a recent upload. */
  videoStats: number;
}

export interface FlapstatConfig {
  apiKey: string;
  channelId: string;
  /** Serial device path/name or 1-based index; null picks the first port. */
  port: string | null;
  demo: boolean;
  intro: boolean;
  verbose: boolean;
  baudRate: number;
  rates: TrackerRates;
  recentDays: number;
  recentHours: number;
  showDiff: boolean;
  showLabel: boolean;
  apiBaseUrl: string;
  timeoutMs: number;
  requestsPerSecond: number;
}
