/**
 * YouTube Data API v3 stats source.
 *
 * Endpoints: GET {baseUrl}/channels, /playlistItems, /videos
 * Auth: `key` query parameter
 * Counts come back as decimal strings; hidden or disabled counts are
 * simply absent from the `statistics` object.
 */
import { z } from "zod";
import { flapError } from "../errors.js";
import { Logger } from "../logger.js";
import { rateLimiter, type RateLimiter } from "../utils/rate-limiter.js";
import { redactKey, timedFetch } from "../utils/timed-fetch.js";
import type {
  ChannelInfo,
  ChannelStatistics,
  PlaylistItem,
  StatsSource,
  VideoStatistics,
} from "./types.js";

export const DEFAULT_API_BASE_URL = "https://www.googleapis.com/youtube/v3";

export interface YouTubeSourceConfig {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  /** Upper bound on requests started per second. */
  requestsPerSecond?: number;
  limiter?: RateLimiter;
}

// A malformed count is reported like a missing one, per field
const count = z.string().regex(/^\d+$/).transform(Number).optional().catch(undefined);

function itemsOf<T extends z.ZodTypeAny>(item: T) {
  return z.object({ items: z.array(item).min(1, "no items returned") });
}

const channelInfoResponse = itemsOf(z.object({
  snippet: z.object({ title: z.string() }),
  contentDetails: z.object({
    relatedPlaylists: z.object({ uploads: z.string().min(1) }),
  }),
}));

const channelStatsResponse = itemsOf(z.object({
  statistics: z.object({
    subscriberCount: count,
    viewCount: count,
    videoCount: count,
  }),
}));

const playlistItemsResponse = itemsOf(z.object({
  snippet: z.object({ title: z.string() }),
  contentDetails: z.object({
    videoId: z.string().min(1),
    videoPublishedAt: z.string(),
  }),
}));

const videoStatsResponse = itemsOf(z.object({
  statistics: z.object({
    viewCount: count,
    likeCount: count,
    commentCount: count,
  }),
}));

const apiErrorResponse = z.object({
  error: z.object({ message: z.string() }),
});

export function makeYouTubeStatsSource(cfg: YouTubeSourceConfig): StatsSource {
  const baseUrl = (cfg.baseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, "");
  const timeoutMs = cfg.timeoutMs ?? 10_000;
  const requestsPerSecond = cfg.requestsPerSecond ?? 5;
  const limiter = cfg.limiter ?? rateLimiter;

  async function request<S extends z.ZodTypeAny>(
    resource: string,
    params: Record<string, string>,
    schema: S,
  ): Promise<z.output<S>> {
    const url = new URL(`${baseUrl}/${resource}`);
    for (const [k, v] of Object.entries(params)) url.searchParams.set(k, v);
    url.searchParams.set("key", cfg.apiKey);
    const where = `youtube ${resource}`;

    await limiter.limit("youtube-api", requestsPerSecond);
    Logger.debug(`GET ${redactKey(url.toString())}`);
    const res = await timedFetch(url.toString(), {
      timeoutMs,
      where,
      headers: { accept: "application/json" },
    });

    let body: unknown;
    try {
      body = await res.json();
    } catch (e: unknown) {
      throw flapError("fetch_error", `${where}: response was not JSON (HTTP ${res.status})`, {
        status: res.status,
        cause: e,
      });
    }

    if (!res.ok) {
      const apiError = apiErrorResponse.safeParse(body);
      const detail = apiError.success ? apiError.data.error.message : res.statusText;
      throw flapError("fetch_error", `${where}: HTTP ${res.status} ${detail}`, {
        status: res.status,
        retryable: res.status === 429 || res.status >= 500,
      });
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const at = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
      throw flapError("fetch_error", `${where}: unexpected response (${at}${issue?.message ?? "invalid"})`);
    }
    return parsed.data;
  }

  return {
    async getChannelInfo(channelId: string): Promise<ChannelInfo> {
      const data = await request("channels", { part: "snippet,contentDetails", id: channelId }, channelInfoResponse);
      const item = data.items[0];
      return { title: item.snippet.title, uploadsPlaylistId: item.contentDetails.relatedPlaylists.uploads };
    },

    async getChannelStatistics(channelId: string): Promise<ChannelStatistics> {
      const data = await request("channels", { part: "statistics", id: channelId }, channelStatsResponse);
      return data.items[0].statistics;
    },

    async getLatestPlaylistItem(playlistId: string): Promise<PlaylistItem> {
      const data = await request(
        "playlistItems",
        { part: "snippet,contentDetails", maxResults: "1", playlistId },
        playlistItemsResponse,
      );
      const item = data.items[0];
      return {
        videoId: item.contentDetails.videoId,
        publishedAt: item.contentDetails.videoPublishedAt,
        title: item.snippet.title,
      };
    },

    async getVideoStatistics(videoId: string): Promise<VideoStatistics> {
      const data = await request("videos", { part: "statistics", id: videoId }, videoStatsResponse);
      return data.items[0].statistics;
    },
  };
}
