/**
 * Stats source contract. Every method either resolves with what the
 * platform returned or rejects with a fetch_error; statistic counts are
 * optional because the platform omits hidden or disabled ones.
 */

export interface ChannelInfo {
  title: string;
  uploadsPlaylistId: string;
}

export interface ChannelStatistics {
  subscriberCount?: number;
  viewCount?: number;
  videoCount?: number;
}

export interface PlaylistItem {
  videoId: string;
  /** ISO-8601 publish time, as sent by the platform. */
  publishedAt: string;
  title: string;
}

export interface VideoStatistics {
  viewCount?: number;
  likeCount?: number;
  commentCount?: number;
}

export interface StatsSource {
  getChannelInfo(channelId: string): Promise<ChannelInfo>;
  getChannelStatistics(channelId: string): Promise<ChannelStatistics>;
  getLatestPlaylistItem(playlistId: string): Promise<PlaylistItem>;
  getVideoStatistics(videoId: string): Promise<VideoStatistics>;
}

/** Per-run channel identifiers, resolved once at startup. */
export interface ChannelContext {
  readonly id: string;
  readonly title: string;
  readonly uploadsPlaylistId: string;
}
