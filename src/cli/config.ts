/**
 * CLI argument parsing and help text.
 */

import { flapError } from "../errors.js";
import { DEFAULT_API_BASE_URL } from "../stats/youtube-source.js";
import { DEFAULT_BAUD_RATE } from "../display/transport.js";
import { PROGRAM_NAME, VERSION } from "../version.js";
import type { FlapstatConfig } from "../types.js";

export type ParsedArgs =
  | { kind: "run"; config: FlapstatConfig }
  | { kind: "help" }
  | { kind: "version" };

type Env = Record<string, string | undefined>;

function positiveNumber(flag: string, raw: string): number {
  const n = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(n) || n <= 0) {
    throw flapError("config_error", `${flag} expects a positive number, got '${raw}'`);
  }
  return n;
}

function nonNegativeNumber(flag: string, raw: string): number {
  const n = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(n) || n < 0) {
    throw flapError("config_error", `${flag} expects a number >= 0, got '${raw}'`);
  }
  return n;
}

export function parseArgs(argv: string[], env: Env = process.env): ParsedArgs {
  const flags: Record<string, string> = {};
  const positional: string[] = [];

  const value = (i: number, flag: string): string => {
    const v = argv[i];
    if (v === undefined) throw flapError("config_error", `${flag} requires a value`);
    return v;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "--port" || arg === "-p") { flags.port = value(++i, arg); }
    else if (arg === "--demo") { flags.demo = "true"; }
    else if (arg === "--intro") { flags.intro = "true"; }
    else if (arg === "--verbose") { flags.verbose = "true"; }
    else if (arg === "--baud") { flags.baud = value(++i, arg); }
    else if (arg === "--subscriber-rate") { flags.subscriberRate = value(++i, arg); }
    else if (arg === "--channel-rate") { flags.channelRate = value(++i, arg); }
    else if (arg === "--video-rate") { flags.videoRate = value(++i, arg); }
    else if (arg === "--video-stats-rate") { flags.videoStatsRate = value(++i, arg); }
    else if (arg === "--recent-days") { flags.recentDays = value(++i, arg); }
    else if (arg === "--recent-hours") { flags.recentHours = value(++i, arg); }
    else if (arg === "--no-diff") { flags.noDiff = "true"; }
    else if (arg === "--no-label") { flags.noLabel = "true"; }
    else if (arg === "--api-base-url") { flags.apiBaseUrl = value(++i, arg); }
    else if (arg === "--timeout-ms") { flags.timeoutMs = value(++i, arg); }
    else if (arg === "--max-rps") { flags.maxRps = value(++i, arg); }
    else if (arg === "-V" || arg === "--version") { return { kind: "version" }; }
    else if (arg === "-h" || arg === "--help") { return { kind: "help" }; }
    else if (arg.startsWith("-") && arg.length > 1) {
      throw flapError("config_error", `unknown option: ${arg}`);
    }
    else { positional.push(arg); }
  }

  // The key may come from the environment, leaving the channel as the only positional
  const envKey = env.FLAPSTAT_API_KEY;
  if (positional.length === 1 && envKey) positional.unshift(envKey);
  if (positional.length !== 2) {
    throw flapError("config_error", "expected <api_key> <channel_id> (see --help)");
  }
  const [apiKey, channelId] = positional;

  return {
    kind: "run",
    config: {
      apiKey,
      channelId,
      port: flags.port ?? null,
      demo: flags.demo === "true",
      intro: flags.intro === "true",
      verbose: flags.verbose === "true",
      baudRate: flags.baud ? positiveNumber("--baud", flags.baud) : DEFAULT_BAUD_RATE,
      rates: {
        subscribers: flags.subscriberRate ? positiveNumber("--subscriber-rate", flags.subscriberRate) : 120,
        channel: flags.channelRate ? positiveNumber("--channel-rate", flags.channelRate) : 3600,
        videos: flags.videoRate ? positiveNumber("--video-rate", flags.videoRate) : 300,
        videoStats: flags.videoStatsRate ? positiveNumber("--video-stats-rate", flags.videoStatsRate) : 1800,
      },
      recentDays: flags.recentDays ? nonNegativeNumber("--recent-days", flags.recentDays) : 3,
      recentHours: flags.recentHours ? nonNegativeNumber("--recent-hours", flags.recentHours) : 0,
      showDiff: flags.noDiff !== "true",
      showLabel: flags.noLabel !== "true",
      apiBaseUrl: flags.apiBaseUrl ?? DEFAULT_API_BASE_URL,
      timeoutMs: flags.timeoutMs ? positiveNumber("--timeout-ms", flags.timeoutMs) : 10_000,
      requestsPerSecond: flags.maxRps ? positiveNumber("--max-rps", flags.maxRps) : 5,
    },
  };
}

export function usage(): string {
  return `${PROGRAM_NAME} ${VERSION}

usage:
  flapstat [options] <api_key> <channel_id>

arguments:
  api_key                YouTube Data API key (or set FLAPSTAT_API_KEY)
  channel_id             channel to show statistics for

options:
  -p, --port             serial port name or 1-based index (default: first port)
  --demo                 run without a display; pages are only logged
  --intro                show the program name and version at startup
  --baud                 serial baud rate (default: ${DEFAULT_BAUD_RATE})
  --subscriber-rate      seconds between subscriber updates (default: 120)
  --channel-rate         seconds between channel summaries (default: 3600)
  --video-rate           seconds between new-video checks (default: 300)
  --video-stats-rate     seconds between recent-video stats (default: 1800)
  --recent-days          days a video counts as recent (default: 3)
  --recent-hours         extra hours a video counts as recent (default: 0)
  --no-diff              do not show the subscriber gain
  --no-label             show the subscriber count without a label
  --api-base-url         API base URL (default: ${DEFAULT_API_BASE_URL})
  --timeout-ms           request timeout (default: 10000)
  --max-rps              max API requests started per second (default: 5)
  --verbose              verbose output (debug lines need FLAPSTAT_LOG_LEVEL=DEBUG too)
  -V, --version          show version
  -h, --help             show this help`;
}
