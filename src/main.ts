#!/usr/bin/env node
/**
 * flapstat: YouTube channel statistics on a split-flap display.
 */

import { Logger, C } from "./logger.js";
import { asError, isFlapError } from "./errors.js";
import { parseArgs, usage } from "./cli/config.js";
import { resolveSerialPort } from "./cli/ports.js";
import { SerialTransport, listSerialPorts, openSerialLink } from "./display/serial-transport.js";
import { makeYouTubeStatsSource } from "./stats/youtube-source.js";
import { runApp } from "./app.js";
import { PROGRAM_NAME, VERSION } from "./version.js";

const controller = new AbortController();

async function main(argv: string[]): Promise<void> {
  const parsed = parseArgs(argv);
  if (parsed.kind === "help") {
    Logger.info(usage());
    return;
  }
  if (parsed.kind === "version") {
    Logger.info(`flapstat ${VERSION}`);
    return;
  }

  const cfg = parsed.config;
  Logger.setVerbose(cfg.verbose);

  const banner = `${PROGRAM_NAME} v${VERSION}`;
  Logger.info(C.bold(banner));
  Logger.info(C.gray("=".repeat(banner.length)));

  const source = makeYouTubeStatsSource({
    apiKey: cfg.apiKey,
    baseUrl: cfg.apiBaseUrl,
    timeoutMs: cfg.timeoutMs,
    requestsPerSecond: cfg.requestsPerSecond,
  });

  await runApp(cfg, {
    source,
    signal: controller.signal,
    connect: async () => {
      const path = resolveSerialPort(cfg.port, await listSerialPorts());
      return new SerialTransport(openSerialLink(path, cfg.baudRate));
    },
  });
  Logger.info(C.gray("stopped"));
}

// First signal stops the scheduler and lets the display close; a second one exits now
for (const sig of ["SIGINT", "SIGTERM"] as const) {
  process.on(sig, () => {
    if (controller.signal.aborted) process.exit(130);
    Logger.info(C.gray(`\nreceived ${sig}, shutting down...`));
    controller.abort();
  });
}

process.on("unhandledRejection", (reason: unknown) => {
  const err = asError(reason);
  Logger.error(C.red(`unhandled rejection: ${err.message}`));
  if (err.stack) Logger.error(C.red(err.stack));
});

const _mainError = (e: unknown) => {
  const err = asError(e);
  Logger.error(C.red(`flapstat: ${err.message}`));
  if (err.stack && (Logger.isVerbose() || !isFlapError(e))) Logger.error(err.stack);
  process.exit(1);
};

main(process.argv.slice(2)).catch(_mainError);
