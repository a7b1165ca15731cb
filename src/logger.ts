/** ANSI colour wrappers for terminal output. */
export const C = {
  bold: (s: string) => `\x1b[1m${s}\x1b[0m`,
  red: (s: string) => `\x1b[31m${s}\x1b[0m`,
  yellow: (s: string) => `\x1b[33m${s}\x1b[0m`,
  gray: (s: string) => `\x1b[90m${s}\x1b[0m`,
};

export class Logger {
  private static _verbose = false;

  static setVerbose(v: boolean) { Logger._verbose = v; }
  static isVerbose() { return Logger._verbose; }

  static info(...args: unknown[]) { console.log(...args); }
  static warn(...args: unknown[]) { console.warn(...args); }
  static error(...args: unknown[]) { console.error(...args); }

  /** Printed only with --verbose and FLAPSTAT_LOG_LEVEL=DEBUG. */
  static debug(...args: unknown[]) {
    if (!Logger._verbose) return;
    if ((process.env.FLAPSTAT_LOG_LEVEL ?? "").toUpperCase() !== "DEBUG") return;
    console.log(...args);
  }
}
