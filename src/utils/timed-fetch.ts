import { asError, flapError } from "../errors.js";

export type TimedFetchInit = RequestInit & { timeoutMs?: number; where?: string };

/** Wrap fetch with timeout and location context for debugging. */
export async function timedFetch(url: string, init: TimedFetchInit = {}): Promise<Response> {
  const { timeoutMs, where, ...rest } = init;
  let timer: ReturnType<typeof setTimeout> | null = null;

  try {
    if (timeoutMs && timeoutMs > 0) {
      const controller = new AbortController();
      rest.signal = controller.signal;
      timer = setTimeout(() => controller.abort(), timeoutMs);
    }
    return await fetch(url, rest);
  } catch (e: unknown) {
    const wrapped = asError(e);
    const isAbort = wrapped.name === "AbortError";
    const tag = isAbort ? "fetch timeout" : "fetch error";
    throw flapError(
      "fetch_error",
      `[${tag}] ${where ?? ""} ${redactKey(url)} -> ${wrapped.name}: ${wrapped.message}`,
      { retryable: true, url: redactKey(url), cause: e },
    );
  } finally {
    if (timer) clearTimeout(timer);
  }
}

/** Strip the API key from a URL before it reaches a log line. */
export function redactKey(url: string): string {
  return url.replace(/([?&]key=)[^&]*/, "$1***");
}
