/**
 * Structured errors.
 *
 * The kind decides what happens next: a fetch_error costs one tracker
 * cycle, every other kind ends the run.
 */

export type FlapErrorKind =
  | "config_error"     // bad flags, unknown channel, no serial port
  | "fetch_error"      // stats source failed or returned something unusable
  | "transport_error"  // display could not be opened or written
  | "layout_error";    // display geometry that nothing can be laid out on

export interface FlapError extends Error {
  kind: FlapErrorKind;
  /** Worth trying again on a later cycle (timeouts, 429, 5xx). */
  retryable: boolean;
  /** HTTP status, when the failure came with one. */
  status?: number;
  /** Request URL with the API key redacted. */
  url?: string;
  cause?: unknown;
}

export interface FlapErrorOptions {
  retryable?: boolean;
  status?: number;
  url?: string;
  cause?: unknown;
}

export function flapError(kind: FlapErrorKind, message: string, opts: FlapErrorOptions = {}): FlapError {
  const err: FlapError = Object.assign(new Error(message), {
    kind,
    retryable: opts.retryable ?? false,
  });
  if (opts.status !== undefined) err.status = opts.status;
  if (opts.url) err.url = opts.url;
  if (opts.cause !== undefined) err.cause = opts.cause;
  return err;
}

/** Whatever was thrown, as an Error. */
export function asError(e: unknown): Error {
  if (e instanceof Error) return e;
  if (e === null || e === undefined) return new Error("Unknown error");
  return new Error(typeof e === "string" ? e : String(e));
}

export function isFlapError(e: unknown): e is FlapError {
  return e instanceof Error && "kind" in e && "retryable" in e;
}

/** Flat record of a FlapError for debug logging. */
export function errorLogFields(e: FlapError): Record<string, unknown> {
  const fields: Record<string, unknown> = {
    kind: e.kind,
    message: e.message,
    retryable: e.retryable,
  };
  if (e.status !== undefined) fields.status = e.status;
  if (e.url) fields.url = e.url;
  if (e.cause !== undefined) {
    const cause = asError(e.cause);
    fields.cause_message = cause.message;
    if (cause.stack) fields.cause_stack = cause.stack;
  }
  if (e.stack) fields.stack = e.stack;
  return fields;
}
