/**
 * Display transport contract.
 *
 * A transport is the only thing that talks to hardware. The printer asks
 * it for the module count and alphabet, and hands it fully laid-out,
 * fixed-width text.
 */

/** The 40-flap alphabet the stock controller firmware ships with. */
export const DEFAULT_ALPHABET = " abcdefghijklmnopqrstuvwxyz0123456789.,'";

/** Width reported when no display is attached, so layout still has a size. */
export const FALLBACK_WIDTH = 8;

export const DEFAULT_BAUD_RATE = 38400;

export interface DisplayTransport {
  /** True while a physical display is connected and writable. */
  isAttached(): boolean;
  /** Number of character modules; FALLBACK_WIDTH when detached. */
  width(): number;
  supportedCharacters(): ReadonlySet<string>;
  write(text: string): Promise<void>;
  /** Text the flaps show; a transport that never wrote anything returns "". */
  readCurrentText(): string;
  open(): Promise<void>;
  /** Safe to call at any time, including after a failed open. */
  close(): Promise<void>;
}

export function alphabetSet(alphabet: string): ReadonlySet<string> {
  return new Set(alphabet);
}

/**
 * Stand-in used with --demo: never attached, never does I/O. The printer
 * does not write to a detached transport and keeps the preview text
 * itself, so there is nothing to read back here.
 */
export class DetachedTransport implements DisplayTransport {
  private readonly characters: ReadonlySet<string>;
  private readonly fallbackWidth: number;

  constructor(opts: { alphabet?: string; width?: number } = {}) {
    this.characters = alphabetSet(opts.alphabet ?? DEFAULT_ALPHABET);
    this.fallbackWidth = opts.width ?? FALLBACK_WIDTH;
  }

  isAttached(): boolean { return false; }
  width(): number { return this.fallbackWidth; }
  supportedCharacters(): ReadonlySet<string> { return this.characters; }
  async write(_text: string): Promise<void> {}
  readCurrentText(): string { return ""; }
  async open(): Promise<void> {}
  async close(): Promise<void> {}
}

/**
 * Open the transport, run `fn`, and close the transport on every exit
 * path, including an open that fails part-way.
 */
export async function withTransport<T>(
  transport: DisplayTransport,
  fn: (transport: DisplayTransport) => Promise<T>,
): Promise<T> {
  try {
    await transport.open();
    return await fn(transport);
  } finally {
    await transport.close();
  }
}
