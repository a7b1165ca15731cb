import { Logger, C } from "../logger.js";
import { flapError } from "../errors.js";
import { systemClock, type Clock } from "../utils/clock.js";
import {
  alignText,
  chunkMessage,
  filterNumber,
  filterString,
  DEFAULT_DELIMITERS,
  DEFAULT_REPLACEMENT,
  type Alignment,
} from "./text-format.js";
import { isAnyLabelCurrentlyShown, selectPrefix, type Labels } from "./stat-prefix.js";
import type { DisplayTransport } from "./transport.js";

/** Dwell for the label flashed on its own before a label + value line. */
export const LABEL_FLASH_DWELL = 0.75;
export const DEFAULT_DWELL = 2.0;

export type Printable = string | number | bigint;

export interface PrintStatOptions {
  alignment?: Alignment;
  dwell?: number;
  /** Show the label by itself before the value. */
  twoStep?: boolean;
}

export interface DisplayPrinterOptions {
  clock?: Clock;
  replacement?: string;
  delimiters?: string;
}

function invertAlignment(alignment: Alignment): Alignment {
  if (alignment === "left") return "right";
  if (alignment === "right") return "left";
  return alignment;
}

/**
 * Lays text out for the attached display and pushes it page by page.
 *
 * The printer owns the display state: the text last laid out for the
 * device. Writes are skipped when the device already shows the same
 * text, and never issued while the transport is detached.
 */
export class DisplayPrinter {
  private text = "";
  private readonly clock: Clock;
  private readonly replacement: string;
  private readonly delimiters: string;

  constructor(private readonly transport: DisplayTransport, opts: DisplayPrinterOptions = {}) {
    this.clock = opts.clock ?? systemClock;
    this.replacement = opts.replacement ?? DEFAULT_REPLACEMENT;
    this.delimiters = opts.delimiters ?? DEFAULT_DELIMITERS;
  }

  /** Number of character cells, queried from the transport each time. */
  get width(): number {
    const width = this.transport.width();
    if (!Number.isInteger(width) || width < 1) {
      throw flapError("layout_error", `display reported an unusable width: ${width}`);
    }
    return width;
  }

  get supportedCharacters(): ReadonlySet<string> {
    return this.transport.supportedCharacters();
  }

  /** What the display shows: device text when attached, the preview otherwise. */
  currentText(): string {
    return this.transport.isAttached() ? this.transport.readCurrentText() : this.text;
  }

  async setText(text: string, alignment: Alignment = "left"): Promise<void> {
    const line = alignText(filterString(text, this.supportedCharacters, this.replacement), alignment, this.width);
    Logger.info(C.gray(`setting flaps to '${line}'`));

    if (this.transport.isAttached() && this.transport.readCurrentText() !== line) {
      await this.transport.write(line);
    }
    this.text = line;
  }

  /**
   * Show `content`, one page at a time. Integers are shortened to fit;
   * text is chunked at word breaks. Waits `dwell` seconds after each page.
   */
  async print(content: Printable = "", alignment: Alignment = "left", dwell = DEFAULT_DWELL): Promise<void> {
    const pages = typeof content === "string"
      ? chunkMessage(content, this.width, this.delimiters)
      : [filterNumber(content, this.width)];

    for (const page of pages) {
      await this.setText(page, alignment);
      if (dwell > 0) await this.clock.sleep(dwell);
    }
  }

  async clear(dwell = 0): Promise<void> {
    await this.print("", "left", dwell);
  }

  /**
   * Show a statistic with the best-fitting label. When label and value
   * share a line, the value hugs the edge given by `alignment` and the
   * label the other; otherwise they get a page each.
   */
  async printStat(labels: Labels, value: Printable, opts: PrintStatOptions = {}): Promise<void> {
    const alignment = opts.alignment ?? "right";
    const dwell = opts.dwell ?? DEFAULT_DWELL;
    const twoStep = opts.twoStep ?? true;

    const width = this.width;
    const valueText = filterNumber(value, width);
    const label = selectPrefix(labels, valueText, width);

    if (label === null) {
      await this.print(valueText, alignment, dwell);
      return;
    }

    if (`${label} ${valueText}`.length <= width) {
      if (twoStep && !this.isShowingLabel(labels)) {
        await this.print(label, invertAlignment(alignment), LABEL_FLASH_DWELL);
      }

      let combined: string;
      if (alignment === "left") combined = valueText + label.padStart(width - valueText.length);
      else if (alignment === "right") combined = label.padEnd(width - valueText.length) + valueText;
      else combined = `${valueText} ${label}`;

      await this.print(combined, alignment, dwell);
      return;
    }

    if (twoStep) await this.print(label, invertAlignment(alignment), dwell);
    await this.print(valueText, alignment, dwell);
  }

  private isShowingLabel(labels: Labels): boolean {
    return isAnyLabelCurrentlyShown(labels, this.currentText(), this.supportedCharacters, this.replacement);
  }
}
