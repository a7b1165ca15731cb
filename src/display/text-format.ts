/**
 * Text layout for fixed-width character displays.
 *
 * Everything here is pure: the printer supplies the width and the
 * alphabet of the attached device.
 */

export type Alignment = "left" | "right" | "center";

export const DEFAULT_REPLACEMENT = "?";
export const DEFAULT_DELIMITERS = " ,.-_";

const SCI_PREFIX = "E+";
const INTEGER_RE = /^[+-]?\d+$/;

/**
 * Map every character onto the display's alphabet: kept as-is when
 * supported, swapped to the opposite case when only that is supported,
 * otherwise replaced.
 */
export function filterString(
  text: string,
  supported: ReadonlySet<string>,
  replacement = DEFAULT_REPLACEMENT,
): string {
  let out = "";
  for (const c of text) {
    if (supported.has(c)) {
      out += c;
      continue;
    }
    const alt = c === c.toUpperCase() ? c.toLowerCase() : c.toUpperCase();
    out += alt !== c && supported.has(alt) ? alt : replacement;
  }
  return out;
}

/**
 * Pad `text` with spaces to `width`. Text that is already wider is
 * returned unchanged; callers chunk long text first.
 * Centered text puts the odd space on the right.
 */
export function alignText(text: string, alignment: Alignment, width: number): string {
  if (text.length >= width) return text;
  switch (alignment) {
    case "left":
      return text.padEnd(width);
    case "right":
      return text.padStart(width);
    case "center": {
      const left = Math.floor((width - text.length) / 2);
      return " ".repeat(left) + text.padEnd(width - left);
    }
  }
}

/** Decimal digits of an integer value, or null when the value is not one. */
export function integerDigits(value: unknown): string | null {
  if (typeof value === "bigint") return value.toString();
  if (typeof value === "number") return Number.isSafeInteger(value) ? String(value) : null;
  if (typeof value === "string") {
    const trimmed = value.trim();
    return INTEGER_RE.test(trimmed) ? trimmed : null;
  }
  return null;
}

/**
 * Render a number for a `width`-cell display. Integers too long to fit
 * keep their leading digits and gain an `E+<n>` suffix, where n is the
 * count of dropped digits. Needs room for the suffix plus one digit;
 * narrower displays get the plain digits. Anything that is not an
 * integer comes back as its string form.
 */
export function filterNumber(value: string | number | bigint, width: number): string {
  const digits = integerDigits(value);
  if (digits === null) return String(value);

  const places = digits.length;
  if (places <= width || width - (SCI_PREFIX.length + 1) <= 0) return digits;

  // Grows with the exponent's own width until the suffix stops changing
  let overage = places - width + SCI_PREFIX.length + 1;
  for (;;) {
    const needed = places - (width - `${SCI_PREFIX}${overage}`.length);
    if (needed === overage) break;
    overage = needed;
  }

  const suffix = `${SCI_PREFIX}${overage}`;
  const keep = width - suffix.length;
  if (keep < 1) return digits;
  const kept = digits.slice(0, keep);
  if (!/\d/.test(kept)) return digits;
  return kept + suffix;
}

function escapeClass(chars: string): string {
  return chars.replace(/[\\\]^-]/g, "\\$&");
}

/**
 * Break text into pages no wider than `width`, keeping words whole where
 * possible. Words longer than a page are hard-split; neighbouring pieces
 * are then merged back (joined by the first delimiter) pass after pass
 * until no adjacent pair fits together.
 */
export function chunkMessage(
  text: string,
  width: number,
  delimiters = DEFAULT_DELIMITERS,
): string[] {
  if (width <= 0 || text.length <= width) return [text];

  const splitter = delimiters.length > 0 ? new RegExp(`[${escapeClass(delimiters)}]+`) : null;
  const words = (splitter ? text.split(splitter) : [text]).filter((w) => w.length > 0);

  const tokens: string[] = [];
  for (const word of words) {
    for (let i = 0; i < word.length; i += width) {
      tokens.push(word.slice(i, i + width));
    }
  }
  if (tokens.length === 0) return [""];

  const joiner = delimiters.charAt(0);
  let merged = true;
  while (merged) {
    merged = false;
    for (let i = 0; i < tokens.length - 1; i++) {
      const combined = tokens[i] + joiner + tokens[i + 1];
      if (combined.length <= width) {
        tokens.splice(i, 2, combined);
        merged = true;
      }
    }
  }
  return tokens;
}
