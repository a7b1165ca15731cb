import { filterString } from "./text-format.js";

export type Labels = string | readonly string[] | null | undefined;

/** Normalize a label argument to a longest-first list, dropping empties. */
export function labelList(labels: Labels): string[] {
  if (labels === null || labels === undefined) return [];
  const list = typeof labels === "string" ? [labels] : [...labels];
  return list.filter((l) => l.length > 0).sort((a, b) => b.length - a.length);
}

/**
 * Pick the label to show with `value` on a `width`-cell display.
 *
 * Prefers the longest label that fits on one line together with the
 * value (`"<label> <value>"`), then the longest that fits alone, then the
 * shortest candidate even though it overflows.
 */
export function selectPrefix(labels: Labels, value: string, width: number): string | null {
  const sorted = labelList(labels);
  if (sorted.length === 0) return null;

  let longestSingle: string | null = null;
  let longestCombined: string | null = null;
  for (const label of sorted) {
    if (longestSingle === null && label.length <= width) longestSingle = label;
    if (longestCombined === null && `${label} ${value}`.length <= width) longestCombined = label;
  }

  return longestCombined ?? longestSingle ?? sorted[sorted.length - 1];
}

/**
 * Whether the display already shows one of the labels, compared after
 * filtering each label to the display's alphabet.
 */
export function isAnyLabelCurrentlyShown(
  labels: Labels,
  currentText: string,
  supported: ReadonlySet<string>,
  replacement?: string,
): boolean {
  return labelList(labels).some((label) =>
    currentText.includes(filterString(label, supported, replacement)),
  );
}
