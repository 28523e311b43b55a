import { InvalidNumeralError } from "./errors.js";
import type { SourcePosition, VerseLabel } from "./types.js";

const NUMBER_PATTERN = /^\d+$/;
const BRIDGE_PATTERN = /^(\d+)-(\d+)$/;

function positiveInt(raw: string): number | null {
  if (!NUMBER_PATTERN.test(raw)) {
    return null;
  }
  const value = Number.parseInt(raw, 10);
  return Number.isSafeInteger(value) && value >= 1 ? value : null;
}

export function parseChapterNumber(raw: string | undefined, tag: string, position?: SourcePosition): number {
  const value = positiveInt((raw ?? "").trim());
  if (value === null) {
    throw new InvalidNumeralError(tag, raw ?? "", position);
  }
  return value;
}

/**
 * Bridges such as "6-7" stay a single label; the source does not mark
 * where one printed verse ends inside them.
 */
export function parseVerseLabel(raw: string | undefined, tag: string, position?: SourcePosition): VerseLabel {
  const trimmed = (raw ?? "").trim();
  const single = positiveInt(trimmed);
  if (single !== null) {
    return `${single}`;
  }

  const bridge = BRIDGE_PATTERN.exec(trimmed);
  const start = bridge ? positiveInt(bridge[1] ?? "") : null;
  const end = bridge ? positiveInt(bridge[2] ?? "") : null;
  if (start === null || end === null || end <= start) {
    throw new InvalidNumeralError(tag, raw ?? "", position);
  }
  return `${start}-${end}`;
}

export function isVerseBridge(label: VerseLabel): boolean {
  return label.includes("-");
}
