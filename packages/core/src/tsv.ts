import { stripFieldBreaks } from "./text.js";
import type { VerseRecord } from "./types.js";

export const FIELD_SEPARATOR = "\t";
export const RECORD_SEPARATOR = "\n";

export function formatVerseLine(record: VerseRecord): string {
  return [record.book, String(record.chapter), record.verse, record.text].map(stripFieldBreaks).join(FIELD_SEPARATOR);
}

export function* formatVerseLines(records: Iterable<VerseRecord>): Generator<string, void, undefined> {
  for (const record of records) {
    yield `${formatVerseLine(record)}${RECORD_SEPARATOR}`;
  }
}
