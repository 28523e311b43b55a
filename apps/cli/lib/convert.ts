import { once } from "node:events";
import type { Writable } from "node:stream";
import {
  RECORD_SEPARATOR,
  extractVersesAsync,
  formatVerseLine,
  isVerseBridge,
  type TagTable,
  type XmlEvent,
} from "@usfx-tsv/core";

export interface ConversionSummary {
  verses: number;
  bridges: number;
  books: string[];
}

export interface ConvertOptions {
  events: AsyncIterable<XmlEvent>;
  output: Writable;
  table: TagTable;
}

async function writeLine(output: Writable, line: string): Promise<void> {
  if (!output.write(line)) {
    await once(output, "drain");
  }
}

/**
 * Streams every verse as one TSV line. Lines written before a failure
 * stay in the output; discarding a truncated file is up to the caller.
 */
export async function convertUsfxToTsv({ events, output, table }: ConvertOptions): Promise<ConversionSummary> {
  const summary: ConversionSummary = { verses: 0, bridges: 0, books: [] };

  for await (const record of extractVersesAsync(events, table)) {
    await writeLine(output, `${formatVerseLine(record)}${RECORD_SEPARATOR}`);
    summary.verses += 1;
    if (isVerseBridge(record.verse)) {
      summary.bridges += 1;
    }
    if (summary.books.at(-1) !== record.book) {
      summary.books.push(record.book);
    }
  }

  return summary;
}
