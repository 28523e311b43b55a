import { fileURLToPath } from "node:url";
import { Writable } from "node:stream";
import { describe, expect, it } from "vitest";
import { InvalidNumeralError, MalformedXmlError, MissingContextError, RECORD_SEPARATOR } from "@usfx-tsv/core";
import { readUsfxEvents } from "@usfx-tsv/reader";
import { loadTagTable } from "./config";
import { convertUsfxToTsv } from "./convert";

const table = loadTagTable(fileURLToPath(new URL("../../..", import.meta.url)));

const sample = `<?xml version="1.0" encoding="utf-8"?>
<usfx>
<book id="GEN">
<id id="GEN">Sample text</id>
<h>Genesis</h>
<toc level="1">The First Book of Moses</toc>
<c id="1"/>
<s>The Creation</s>
<p><v id="1" bcv="GEN.1.1"/>In the beginning God created the heavens and the earth.<f caller="+"><fr>1:1 </fr><ft>Or "sky"</ft></f><ve/>
<v id="2"/>The earth was <add>without</add> form,
and void.<ve/></p>
<q><v id="3-4"/>God said, <wj>Let there be light</wj>.<x caller="-"><xo>1:3 </xo><xt>2Co 4:6</xt></x></q><q>And there was light.<ve/></q>
</book>
<book id="EXO">
<c id="1"/>
<p><v id="1"/>These are the names.<ve/></p>
</book>
</usfx>
`;

const expected = [
  "GEN\t1\t1\tIn the beginning God created the heavens and the earth.\n",
  "GEN\t1\t2\tThe earth was without form, and void.\n",
  "GEN\t1\t3-4\tGod said, Let there be light. And there was light.\n",
  "EXO\t1\t1\tThese are the names.\n",
].join("");

function sink(highWaterMark?: number): { output: Writable; text: () => string } {
  const chunks: string[] = [];
  const output = new Writable({
    highWaterMark,
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      setImmediate(callback);
    },
  });
  return { output, text: () => chunks.join("") };
}

describe("convertUsfxToTsv", () => {
  it("writes one line per verse and reports a summary", async () => {
    const { output, text } = sink();
    const summary = await convertUsfxToTsv({ events: readUsfxEvents([sample]), output, table });
    expect(text()).toBe(expected);
    expect(text().split(RECORD_SEPARATOR)).toHaveLength(summary.verses + 1);
    expect(summary).toEqual({ verses: 4, bridges: 1, books: ["GEN", "EXO"] });
  });

  it("produces byte-identical output on a second run", async () => {
    const first = sink();
    const second = sink();
    await convertUsfxToTsv({ events: readUsfxEvents([sample]), output: first.output, table });
    await convertUsfxToTsv({ events: readUsfxEvents([sample]), output: second.output, table });
    expect(second.text()).toBe(first.text());
  });

  it("waits for a slow output to drain", async () => {
    const { output, text } = sink(1);
    const summary = await convertUsfxToTsv({ events: readUsfxEvents([sample]), output, table });
    expect(summary.verses).toBe(4);
    expect(text()).toBe(expected);
  });

  it("fails before writing anything when a chapter has no book", async () => {
    const { output, text } = sink();
    await expect(
      convertUsfxToTsv({ events: readUsfxEvents(['<usfx><c id="1"/><v id="1"/>orphan<ve/></usfx>']), output, table }),
    ).rejects.toBeInstanceOf(MissingContextError);
    expect(text()).toBe("");
  });

  it("keeps the lines written before a bad verse number", async () => {
    const { output, text } = sink();
    const xml = '<usfx><book id="GEN"><c id="1"/><v id="1"/>kept<ve/><v id="two"/>lost</book></usfx>';
    await expect(convertUsfxToTsv({ events: readUsfxEvents([xml]), output, table })).rejects.toBeInstanceOf(InvalidNumeralError);
    expect(text()).toBe("GEN\t1\t1\tkept\n");
  });

  it("reports a truncated document as malformed XML", async () => {
    const { output, text } = sink();
    const xml = '<usfx><book id="GEN"><c id="1"/><v id="1"/>kept<ve/>';
    await expect(convertUsfxToTsv({ events: readUsfxEvents([xml]), output, table })).rejects.toBeInstanceOf(MalformedXmlError);
    expect(text()).toBe("GEN\t1\t1\tkept\n");
  });
});
