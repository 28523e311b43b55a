import { describe, expect, it } from "vitest";
import { formatVerseLine, formatVerseLines } from "./tsv.js";

describe("tsv output", () => {
  it("writes four tab-separated fields", () => {
    expect(formatVerseLine({ book: "1JN", chapter: 4, verse: "8", text: "God is love." })).toBe("1JN\t4\t8\tGod is love.");
  });

  it("never lets a field break the line format", () => {
    const line = formatVerseLine({ book: "GEN", chapter: 1, verse: "1", text: "a\tb\r\nc" });
    expect(line).toBe("GEN\t1\t1\ta b  c");
    expect(line.split("\t")).toHaveLength(4);
  });

  it("terminates every record with a newline and writes no header", () => {
    const lines = [
      ...formatVerseLines([
        { book: "JHN", chapter: 11, verse: "35", text: "Jesus wept." },
        { book: "JHN", chapter: 11, verse: "36", text: "" },
      ]),
    ];
    expect(lines).toEqual(["JHN\t11\t35\tJesus wept.\n", "JHN\t11\t36\t\n"]);
  });
});
