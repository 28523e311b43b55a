import { openUsfxFile, readUsfxEvents } from "@usfx-tsv/reader";
import { getSourcePath, loadTagTable } from "../lib/config";
import { convertUsfxToTsv } from "../lib/convert";

async function main() {
  const sourcePath = getSourcePath();
  const summary = await convertUsfxToTsv({
    events: readUsfxEvents(openUsfxFile(sourcePath)),
    output: process.stdout,
    table: loadTagTable(),
  });
  console.error(`Converted ${summary.verses} verses (${summary.bridges} bridges) from ${summary.books.length} books in ${sourcePath}`);
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
