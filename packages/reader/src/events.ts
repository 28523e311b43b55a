import fs from "node:fs";
import { TextDecoder } from "node:util";
import { SaxesParser } from "saxes";
import { MalformedXmlError, type SourcePosition, type XmlEvent } from "@usfx-tsv/core";

export type UsfxChunks = AsyncIterable<string | Buffer> | Iterable<string | Buffer>;

const BOM = "\uFEFF";

function positionOf(parser: SaxesParser): SourcePosition {
  return { line: parser.line, column: parser.column };
}

function feed(parser: SaxesParser, chunk: string | null): MalformedXmlError | null {
  try {
    if (chunk === null) {
      parser.close();
    } else {
      parser.write(chunk);
    }
    return null;
  } catch (error) {
    return new MalformedXmlError(error instanceof Error ? error.message : String(error), positionOf(parser));
  }
}

function decode(parser: SaxesParser, decoder: TextDecoder, bytes?: Buffer): string | MalformedXmlError {
  try {
    return bytes ? decoder.decode(bytes, { stream: true }) : decoder.decode();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return new MalformedXmlError(`Invalid UTF-8 in input: ${reason}`, positionOf(parser));
  }
}

/**
 * Pulls structural events out of a USFX document one chunk at a time.
 * Events produced before a tokenizer failure are yielded first, then
 * the failure is thrown as a MalformedXmlError.
 */
export async function* readUsfxEvents(chunks: UsfxChunks): AsyncGenerator<XmlEvent, void, undefined> {
  const parser = new SaxesParser();
  const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });
  let queue: XmlEvent[] = [];
  let started = false;

  const position = () => positionOf(parser);
  const pushText = (text: string) => {
    queue.push({ kind: "text", text, position: position() });
  };

  parser.on("opentag", (tag) => {
    queue.push({
      kind: "open",
      name: tag.name,
      attributes: { ...tag.attributes },
      selfClosing: tag.isSelfClosing,
      position: position(),
    });
  });
  parser.on("closetag", (tag) => {
    // self-closing markers were already delivered as a single open event
    if (!tag.isSelfClosing) {
      queue.push({ kind: "close", name: tag.name, position: position() });
    }
  });
  parser.on("text", pushText);
  parser.on("cdata", pushText);

  function* drain(): Generator<XmlEvent, void, undefined> {
    const ready = queue;
    queue = [];
    yield* ready;
  }

  for await (const chunk of chunks) {
    const decoded = typeof chunk === "string" ? chunk : decode(parser, decoder, chunk);
    if (decoded instanceof MalformedXmlError) {
      throw decoded;
    }
    let text = decoded;
    if (!started && text.length > 0) {
      started = true;
      if (text.startsWith(BOM)) {
        text = text.slice(BOM.length);
      }
    }
    const failure = feed(parser, text);
    yield* drain();
    if (failure) {
      throw failure;
    }
  }

  const rest = decode(parser, decoder);
  if (rest instanceof MalformedXmlError) {
    throw rest;
  }
  let failure = rest ? feed(parser, rest) : null;
  if (!failure) {
    failure = feed(parser, null);
  }
  yield* drain();
  if (failure) {
    throw failure;
  }
}

/**
 * Raw bytes, so that invalid UTF-8 reaches the strict decoder in
 * readUsfxEvents instead of being replaced on read.
 */
export function openUsfxFile(filePath: string): AsyncIterable<Buffer> {
  return fs.createReadStream(filePath);
}
