import { MissingContextError } from "./errors.js";
import { classifyTag } from "./tag-table.js";
import { collapseWhitespace, normalizeVerseText } from "./text.js";
import type { ParseContext, SourcePosition, TagKind, TagTable, VerseRecord, XmlEvent } from "./types.js";
import { parseChapterNumber, parseVerseLabel } from "./verse-label.js";

type StructuralKind = Extract<TagKind, { type: "Structural" }>;

export function createParseContext(): ParseContext {
  return {
    state: "Idle",
    book: null,
    chapter: null,
    pending: null,
    skipDepth: 0,
  };
}

/**
 * Emits the pending verse, if any. The caller decides which state to
 * move to afterwards.
 */
function flush(ctx: ParseContext): VerseRecord | null {
  const pending = ctx.pending;
  if (!pending) {
    return null;
  }
  ctx.pending = null;
  return {
    book: pending.book,
    chapter: pending.chapter,
    verse: pending.verse,
    text: normalizeVerseText(pending.text),
  };
}

function appendText(ctx: ParseContext, text: string): void {
  if (ctx.state === "InVerse" && ctx.pending) {
    ctx.pending.text += collapseWhitespace(text);
  }
}

function openStructural(
  ctx: ParseContext,
  name: string,
  kind: StructuralKind,
  attributes: Record<string, string>,
  position?: SourcePosition,
): VerseRecord | null {
  switch (kind.role) {
    case "book": {
      const code = (attributes[kind.attribute] ?? "").trim();
      if (!code) {
        throw new MissingContextError(`Book marker <${name}> has no ${kind.attribute} attribute`, position);
      }
      const flushed = flush(ctx);
      ctx.book = code;
      ctx.chapter = null;
      ctx.state = "InBook";
      return flushed;
    }
    case "chapter": {
      if (ctx.book === null) {
        throw new MissingContextError(`Chapter marker <${name}> appears outside any book`, position);
      }
      const chapter = parseChapterNumber(attributes[kind.attribute], name, position);
      const flushed = flush(ctx);
      ctx.chapter = chapter;
      ctx.state = "InChapter";
      return flushed;
    }
    case "verse": {
      if (ctx.book === null || ctx.chapter === null) {
        throw new MissingContextError(`Verse marker <${name}> appears outside any chapter`, position);
      }
      const verse = parseVerseLabel(attributes[kind.attribute], name, position);
      const flushed = flush(ctx);
      ctx.pending = { book: ctx.book, chapter: ctx.chapter, verse, text: "" };
      ctx.state = "InVerse";
      return flushed;
    }
    case "verseEnd": {
      const flushed = flush(ctx);
      if (ctx.state === "InVerse") {
        ctx.state = "InChapter";
      }
      return flushed;
    }
  }
}

function closeStructural(ctx: ParseContext, kind: StructuralKind): VerseRecord | null {
  const flushed = flush(ctx);

  switch (kind.role) {
    case "book":
      ctx.book = null;
      ctx.chapter = null;
      ctx.state = "Idle";
      break;
    case "chapter":
      ctx.chapter = null;
      ctx.state = ctx.book === null ? "Idle" : "InBook";
      break;
    case "verse":
    case "verseEnd":
      if (ctx.state === "InVerse") {
        ctx.state = "InChapter";
      }
      break;
  }

  return flushed;
}

/**
 * Folds one event into the context. Returns the verse closed by this
 * event, or null when the event did not complete one.
 */
export function applyEvent(ctx: ParseContext, event: XmlEvent, table: TagTable): VerseRecord | null {
  if (ctx.skipDepth > 0) {
    if (event.kind === "open" && !event.selfClosing) {
      ctx.skipDepth += 1;
    } else if (event.kind === "close") {
      ctx.skipDepth -= 1;
    }
    return null;
  }

  if (event.kind === "text") {
    appendText(ctx, event.text);
    return null;
  }

  const kind = classifyTag(table, event.name);

  if (event.kind === "open") {
    switch (kind.type) {
      case "Structural":
        return openStructural(ctx, event.name, kind, event.attributes, event.position);
      case "Annotation":
        if (!event.selfClosing) {
          ctx.skipDepth = 1;
        }
        return null;
      case "ContentBearing":
        if (kind.block) {
          appendText(ctx, " ");
        }
        return null;
    }
  }

  switch (kind.type) {
    case "Structural":
      return closeStructural(ctx, kind);
    case "ContentBearing":
      if (kind.block) {
        appendText(ctx, " ");
      }
      return null;
    case "Annotation":
      return null;
  }
}

export function finishDocument(ctx: ParseContext): VerseRecord | null {
  const flushed = flush(ctx);
  ctx.state = ctx.chapter !== null ? "InChapter" : ctx.book !== null ? "InBook" : "Idle";
  return flushed;
}

/**
 * Lazily yields one record per verse marker, in document order. The
 * generator throws at the first structural error; records already
 * yielded stay with the caller.
 */
export function* extractVerses(events: Iterable<XmlEvent>, table: TagTable): Generator<VerseRecord, void, undefined> {
  const ctx = createParseContext();
  for (const event of events) {
    const record = applyEvent(ctx, event, table);
    if (record) {
      yield record;
    }
  }
  const last = finishDocument(ctx);
  if (last) {
    yield last;
  }
}

export async function* extractVersesAsync(
  events: AsyncIterable<XmlEvent>,
  table: TagTable,
): AsyncGenerator<VerseRecord, void, undefined> {
  const ctx = createParseContext();
  for await (const event of events) {
    const record = applyEvent(ctx, event, table);
    if (record) {
      yield record;
    }
  }
  const last = finishDocument(ctx);
  if (last) {
    yield last;
  }
}
