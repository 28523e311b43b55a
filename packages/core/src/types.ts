export type VerseLabel = `${number}` | `${number}-${number}`;

export interface VerseRecord {
  book: string;
  chapter: number;
  verse: VerseLabel;
  text: string;
}

export interface SourcePosition {
  line: number;
  column: number;
}

export type XmlEvent =
  | {
      kind: "open";
      name: string;
      attributes: Record<string, string>;
      selfClosing: boolean;
      position?: SourcePosition;
    }
  | {
      kind: "close";
      name: string;
      position?: SourcePosition;
    }
  | {
      kind: "text";
      text: string;
      position?: SourcePosition;
    };

export type StructuralRole = "book" | "chapter" | "verse" | "verseEnd";

export type TagKind =
  | { type: "Structural"; role: StructuralRole; attribute: string }
  | { type: "Annotation" }
  | { type: "ContentBearing"; block: boolean };

export interface TagTable {
  tags: ReadonlyMap<string, TagKind>;
  unknown: TagKind;
}

export type ExtractorState = "Idle" | "InBook" | "InChapter" | "InVerse";

export interface PendingVerse {
  book: string;
  chapter: number;
  verse: VerseLabel;
  text: string;
}

export interface ParseContext {
  state: ExtractorState;
  book: string | null;
  chapter: number | null;
  pending: PendingVerse | null;
  skipDepth: number;
}
