export const WHITESPACE_RUN_RE = /\s+/g;
export const FIELD_BREAK_RE = /[\t\r\n]/g;

export function collapseWhitespace(text: string): string {
  return text.replace(WHITESPACE_RUN_RE, " ");
}

export function normalizeVerseText(text: string): string {
  return collapseWhitespace(text).trim();
}

export function stripFieldBreaks(value: string): string {
  return value.replace(FIELD_BREAK_RE, " ");
}
