const HIGHLIGHT_TAG_REGEX = /<\/?mark>/g;
const REGEX_SPECIALS = /[.*+?^${}()|[\]\\]/g;
const LETTER_REGEX = /\p{L}/gu;

export const HIGHLIGHT_OPEN = "<mark>";
export const HIGHLIGHT_CLOSE = "</mark>";
export const ELLIPSIS = "…";

export function escapeRegExp(value: string): string {
  return value.replace(REGEX_SPECIALS, "\\$&");
}

export function stripHighlight(text: string): string {
  return text.replace(HIGHLIGHT_TAG_REGEX, "");
}

export function countLetters(text: string): number {
  return text.match(LETTER_REGEX)?.length ?? 0;
}

export function dedupe(values: readonly string[]): string[] {
  return [...new Set(values)];
}
