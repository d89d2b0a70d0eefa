import { ImageHit, RankedHit, TextExcerpt } from "../domain/types.js";
import {
  ELLIPSIS,
  HIGHLIGHT_CLOSE,
  HIGHLIGHT_OPEN,
  dedupe,
  escapeRegExp,
} from "../utils/text.js";

const TERM_REGEX = /[\p{L}\p{N}]{3,}/gu;
const EXCERPT_PAD = 160;
const PLACEHOLDER_PAGE = "N/A";

export function extractQueryTerms(query: string): string[] {
  const words = query.toLowerCase().match(TERM_REGEX) ?? [];
  return dedupe(words);
}

/**
 * Scores every candidate by total term occurrences and returns the non-zero
 * ones ordered by score, then by each candidate's own first-match offset.
 */
export function rankCandidates(
  terms: readonly string[],
  candidates: readonly string[],
): RankedHit[] {
  if (terms.length === 0) {
    return [];
  }

  const matchers = terms.map((term) => new RegExp(escapeRegExp(term), "giu"));
  const scored: RankedHit[] = [];

  candidates.forEach((raw, index) => {
    const text = raw.trim();
    if (!text) {
      return;
    }

    let score = 0;
    let firstMatchOffset = Number.POSITIVE_INFINITY;
    for (const matcher of matchers) {
      for (const match of text.matchAll(matcher)) {
        score += 1;
        firstMatchOffset = Math.min(firstMatchOffset, match.index ?? 0);
      }
    }

    if (score > 0) {
      scored.push({ score, index, text, firstMatchOffset });
    }
  });

  return scored.sort(
    (a, b) => b.score - a.score || a.firstMatchOffset - b.firstMatchOffset,
  );
}

export function highlightTerms(text: string, terms: readonly string[]): string {
  if (terms.length === 0) {
    return text;
  }
  // Longest first so a term never splits a longer one it is part of.
  const alternation = [...terms]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join("|");
  return text.replace(
    new RegExp(alternation, "giu"),
    (match) => `${HIGHLIGHT_OPEN}${match}${HIGHLIGHT_CLOSE}`,
  );
}

export function excerptAround(text: string, offset: number, pad = EXCERPT_PAD): string {
  const start = alignToCodePoint(text, Math.max(0, offset - pad));
  const end = alignToCodePoint(text, Math.min(text.length, offset + pad + 1));
  const prefix = start > 0 ? ELLIPSIS : "";
  const suffix = end < text.length ? ELLIPSIS : "";
  return `${prefix}${text.slice(start, end).trim()}${suffix}`;
}

// Steps back off the low half of a surrogate pair so slicing never splits it.
function alignToCodePoint(text: string, index: number): number {
  if (index <= 0 || index >= text.length) {
    return index;
  }
  const code = text.charCodeAt(index);
  return code >= 0xdc00 && code <= 0xdfff ? index - 1 : index;
}

export function buildKeywordExcerpts(
  query: string,
  pool: readonly string[],
  k = 5,
): TextExcerpt[] {
  const terms = extractQueryTerms(query);
  return rankCandidates(terms, pool)
    .slice(0, k)
    .map((hit) => ({
      text: highlightTerms(excerptAround(hit.text, hit.firstMatchOffset), terms),
      page_number: PLACEHOLDER_PAGE,
    }));
}

/**
 * Ranks images by their captions. Unlike the text variant this always shows
 * something: with no keyword hit the first k images are returned in pool order.
 */
export function buildKeywordImageHits(
  query: string,
  images: readonly string[],
  captions: readonly string[],
  k = 4,
): ImageHit[] {
  const terms = extractQueryTerms(query);
  const size = Math.min(images.length, captions.length);
  const pairedCaptions = captions.slice(0, size);

  const ranked = rankCandidates(terms, pairedCaptions);
  const picks =
    ranked.length > 0
      ? ranked.slice(0, k).map((hit) => hit.index)
      : Array.from({ length: Math.min(k, size) }, (_, index) => index);

  return picks.map((index) => ({
    data: images[index],
    summary: highlightTerms(pairedCaptions[index].trim(), terms),
  }));
}
