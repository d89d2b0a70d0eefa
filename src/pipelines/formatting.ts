import { ELLIPSIS } from "../utils/text.js";

export const BULLET = "•";
export const DISCLAIMER_PHRASE = "not a substitute for medical advice";
export const DISCLAIMER =
  "**Note:** Educational summary only; not a substitute for medical advice.";

const MAX_BULLETS = 8;

const CITATION_MARKER_REGEX = /\[[0-9,\- ]{1,8}\]/g;
const YEAR_REGEX = /\((?:19|20)\d{2}\)/g;
const LEADING_LABEL_REGEX = /^(?:\s*(?:figure|table)\s*\d+[:-]\s*)+/i;
const BULLET_SPLIT_REGEX = /(?<=[.!?;:])\s+|•|(?:^|\s)[-*](?:\s|$)/;
const EDGE_PUNCTUATION_REGEX = /^[\s.;:!?*-]+|[\s.;:!?*-]+$/g;
const CONSULT_REGEX = /\bconsult\s+with\s+(?:your\s+)?healthcare\s+providers?\b.*/gi;
const MEDICAL_ADVICE_REGEX = /\bseek\s+medical\s+advice\b.*/gi;
const DISCLAIMER_SENTENCE_REGEX =
  /(?:\*\*note:\*\*\s*)?(?:educational\s+summary\s+only;\s*)?[^.\n]*not\s+a\s+substitute\s+for\s+medical\s+advice[^.\n]*\.?/gi;
const BULLET_LINE_PREFIXES = ["-", "*", BULLET];

export function sanitize(text: string): string {
  let current = text;
  let next = cleanOnce(current);
  while (next !== current) {
    current = next;
    next = cleanOnce(current);
  }
  return current;
}

export function bulletize(text: string, maxLine = 88): string {
  const clean = sanitize(text);
  const fragments = clean
    .split(BULLET_SPLIT_REGEX)
    .map((part) => part.replace(EDGE_PUNCTUATION_REGEX, ""))
    .filter((part) => part.length > 0);

  const bullets: string[] = [];
  for (const fragment of fragments) {
    bullets.push(fragment.length > maxLine ? firstWrappedLine(fragment, maxLine) : fragment);
    if (bullets.length >= MAX_BULLETS) {
      break;
    }
  }

  if (bullets.length === 0) {
    bullets.push(clean.slice(0, maxLine));
  }
  return bullets.map((bullet) => `${BULLET} ${bullet}`).join("\n");
}

/**
 * Compresses a generated answer into short bullets with a single trailing
 * disclaimer paragraph. Repeated application yields the same text.
 */
export function tighten(answer: string, maxLine = 120): string {
  const stripped = answer
    .replace(CONSULT_REGEX, "")
    .replace(MEDICAL_ADVICE_REGEX, "")
    .replace(DISCLAIMER_SENTENCE_REGEX, "");

  const lines = contentLines(stripped);

  if (lines.length === 0) {
    return DISCLAIMER;
  }

  let shaped: string;
  if (lines.filter(isBulletLine).length < 2) {
    shaped = bulletize(lines.join(" "), maxLine);
  } else {
    shaped = lines
      .map((line) =>
        isBulletLine(line) && line.length > maxLine
          ? `${line.slice(0, maxLine - 1)}${ELLIPSIS}`
          : line,
      )
      .join("\n");
  }

  // Sanitizing inside bulletize can rejoin a disclaimer split by a citation marker.
  const body = contentLines(shaped.replace(DISCLAIMER_SENTENCE_REGEX, "")).join("\n");
  return body ? `${body}\n\n${DISCLAIMER}` : DISCLAIMER;
}

export function shortSnippet(text: string, width = 160): string {
  const clean = sanitize(text);
  return clean.length > width ? `${clean.slice(0, width - 1)}${ELLIPSIS}` : clean;
}

export function formatImageCaption(caption: string, width = 140): string {
  return shortSnippet(caption, width);
}

export function countDisclaimers(text: string): number {
  return text.toLowerCase().split(DISCLAIMER_PHRASE).length - 1;
}

function cleanOnce(text: string): string {
  return normalizeDashes(stripReferenceArtifacts(collapseWhitespace(text)));
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function stripReferenceArtifacts(text: string): string {
  // Nested markers like "[[1]2]" unwrap one layer per replacement.
  let withoutMarkers = text;
  let previous: string;
  do {
    previous = withoutMarkers;
    withoutMarkers = previous.replace(CITATION_MARKER_REGEX, "");
  } while (withoutMarkers !== previous);
  return withoutMarkers
    .replace(YEAR_REGEX, "")
    .replace(LEADING_LABEL_REGEX, "")
    .trim();
}

// Spaced or dangling dashes get one space on each side; "low-sodium" stays intact.
function normalizeDashes(text: string): string {
  return text
    .replace(/\s*–\s*/g, " – ")
    .replace(/\s*—\s*/g, " — ")
    .replace(/\s+-\s*|\s*-\s+/g, " - ")
    .replace(/\s{2,}/g, " ")
    .trim();
}

/** First line of a greedy word wrap; words longer than the width are split. */
export function firstWrappedLine(text: string, width: number): string {
  const words = text.split(/\s+/).filter((word) => word.length > 0);
  let line = "";

  for (const word of words) {
    const separator = line ? " " : "";
    if (line.length + separator.length + word.length <= width) {
      line += separator + word;
      continue;
    }
    if (word.length > width) {
      const room = width - line.length - separator.length;
      if (room > 0) {
        line += separator + word.slice(0, room);
      }
    }
    break;
  }

  return line;
}

function isBulletLine(line: string): boolean {
  return BULLET_LINE_PREFIXES.some((prefix) => line.startsWith(prefix));
}

function contentLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !isBareBulletGlyph(line));
}

function isBareBulletGlyph(line: string): boolean {
  return /^[-*•]+$/.test(line);
}
