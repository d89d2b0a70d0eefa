import { countLetters } from "../utils/text.js";

export type GuardReason = "too_short" | "gibberish" | "banned" | "injection";

export type GuardResult =
  | { ok: true }
  | { ok: false; reason: GuardReason; message: string };

const MIN_LENGTH = 3;
const MIN_LETTERS = 3;

const BANNED_PATTERNS = [/\bkill\b/i, /\bbomb\b/i, /\bhate\b/i];

const INJECTION_PATTERNS = [
  /ignore (?:all|previous) instructions/i,
  /act as/i,
  /system prompt/i,
];

const MESSAGES: Record<GuardReason, string> = {
  too_short: "Please enter a meaningful question.",
  gibberish: "Query looks like gibberish. Try rephrasing with more detail.",
  banned: "Your query includes disallowed content. Please rephrase academically.",
  injection:
    "I can't change my safety rules. Ask about the documents in the corpus instead.",
};

export function validateQuery(question: string): GuardResult {
  const q = question.trim();

  if (q.length < MIN_LENGTH) {
    return reject("too_short");
  }
  if (countLetters(q) < MIN_LETTERS) {
    return reject("gibberish");
  }
  if (BANNED_PATTERNS.some((pattern) => pattern.test(q))) {
    return reject("banned");
  }
  if (INJECTION_PATTERNS.some((pattern) => pattern.test(q))) {
    return reject("injection");
  }
  return { ok: true };
}

function reject(reason: GuardReason): GuardResult {
  return { ok: false, reason, message: MESSAGES[reason] };
}
