import { RetrievalContext } from "../domain/types.js";
import { needsExpandedRetrieval } from "../retrieval/queryPlanner.js";
import { stripHighlight } from "../utils/text.js";
import { sanitize } from "./formatting.js";

export const NO_CONTEXT_ANSWER =
  "No relevant context was found in the indexed corpus. Try a more specific question.";

/**
 * Deterministic answer used when no generator is configured or the generator
 * fails: the top context passages, one bullet each.
 */
export function buildContextDigest(question: string, context: RetrievalContext): string {
  const passages = context.texts
    .map((text) => sanitize(stripHighlight(text)))
    .filter((text) => text.length > 0);

  if (passages.length === 0) {
    return NO_CONTEXT_ANSWER;
  }

  const lineLimit = needsExpandedRetrieval(question) ? 6 : 3;
  return passages
    .slice(0, lineLimit)
    .map((passage) => `- ${summarizePassage(passage)}`)
    .join("\n");
}

function summarizePassage(text: string): string {
  if (text.length <= 180) {
    return text;
  }
  return `${text.slice(0, 177)}...`;
}
