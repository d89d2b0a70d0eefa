import { GenerationContext } from "./types.js";

export const ANSWER_SYSTEM_PROMPT = [
  "You are a careful evidence assistant for a fixed document corpus.",
  "Use ONLY the supplied context. If something is missing, say what is missing briefly.",
  "Answer in 4-6 concise bullets, each at most 18 words.",
  "Do not tell the reader to consult a healthcare provider.",
].join(" ");

export function buildAnswerPrompt(question: string, context: GenerationContext): string {
  const contextBlock = context.texts.length > 0 ? context.texts.join("\n\n") : "(no text context)";
  return `Context:\n${contextBlock}\n\nQuestion:\n${question}`;
}
