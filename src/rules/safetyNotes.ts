// General flags only; nothing here is patient specific.
const FLAG_WORDS: ReadonlyArray<[string, string]> = [
  ["grapefruit", "May interact with certain meds; verify with clinician."],
  ["star fruit", "Neurotoxic risk in kidney disease; generally avoid."],
  ["herbal", "Herbal supplements can accumulate or interact; caution."],
];

export function safetyNotes(question: string): string {
  const q = question.toLowerCase();
  return FLAG_WORDS.filter(([word]) => q.includes(word))
    .map(([word, note]) => `${word}: ${note}`)
    .join("; ");
}
