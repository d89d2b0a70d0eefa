const EXPANSION_TRIGGER_REGEX =
  /\b(?:compar\w*|versus|vs|evidence|systematic|meta-analys\w*|mechanism\w*)\b/i;

export interface RetrievalDepth {
  kInitial: number;
  kExpand: number;
}

export function needsExpandedRetrieval(query: string): boolean {
  return EXPANSION_TRIGGER_REGEX.test(query);
}

export function planK(query: string, depth: RetrievalDepth): number {
  return needsExpandedRetrieval(query) ? depth.kExpand : depth.kInitial;
}
