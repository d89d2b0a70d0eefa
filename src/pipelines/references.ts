import { ImageContext, TextExcerpt } from "../domain/types.js";
import { stripHighlight } from "../utils/text.js";
import { formatImageCaption, shortSnippet } from "./formatting.js";

export const TEXT_REFERENCE_WIDTH = 160;
export const IMAGE_REFERENCE_WIDTH = 140;
export const IMAGE_REFERENCE_LABEL = "Image: ";

export interface ReferenceSource {
  texts: readonly string[];
  images: readonly ImageContext[];
}

/** Texts first, then image captions while room remains. */
export function buildReferences(context: ReferenceSource, maxRefs = 8): string[] {
  const refs = new ReferenceList(maxRefs);

  for (const text of context.texts) {
    if (refs.isFull()) {
      return refs.values();
    }
    refs.add(shortSnippet(text, TEXT_REFERENCE_WIDTH));
  }

  for (const image of context.images) {
    if (refs.isFull()) {
      break;
    }
    const caption = formatImageCaption(image.caption, IMAGE_REFERENCE_WIDTH);
    if (caption) {
      refs.add(`${IMAGE_REFERENCE_LABEL}${caption}`);
    }
  }

  return refs.values();
}

export function referencesFromExcerpts(
  excerpts: readonly TextExcerpt[],
  maxRefs = 8,
): string[] {
  const refs = new ReferenceList(maxRefs);
  for (const excerpt of excerpts) {
    if (refs.isFull()) {
      break;
    }
    refs.add(stripHighlight(excerpt.text).trim());
  }
  return refs.values();
}

class ReferenceList {
  private readonly seen = new Set<string>();

  private readonly items: string[] = [];

  constructor(private readonly maxRefs: number) {}

  add(value: string): void {
    if (!value || this.seen.has(value) || this.isFull()) {
      return;
    }
    this.seen.add(value);
    this.items.push(value);
  }

  isFull(): boolean {
    return this.items.length >= this.maxRefs;
  }

  values(): string[] {
    return [...this.items];
  }
}
