export type Modality = "text" | "table" | "image";

export interface TextContent {
  kind: "text";
  text: string;
}

export interface TableContent {
  kind: "table";
  text: string;
}

export interface ImageContent {
  kind: "image";
  /** Base64 payload without a data URI prefix. */
  data: string;
  caption: string;
}

export type ContentItem = TextContent | TableContent | ImageContent;

export interface SummaryEntry {
  id: string;
  modality: Modality;
  summary: string;
}

export interface IdentifiedContent {
  id: string;
  item: ContentItem;
}

export interface ImageContext {
  data: string;
  caption: string;
}

export type ContextOrigin = "vector" | "keyword";

export interface RetrievalContext {
  texts: string[];
  images: ImageContext[];
  origin: {
    texts: ContextOrigin;
    images: ContextOrigin;
  };
}

export interface RankedHit {
  score: number;
  index: number;
  text: string;
  firstMatchOffset: number;
}

export interface TextExcerpt {
  text: string;
  page_number: string;
}

export interface ImageHit {
  data: string;
  summary: string;
}

export interface FallbackPools {
  textSummaries: readonly string[];
  texts: readonly string[];
  images: readonly ImageContent[];
}

export interface Corpus {
  readonly documents: readonly IdentifiedContent[];
  readonly summaries: readonly SummaryEntry[];
  readonly pools: FallbackPools;
}

export function modalityOf(item: ContentItem): Modality {
  switch (item.kind) {
    case "text":
      return "text";
    case "table":
      return "table";
    case "image":
      return "image";
  }
}
