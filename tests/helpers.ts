import { vi } from "vitest";
import { SummaryHit, SummaryIndex } from "../src/domain/summaryIndex.js";
import { Corpus, ImageContent } from "../src/domain/types.js";
import { AiClient } from "../src/infra/ai/types.js";

export const IMAGE_DATA = "aW1hZ2U=";

export const sodiumChart: ImageContent = {
  kind: "image",
  data: IMAGE_DATA,
  caption: "Sodium chart",
};

export function createTestCorpus(overrides?: Partial<Corpus["pools"]>): Corpus {
  return {
    documents: [
      { id: "t1", item: { kind: "text", text: "Sodium guidance text." } },
      { id: "tb1", item: { kind: "table", text: "Nutrient | mg\nSodium | 2000" } },
      { id: "im1", item: sodiumChart },
    ],
    summaries: [
      { id: "t1", modality: "text", summary: "Summary about sodium limits." },
      { id: "tb1", modality: "table", summary: "Table of sodium milligrams." },
      { id: "im1", modality: "image", summary: "Sodium chart" },
    ],
    pools: {
      textSummaries: ["Summary about potassium foods.", "Summary about sodium limits."],
      texts: ["Raw potassium passage", "Raw sodium passage"],
      images: [sodiumChart],
      ...overrides,
    },
  };
}

export function createStubIndex(result: SummaryHit[] | Error | "pending") {
  const query = vi.fn(
    async (_text: string, _k: number, _signal?: AbortSignal): Promise<SummaryHit[]> => {
      if (result === "pending") {
        return new Promise<SummaryHit[]>(() => undefined);
      }
      if (result instanceof Error) {
        throw result;
      }
      return result;
    },
  );

  const index: SummaryIndex = {
    addEntries: async () => undefined,
    query,
    stats: async () => ({ entries: 0, embedded: 0 }),
  };
  return { index, query };
}

const KEYWORDS = ["sodium", "potassium", "fiber"];

export function keywordEmbedding(text: string): number[] {
  const lower = text.toLowerCase();
  return KEYWORDS.map((keyword) => (lower.includes(keyword) ? 1 : 0));
}

export const keywordAiClient: AiClient = {
  isEmbeddingConfigured: () => true,
  embedTexts: async (texts) => texts.map(keywordEmbedding),
  embedQuery: async (query) => keywordEmbedding(query),
  getAnswerMode: () => "client_llm",
  generateAnswer: async () => null,
};
