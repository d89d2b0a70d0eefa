import { describe, expect, it, vi } from "vitest";
import { InMemorySummaryIndex } from "../src/infra/index/inMemorySummaryIndex.js";
import { EmbeddingClient } from "../src/infra/ai/types.js";
import { SummaryEntry } from "../src/domain/types.js";

const KEYWORDS = ["sodium", "potassium", "fiber"];

function embed(text: string): number[] {
  const lower = text.toLowerCase();
  return KEYWORDS.map((keyword) => (lower.includes(keyword) ? 1 : 0));
}

function createEmbeddings(configured = true): EmbeddingClient {
  return {
    isEmbeddingConfigured: () => configured,
    embedTexts: vi.fn(async (texts: string[]) => texts.map(embed)),
    embedQuery: vi.fn(async (query: string) => embed(query)),
  };
}

const entries: SummaryEntry[] = [
  { id: "e1", modality: "text", summary: "Sodium limits" },
  { id: "e2", modality: "table", summary: "Potassium foods" },
  { id: "e3", modality: "image", summary: "Fiber sources" },
];

describe("InMemorySummaryIndex", () => {
  it("returns the closest summaries first", async () => {
    const index = new InMemorySummaryIndex(createEmbeddings());
    await index.addEntries(entries);

    await expect(index.query("potassium rich", 1)).resolves.toEqual([
      { id: "e2", modality: "table" },
    ]);
    await expect(index.stats()).resolves.toEqual({ entries: 3, embedded: 3 });
  });

  it("embeds in batches and skips known ids", async () => {
    const embeddings = createEmbeddings();
    const index = new InMemorySummaryIndex(embeddings, { batchSize: 2 });

    await index.addEntries(entries);
    await index.addEntries(entries);

    expect(embeddings.embedTexts).toHaveBeenCalledTimes(2);
    await expect(index.stats()).resolves.toEqual({ entries: 3, embedded: 3 });
  });

  it("keeps entries without vectors when embedding fails", async () => {
    const embeddings = createEmbeddings();
    vi.mocked(embeddings.embedTexts).mockRejectedValueOnce(new Error("quota exceeded"));
    const index = new InMemorySummaryIndex(embeddings);

    await index.addEntries(entries);

    await expect(index.stats()).resolves.toEqual({ entries: 3, embedded: 0 });
    await expect(index.query("sodium", 3)).resolves.toEqual([]);
  });

  it("returns nothing when embeddings are disabled", async () => {
    const embeddings = createEmbeddings(false);
    const index = new InMemorySummaryIndex(embeddings);
    await index.addEntries(entries);

    await expect(index.query("sodium", 3)).resolves.toEqual([]);
    expect(embeddings.embedTexts).not.toHaveBeenCalled();
    expect(embeddings.embedQuery).not.toHaveBeenCalled();
  });
});
